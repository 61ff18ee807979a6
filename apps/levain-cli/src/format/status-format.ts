/**
 * Text rendering of starter snapshots for the terminal.
 */

import type { StarterState } from '@levain/core';

export interface StatusScales {
  /** Population shown as a full bar */
  population: number;
  nutrient: number;
  gas: number;
}

export const DEFAULT_SCALES: StatusScales = {
  population: 100,
  nutrient: 100,
  gas: 20,
};

const BAR_WIDTH = 20;

export function renderBar(fraction: number, width: number = BAR_WIDTH): string {
  const bounded = Number.isFinite(fraction) ? Math.min(1, Math.max(0, fraction)) : 0;
  const filled = Math.round(bounded * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

export type StarterPhase = 'freshly fed' | 'starving' | 'collapsed' | 'fermenting';

/**
 * Rough label for what the starter is doing right now.
 */
export function describePhase(state: StarterState): StarterPhase {
  if (state.timeSinceLastFeeding < 1) return 'freshly fed';
  if (state.nutrientLevel < 1) return 'starving';
  if (state.glutenStrength < 0.2) return 'collapsed';
  return 'fermenting';
}

function row(label: string, value: string, bar?: string): string {
  const base = `   ${label.padEnd(14)}${value.padStart(10)}`;
  return bar === undefined ? base : `${base}  ${bar}`;
}

/**
 * Multi-line summary with bar indicators. Salt is listed once any has been added.
 */
export function formatStatus(state: StarterState, scales: StatusScales = DEFAULT_SCALES): string[] {
  const lines = [
    `🍞 t = ${state.timeElapsed.toFixed(1)} h, ${describePhase(state)} (fed ${state.timeSinceLastFeeding.toFixed(1)} h ago)`,
    row('Temperature', `${state.temperature.toFixed(1)} °C`),
    row('Hydration', `${(state.hydration * 100).toFixed(0)} %`, renderBar(state.hydration / 2)),
    row('Yeast', state.yeastPopulation.toFixed(2), renderBar(state.yeastPopulation / scales.population)),
    row('Bacteria', state.bacteriaPopulation.toFixed(2), renderBar(state.bacteriaPopulation / scales.population)),
    row('Nutrient', state.nutrientLevel.toFixed(2), renderBar(state.nutrientLevel / scales.nutrient)),
    row('Gas', state.gasVolume.toFixed(2), renderBar(state.gasVolume / scales.gas)),
    row('Gluten', state.glutenStrength.toFixed(2), renderBar(state.glutenStrength)),
  ];
  if (state.saltLevel > 0) {
    lines.push(row('Salt', `${(state.saltLevel * 100).toFixed(1)} %`));
  }
  return lines;
}

/**
 * One-line progress summary.
 */
export function formatStatusLine(state: StarterState): string {
  return [
    `t=${state.timeElapsed.toFixed(1)}h`.padEnd(9),
    `yeast=${state.yeastPopulation.toFixed(1)}`,
    `bacteria=${state.bacteriaPopulation.toFixed(1)}`,
    `nutrient=${state.nutrientLevel.toFixed(1)}`,
    `gas=${state.gasVolume.toFixed(2)}`,
    `gluten=${state.glutenStrength.toFixed(2)}`,
  ].join('  ');
}
