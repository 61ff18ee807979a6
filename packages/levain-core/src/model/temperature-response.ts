import type { PopulationParameters } from '../types/model-parameters.js';
import { TEMPERATURE_RANGE } from '../types/starter-state.js';
import { clamp } from '../utils/math.js';

/**
 * Clamp an ambient reading into the modelled range.
 * Extremes saturate into dormancy/death instead of being rejected.
 */
export function clampAmbientTemperature(temperature: number): number {
  return clamp(temperature, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max);
}

/**
 * Gaussian-shaped activity in (0, 1], equal to 1 at the optimum.
 * Too cold reads as dormant, too hot as dying; no enzyme kinetics behind it.
 */
export function temperatureFactor(
  temperature: number,
  population: Pick<PopulationParameters, 'optimalTemperature' | 'temperatureWidth'>
): number {
  const z = (temperature - population.optimalTemperature) / population.temperatureWidth;
  return Math.exp(-(z * z) / 2);
}
