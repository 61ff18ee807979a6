/**
 * Starter Presets
 *
 * Named starting points for a run. A preset is only an initial state;
 * feeding policy and parameters are configured separately.
 */

import { InvalidConfigurationError } from '../errors.js';
import type { StarterState, StarterStateInput } from '../types/starter-state.js';
import { createStarterState } from '../types/starter-state.js';

export const PRESET_NAMES = ['classic', 'stiff', 'liquid'] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

export interface StarterPreset {
  name: PresetName;
  description: string;
  initial: StarterStateInput;
}

export const STARTER_PRESETS: Readonly<Record<PresetName, StarterPreset>> = {
  classic: {
    name: 'classic',
    description: '100% hydration starter at a warm room temperature',
    initial: {
      hydration: 1.0,
      temperature: 24,
      yeastPopulation: 5,
      bacteriaPopulation: 5,
      nutrientLevel: 40,
      glutenStrength: 0.3,
    },
  },
  stiff: {
    name: 'stiff',
    description: '50% hydration levain, slower and milder',
    initial: {
      hydration: 0.5,
      temperature: 22,
      yeastPopulation: 4,
      bacteriaPopulation: 3,
      nutrientLevel: 35,
      glutenStrength: 0.5,
    },
  },
  liquid: {
    name: 'liquid',
    description: '125% hydration starter, bacteria-forward',
    initial: {
      hydration: 1.25,
      temperature: 26,
      yeastPopulation: 5,
      bacteriaPopulation: 8,
      nutrientLevel: 40,
      glutenStrength: 0.2,
    },
  },
};

export function isPresetName(name: string): name is PresetName {
  return PRESET_NAMES.some((preset) => preset === name);
}

/**
 * Look up a preset by name.
 *
 * @throws InvalidConfigurationError for an unknown name
 */
export function getPreset(name: string): StarterPreset {
  if (!isPresetName(name)) {
    throw new InvalidConfigurationError(
      'preset',
      `unknown preset '${name}', expected one of: ${PRESET_NAMES.join(', ')}`
    );
  }
  return STARTER_PRESETS[name];
}

/**
 * Fresh state from a preset, with optional field overrides.
 */
export function createPresetState(
  name: string,
  overrides: Partial<StarterStateInput> = {}
): StarterState {
  return createStarterState({ ...getPreset(name).initial, ...overrides });
}
