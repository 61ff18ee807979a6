/**
 * Starter State
 *
 * Snapshot of every simulation-relevant quantity at one point in time.
 *
 * Note: State is a plain frozen interface (no class) because:
 * - The clock swaps whole snapshots, it never patches one in place
 * - Observers (viewer, persistence) must only ever see completed values
 * - The fields below are the complete serialization contract
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';
import { clamp, nonNegative } from '../utils/math.js';

// ============================================================================
// RANGES
// ============================================================================

export const HYDRATION_RANGE = { min: 0, max: 2 } as const;
export const TEMPERATURE_RANGE = { min: 0, max: 50 } as const;
export const GLUTEN_RANGE = { min: 0, max: 1 } as const;
export const SALT_RANGE = { min: 0, max: 0.1 } as const;

// ============================================================================
// STATE INTERFACE
// ============================================================================

export interface StarterState {
  /** Hours since simulation start. Never decreases. */
  readonly timeElapsed: number;

  /**
   * Water to flour mass ratio.
   * Range: [0, 2]
   */
  readonly hydration: number;

  /**
   * Temperature the starter last experienced, °C.
   * Range: [0, 50]
   */
  readonly temperature: number;

  /** Relative yeast population, >= 0 */
  readonly yeastPopulation: number;

  /** Relative lactic bacteria population, >= 0 */
  readonly bacteriaPopulation: number;

  /** Food available to both populations, >= 0. Only feeding raises it. */
  readonly nutrientLevel: number;

  /** Accumulated CO2, >= 0 */
  readonly gasVolume: number;

  /**
   * Gluten network integrity.
   * Range: [0, 1]
   */
  readonly glutenStrength: number;

  /** Hours since the last feeding event */
  readonly timeSinceLastFeeding: number;

  /**
   * Salt as a fraction of starter mass. Only salting raises it, feeding dilutes it.
   * Range: [0, 0.1]
   */
  readonly saltLevel: number;
}

/**
 * Constructor input. Time counters, gas, gluten and salt default to a fresh starter.
 */
export type StarterStateInput = Pick<
  StarterState,
  'hydration' | 'temperature' | 'yeastPopulation' | 'bacteriaPopulation' | 'nutrientLevel'
> &
  Partial<
    Pick<StarterState, 'timeElapsed' | 'gasVolume' | 'glutenStrength' | 'timeSinceLastFeeding' | 'saltLevel'>
  >;

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Build a frozen state, clamping instead of failing:
 * hydration, temperature, gluten and salt saturate into their ranges,
 * negative or non-finite amounts and durations floor to zero.
 */
export function createStarterState(input: StarterStateInput): StarterState {
  return Object.freeze({
    timeElapsed: nonNegative(input.timeElapsed ?? 0),
    hydration: clamp(input.hydration, HYDRATION_RANGE.min, HYDRATION_RANGE.max),
    temperature: clamp(input.temperature, TEMPERATURE_RANGE.min, TEMPERATURE_RANGE.max),
    yeastPopulation: nonNegative(input.yeastPopulation),
    bacteriaPopulation: nonNegative(input.bacteriaPopulation),
    nutrientLevel: nonNegative(input.nutrientLevel),
    gasVolume: nonNegative(input.gasVolume ?? 0),
    glutenStrength: clamp(input.glutenStrength ?? 0, GLUTEN_RANGE.min, GLUTEN_RANGE.max),
    timeSinceLastFeeding: nonNegative(input.timeSinceLastFeeding ?? 0),
    saltLevel: clamp(input.saltLevel ?? 0, SALT_RANGE.min, SALT_RANGE.max),
  });
}

/**
 * Return a copy with some fields replaced, re-clamped.
 */
export function withStarterState(
  state: StarterState,
  changes: Partial<StarterState>
): StarterState {
  return createStarterState({ ...state, ...changes });
}

// ============================================================================
// STRICT VALIDATION
// ============================================================================

/**
 * Strict schema for user-supplied initial values.
 * Unlike createStarterState this rejects out-of-range input.
 */
export const StarterStateSchema = z.object({
  timeElapsed: z.number().finite().nonnegative().default(0),
  hydration: z.number().finite().min(HYDRATION_RANGE.min).max(HYDRATION_RANGE.max),
  temperature: z.number().finite().min(TEMPERATURE_RANGE.min).max(TEMPERATURE_RANGE.max),
  yeastPopulation: z.number().finite().nonnegative(),
  bacteriaPopulation: z.number().finite().nonnegative(),
  nutrientLevel: z.number().finite().nonnegative(),
  gasVolume: z.number().finite().nonnegative().default(0),
  glutenStrength: z.number().finite().min(GLUTEN_RANGE.min).max(GLUTEN_RANGE.max).default(0),
  timeSinceLastFeeding: z.number().finite().nonnegative().default(0),
  saltLevel: z.number().finite().min(SALT_RANGE.min).max(SALT_RANGE.max).default(0),
});

/**
 * Validate initial values strictly, then construct.
 *
 * @throws InvalidConfigurationError on any out-of-range or non-finite field
 */
export function parseStarterState(input: unknown): StarterState {
  const result = StarterStateSchema.safeParse(input);
  if (!result.success) {
    throw InvalidConfigurationError.fromZodError('initialState', result.error);
  }
  return createStarterState(result.data);
}

// ============================================================================
// JSON SERIALIZATION
// ============================================================================

/**
 * JSON representation of StarterState. All fields are plain numbers,
 * so the shape matches the state itself.
 */
export type StarterStateJSON = { [K in keyof StarterState]: number };

export function toStarterStateJSON(state: StarterState): StarterStateJSON {
  return {
    timeElapsed: state.timeElapsed,
    hydration: state.hydration,
    temperature: state.temperature,
    yeastPopulation: state.yeastPopulation,
    bacteriaPopulation: state.bacteriaPopulation,
    nutrientLevel: state.nutrientLevel,
    gasVolume: state.gasVolume,
    glutenStrength: state.glutenStrength,
    timeSinceLastFeeding: state.timeSinceLastFeeding,
    saltLevel: state.saltLevel,
  };
}

/**
 * Deserialize a stored state. Uses the strict schema: a stored snapshot
 * with out-of-range values is a corrupt file, not something to clamp.
 */
export function fromStarterStateJSON(json: unknown): StarterState {
  return parseStarterState(json);
}

/**
 * Check the after-step invariants. Returns the name of the first violated field,
 * or null when the state is consistent.
 */
export function findInvariantViolation(state: StarterState): keyof StarterState | null {
  const nonNegativeFields = [
    'timeElapsed',
    'yeastPopulation',
    'bacteriaPopulation',
    'nutrientLevel',
    'gasVolume',
    'timeSinceLastFeeding',
  ] as const;

  for (const field of nonNegativeFields) {
    const value = state[field];
    if (!Number.isFinite(value) || value < 0) return field;
  }
  if (!(state.hydration >= HYDRATION_RANGE.min && state.hydration <= HYDRATION_RANGE.max)) {
    return 'hydration';
  }
  if (!(state.glutenStrength >= GLUTEN_RANGE.min && state.glutenStrength <= GLUTEN_RANGE.max)) {
    return 'glutenStrength';
  }
  if (!(state.temperature >= TEMPERATURE_RANGE.min && state.temperature <= TEMPERATURE_RANGE.max)) {
    return 'temperature';
  }
  if (!(state.saltLevel >= SALT_RANGE.min && state.saltLevel <= SALT_RANGE.max)) {
    return 'saltLevel';
  }
  return null;
}
