/**
 * Fermentation Model
 *
 * Advances a starter by one time step. Yeast and bacteria grow logistically
 * on a shared nutrient pool; yeast growth makes gas; gas beyond what the
 * gluten network can hold tears the network down. Salt slows both
 * populations and speeds up gluten development.
 *
 * The step is a function of its inputs plus the noise stream: nothing is
 * mutated until the new state has been fully computed and checked.
 */

import type { NoiseSource } from '../noise/noise-source.js';
import type { ModelParameters, PopulationParameters } from '../types/model-parameters.js';
import { DEFAULT_MODEL_PARAMETERS, resolveModelParameters } from '../types/model-parameters.js';
import type { StarterState } from '../types/starter-state.js';
import { GLUTEN_RANGE, createStarterState } from '../types/starter-state.js';
import { NumericDivergenceError } from '../errors.js';
import { clamp, nonNegative } from '../utils/math.js';
import { clampAmbientTemperature, temperatureFactor } from './temperature-response.js';
import { rk4Step, eulerStep, type Vector } from './integrator.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Quantities the model integrates. Order fixes the order of noise draws.
 */
export const EVOLVING_FIELDS = [
  'yeastPopulation',
  'bacteriaPopulation',
  'nutrientLevel',
  'gasVolume',
  'glutenStrength',
] as const;

export type EvolvingField = (typeof EVOLVING_FIELDS)[number];

export type IntegratorKind = 'rk4' | 'euler';

/**
 * Noiseless derivatives plus the factors behind them.
 */
export interface FermentationRates {
  /** d/dt of each evolving quantity (per hour) */
  derivatives: Vector<EvolvingField>;
  temperatureFactor: { yeast: number; bacteria: number };
  nutrientFactor: number;
  capacity: { yeast: number; bacteria: number };
  /** Gross logistic growth terms, before death */
  growth: { yeast: number; bacteria: number };
  /** Gas the network holds before it starts collapsing */
  gasThreshold: number;
  /** Effective gas release rate (1/h) */
  releaseRate: number;
  /** Multipliers from the salt level, both 1 when unsalted */
  salt: { growth: number; development: number };
}

export interface FermentationModelOptions {
  noise: NoiseSource;
  parameters?: ModelParameters;
  integrator?: IntegratorKind;
}

// ============================================================================
// RATE FUNCTIONS
// ============================================================================

/**
 * Carrying capacity from hydration: saturating in hydration, flat above the cap,
 * never below the configured minimum.
 */
export function carryingCapacity(
  hydration: number,
  population: Pick<PopulationParameters, 'capacityMax'>,
  capacity: ModelParameters['capacity']
): number {
  const effective = Math.min(Math.max(hydration, 0), capacity.hydrationCap);
  const saturation = effective / (effective + capacity.halfSaturationHydration);
  return Math.max(capacity.minimum, population.capacityMax * saturation);
}

/**
 * Growth and development multipliers for a salt level.
 */
export function saltResponse(
  saltLevel: number,
  salt: ModelParameters['salt']
): FermentationRates['salt'] {
  const doses = Math.max(0, saltLevel) / salt.dose;
  return {
    growth: 1 / (1 + salt.growthDrag * doses),
    development: 1 + salt.glutenBoost * doses,
  };
}

/**
 * Fixed inputs of one step: neither is integrated.
 */
interface StepConditions {
  hydration: number;
  saltLevel: number;
  /** Already clamped */
  temperature: number;
}

function evaluateRates(
  point: Vector<EvolvingField>,
  conditions: StepConditions,
  params: ModelParameters
): FermentationRates {
  const { hydration, temperature } = conditions;
  const yeast = point.yeastPopulation;
  const bacteria = point.bacteriaPopulation;
  const nutrient = point.nutrientLevel;
  const gas = point.gasVolume;
  const gluten = point.glutenStrength;

  const fTYeast = temperatureFactor(temperature, params.yeast);
  const fTBacteria = temperatureFactor(temperature, params.bacteria);
  const fN = nutrient / (nutrient + params.nutrient.halfSaturation);

  const capYeast = carryingCapacity(hydration, params.yeast, params.capacity);
  const capBacteria = carryingCapacity(hydration, params.bacteria, params.capacity);

  const salt = saltResponse(conditions.saltLevel, params.salt);

  const growthYeast =
    params.yeast.growthRate * salt.growth * fTYeast * fN * yeast * (1 - yeast / capYeast);
  const growthBacteria =
    params.bacteria.growthRate * salt.growth * fTBacteria * fN * bacteria * (1 - bacteria / capBacteria);

  const dYeast = growthYeast - params.yeast.deathRate * (1 - fTYeast) * yeast;
  const dBacteria = growthBacteria - params.bacteria.deathRate * (1 - fTBacteria) * bacteria;

  // Overcrowded populations shrink, they do not give food back.
  const dNutrient =
    -params.nutrient.consumptionCoefficient *
    (Math.max(0, growthYeast) + Math.max(0, growthBacteria));

  const releaseRate = params.gas.releaseRate * (1 + params.gas.weakStructureLeak * (1 - gluten));
  const dGas = params.gas.yieldCoefficient * Math.max(0, growthYeast) - releaseRate * gas;

  const gasThreshold = params.gluten.gasThreshold * gluten;
  const dGluten =
    params.gluten.developmentRate * salt.development * fTYeast -
    params.gluten.collapseRate * Math.max(0, gas - gasThreshold);

  return {
    derivatives: {
      yeastPopulation: dYeast,
      bacteriaPopulation: dBacteria,
      nutrientLevel: dNutrient,
      gasVolume: dGas,
      glutenStrength: dGluten,
    },
    temperatureFactor: { yeast: fTYeast, bacteria: fTBacteria },
    nutrientFactor: fN,
    capacity: { yeast: capYeast, bacteria: capBacteria },
    growth: { yeast: growthYeast, bacteria: growthBacteria },
    gasThreshold,
    releaseRate,
    salt,
  };
}

/**
 * Keep a stage point inside the domain the rate functions are defined on.
 */
function projectToDomain(point: Vector<EvolvingField>): Vector<EvolvingField> {
  return {
    yeastPopulation: Math.max(0, point.yeastPopulation),
    bacteriaPopulation: Math.max(0, point.bacteriaPopulation),
    nutrientLevel: Math.max(0, point.nutrientLevel),
    gasVolume: Math.max(0, point.gasVolume),
    glutenStrength: clamp(point.glutenStrength, GLUTEN_RANGE.min, GLUTEN_RANGE.max),
  };
}

/**
 * Build a vector field by field, in EVOLVING_FIELDS order.
 */
function mapFields(fn: (field: EvolvingField) => number): Vector<EvolvingField> {
  return {
    yeastPopulation: fn('yeastPopulation'),
    bacteriaPopulation: fn('bacteriaPopulation'),
    nutrientLevel: fn('nutrientLevel'),
    gasVolume: fn('gasVolume'),
    glutenStrength: fn('glutenStrength'),
  };
}

function toVector(state: StarterState): Vector<EvolvingField> {
  return mapFields((field) => state[field]);
}

// ============================================================================
// MODEL
// ============================================================================

export class FermentationModel {
  readonly parameters: ModelParameters;
  readonly integrator: IntegratorKind;
  private readonly noise: NoiseSource;

  /**
   * @throws InvalidConfigurationError if the parameters fail validation
   */
  constructor(options: FermentationModelOptions) {
    this.noise = options.noise;
    this.parameters = resolveModelParameters({}, options.parameters ?? DEFAULT_MODEL_PARAMETERS);
    this.integrator = options.integrator ?? 'rk4';
  }

  /**
   * Noiseless rates at the given state and ambient temperature.
   */
  computeRates(state: StarterState, ambientTemperature: number): FermentationRates {
    return evaluateRates(
      projectToDomain(toVector(state)),
      {
        hydration: state.hydration,
        saltLevel: state.saltLevel,
        temperature: clampAmbientTemperature(ambientTemperature),
      },
      this.parameters
    );
  }

  /**
   * Advance `state` by `dt` hours at the given ambient temperature.
   *
   * A non-positive dt returns the input unchanged and draws no noise.
   *
   * @throws NumericDivergenceError if any derivative or result is non-finite
   */
  step(state: StarterState, dt: number, ambientTemperature: number): StarterState {
    if (!(dt > 0)) {
      return state;
    }

    const temperature = clampAmbientTemperature(ambientTemperature);
    const params = this.parameters;

    const perturbation = mapFields(() => 1 + this.noise.sample(params.noiseMagnitude));
    const conditions: StepConditions = {
      hydration: state.hydration,
      saltLevel: state.saltLevel,
      temperature,
    };

    const derivative = (point: Vector<EvolvingField>): Vector<EvolvingField> => {
      const rates = evaluateRates(point, conditions, params).derivatives;
      return mapFields((field) => {
        const value = rates[field] * perturbation[field];
        if (!Number.isFinite(value)) {
          throw new NumericDivergenceError(`d(${field})/dt`, value, state.timeElapsed);
        }
        return value;
      });
    };

    const integrate = this.integrator === 'euler' ? eulerStep : rk4Step;
    const next = integrate(EVOLVING_FIELDS, toVector(state), dt, derivative, projectToDomain);

    for (const field of EVOLVING_FIELDS) {
      if (!Number.isFinite(next[field])) {
        throw new NumericDivergenceError(field, next[field], state.timeElapsed);
      }
    }

    const timeElapsed = state.timeElapsed + dt;
    const timeSinceLastFeeding = state.timeSinceLastFeeding + dt;
    if (!Number.isFinite(timeElapsed) || !Number.isFinite(timeSinceLastFeeding)) {
      throw new NumericDivergenceError('timeElapsed', timeElapsed, state.timeElapsed);
    }

    return createStarterState({
      timeElapsed,
      hydration: state.hydration,
      temperature,
      yeastPopulation: nonNegative(next.yeastPopulation),
      bacteriaPopulation: nonNegative(next.bacteriaPopulation),
      nutrientLevel: nonNegative(next.nutrientLevel),
      gasVolume: nonNegative(next.gasVolume),
      glutenStrength: next.glutenStrength,
      timeSinceLastFeeding,
      saltLevel: state.saltLevel,
    });
  }
}
