/**
 * Model Parameters
 *
 * Every coefficient of the fermentation model. None of these are measured
 * constants; they are tuning knobs with defaults that give a starter which
 * peaks a few hours after feeding at room temperature.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';

export interface PopulationParameters {
  /** Maximum specific growth rate (1/h) */
  growthRate: number;
  /** Specific death rate away from the optimum temperature (1/h) */
  deathRate: number;
  /** Peak of the temperature response (°C) */
  optimalTemperature: number;
  /** Width (standard deviation) of the temperature response (°C) */
  temperatureWidth: number;
  /** Carrying capacity approached at saturating hydration */
  capacityMax: number;
}

export interface ModelParameters {
  yeast: PopulationParameters;
  bacteria: PopulationParameters;
  capacity: {
    /** Hydration at which capacity reaches half of capacityMax */
    halfSaturationHydration: number;
    /** Hydration above which wetter dough adds no capacity */
    hydrationCap: number;
    /** Lower bound on capacity, keeps the logistic term defined */
    minimum: number;
  };
  nutrient: {
    /** Half-saturation constant K of f_N = n / (n + K) */
    halfSaturation: number;
    /** Nutrient consumed per unit of population growth */
    consumptionCoefficient: number;
  };
  gas: {
    /** Gas produced per unit of yeast growth */
    yieldCoefficient: number;
    /** Release rate of a fully developed network (1/h) */
    releaseRate: number;
    /** Extra release factor as gluten strength falls to zero */
    weakStructureLeak: number;
  };
  gluten: {
    /** Development per hour at the yeast optimum */
    developmentRate: number;
    /** Strength lost per hour per unit of excess gas */
    collapseRate: number;
    /** Gas a fully developed network holds; threshold = gasThreshold * strength */
    gasThreshold: number;
  };
  fold: {
    /** Fraction of the missing strength a fold restores */
    strengthGain: number;
    /** Fraction of the gas a fold knocks out */
    degasFraction: number;
  };
  salt: {
    /** Salt fraction one salting adds; also the level the effects below are quoted at */
    dose: number;
    /** Relative boost to gluten development at one dose */
    glutenBoost: number;
    /** Relative slowdown of population growth at one dose */
    growthDrag: number;
  };
  /** Relative perturbation applied to each derivative, in [0, 1) */
  noiseMagnitude: number;
}

export const DEFAULT_MODEL_PARAMETERS: Readonly<ModelParameters> = Object.freeze({
  yeast: Object.freeze({
    growthRate: 0.35,
    deathRate: 0.05,
    optimalTemperature: 27,
    temperatureWidth: 6,
    capacityMax: 100,
  }),
  bacteria: Object.freeze({
    growthRate: 0.25,
    deathRate: 0.04,
    optimalTemperature: 30,
    temperatureWidth: 7,
    capacityMax: 150,
  }),
  capacity: Object.freeze({
    halfSaturationHydration: 0.5,
    hydrationCap: 1.5,
    minimum: 1,
  }),
  nutrient: Object.freeze({
    halfSaturation: 5,
    consumptionCoefficient: 0.3,
  }),
  // Tuned so an unfed starter near 27 °C outgrows its network within a day.
  gas: Object.freeze({
    yieldCoefficient: 0.25,
    releaseRate: 0.1,
    weakStructureLeak: 2,
  }),
  gluten: Object.freeze({
    developmentRate: 0.04,
    collapseRate: 0.05,
    gasThreshold: 4,
  }),
  fold: Object.freeze({
    strengthGain: 0.1,
    degasFraction: 0.3,
  }),
  salt: Object.freeze({
    dose: 0.02,
    glutenBoost: 0.2,
    growthDrag: 0.25,
  }),
  noiseMagnitude: 0.02,
});

// ============================================================================
// SCHEMAS
// ============================================================================

const rate = z.number().finite().nonnegative();
const positive = z.number().finite().positive();
const fraction = z.number().finite().min(0).max(1);

export const PopulationParametersSchema = z.object({
  growthRate: rate,
  deathRate: rate,
  optimalTemperature: z.number().finite(),
  temperatureWidth: positive,
  capacityMax: positive,
});

export const ModelParametersSchema = z.object({
  yeast: PopulationParametersSchema,
  bacteria: PopulationParametersSchema,
  capacity: z.object({
    halfSaturationHydration: positive,
    hydrationCap: positive,
    minimum: positive,
  }),
  nutrient: z.object({
    halfSaturation: positive,
    consumptionCoefficient: rate,
  }),
  gas: z.object({
    yieldCoefficient: rate,
    releaseRate: rate,
    weakStructureLeak: rate,
  }),
  gluten: z.object({
    developmentRate: rate,
    collapseRate: rate,
    gasThreshold: rate,
  }),
  fold: z.object({
    strengthGain: fraction,
    degasFraction: fraction,
  }),
  salt: z.object({
    dose: z.number().finite().positive().max(0.1),
    glutenBoost: rate,
    growthDrag: rate,
  }),
  noiseMagnitude: z.number().finite().min(0).lt(1, 'noise magnitude must be below 1'),
});

/**
 * Partial overrides as found in a run configuration.
 */
export const ModelParameterOverridesSchema = z.object({
  yeast: PopulationParametersSchema.partial().optional(),
  bacteria: PopulationParametersSchema.partial().optional(),
  capacity: ModelParametersSchema.shape.capacity.partial().optional(),
  nutrient: ModelParametersSchema.shape.nutrient.partial().optional(),
  gas: ModelParametersSchema.shape.gas.partial().optional(),
  gluten: ModelParametersSchema.shape.gluten.partial().optional(),
  fold: ModelParametersSchema.shape.fold.partial().optional(),
  salt: ModelParametersSchema.shape.salt.partial().optional(),
  noiseMagnitude: z.number().optional(),
});

export type ModelParameterOverrides = z.infer<typeof ModelParameterOverridesSchema>;

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws InvalidConfigurationError
 */
export function resolveModelParameters(
  overrides: ModelParameterOverrides = {},
  base: Readonly<ModelParameters> = DEFAULT_MODEL_PARAMETERS
): ModelParameters {
  const merged: ModelParameters = {
    yeast: { ...base.yeast, ...overrides.yeast },
    bacteria: { ...base.bacteria, ...overrides.bacteria },
    capacity: { ...base.capacity, ...overrides.capacity },
    nutrient: { ...base.nutrient, ...overrides.nutrient },
    gas: { ...base.gas, ...overrides.gas },
    gluten: { ...base.gluten, ...overrides.gluten },
    fold: { ...base.fold, ...overrides.fold },
    salt: { ...base.salt, ...overrides.salt },
    noiseMagnitude: overrides.noiseMagnitude ?? base.noiseMagnitude,
  };

  const result = ModelParametersSchema.safeParse(merged);
  if (!result.success) {
    throw InvalidConfigurationError.fromZodError('parameters', result.error);
  }
  return result.data;
}
