/**
 * Run Configuration
 *
 * JSON document describing one simulation run: starting preset and
 * overrides, feeding policy, model parameter overrides, noise seed,
 * clock settings and the ambient temperature schedule.
 *
 * @example
 * {
 *   "preset": "classic",
 *   "initialState": { "temperature": 22 },
 *   "policy": { "intervalHours": 12, "nutrientAmount": 30 },
 *   "seed": 42,
 *   "clock": { "stepSizeHours": 0.1 },
 *   "ambient": { "kind": "constant", "temperature": 24 },
 *   "durationHours": 48
 * }
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  AmbientScheduleJSONSchema,
  FeedingPolicyJSONSchema,
  InvalidConfigurationError,
  ModelParameterOverridesSchema,
  PRESET_NAMES,
  StarterStateSchema,
} from '@levain/core';

export const RunConfigSchema = z
  .object({
    preset: z.enum(PRESET_NAMES).default('classic'),
    initialState: StarterStateSchema.partial().strict().default({}),
    policy: FeedingPolicyJSONSchema.partial().strict().default({}),
    parameters: ModelParameterOverridesSchema.default({}),
    integrator: z.enum(['rk4', 'euler']).default('rk4'),
    /** Omitted: a seed is drawn when the run is created */
    seed: z.number().int().optional(),
    clock: z
      .object({
        stepSizeHours: z.number().finite().positive().default(0.1),
        timeScale: z.number().finite().positive().default(1),
        maxSubstepHours: z.number().finite().positive().optional(),
      })
      .strict()
      .default({}),
    ambient: AmbientScheduleJSONSchema.default({ kind: 'constant', temperature: 24 }),
    durationHours: z.number().finite().positive().default(24),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

/**
 * Validate a parsed configuration document.
 *
 * @throws InvalidConfigurationError naming the first offending path
 */
export function parseRunConfig(input: unknown): RunConfig {
  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    throw InvalidConfigurationError.fromZodError('config', result.error);
  }
  return result.data;
}

/**
 * Read and validate a configuration file.
 *
 * @throws InvalidConfigurationError when the file is unreadable, not JSON, or invalid
 */
export async function loadRunConfig(path: string): Promise<RunConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new InvalidConfigurationError('config', `cannot read ${path}`, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new InvalidConfigurationError('config', `${path} is not valid JSON`, error);
  }

  return parseRunConfig(json);
}
