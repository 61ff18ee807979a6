/**
 * Simulation Snapshot
 *
 * Everything needed to continue a run exactly where it stopped:
 * state, policy, noise stream position and clock settings.
 *
 * Infinite feeding intervals are stored as `null`.
 */

import { z } from 'zod';
import {
  AmbientScheduleJSONSchema,
  FeedingPolicyJSONSchema,
  ModelParametersSchema,
  StarterStateSchema,
  toFeedingPolicyJSON,
  toStarterStateJSON,
  type SeededNoiseSource,
  type SimulationClock,
} from '@levain/core';
import { SnapshotFormatError } from './errors.js';

export const SNAPSHOT_VERSION = 1;

export const SimulationSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  runId: z.string().min(1),
  savedAt: z.string().datetime(),
  state: StarterStateSchema,
  policy: FeedingPolicyJSONSchema,
  noise: z.object({
    seed: z.number().int(),
    draws: z.number().int().nonnegative(),
  }),
  run: z.object({
    parameters: ModelParametersSchema,
    integrator: z.enum(['rk4', 'euler']).default('rk4'),
    stepSizeHours: z.number().finite().positive(),
    timeScale: z.number().finite().positive(),
    maxSubstepHours: z.number().finite().positive().optional(),
    ambient: AmbientScheduleJSONSchema,
  }),
});

/** Shape written to storage */
export type SimulationSnapshotJSON = z.input<typeof SimulationSnapshotSchema>;

/** Shape after validation, defaults filled */
export type SimulationSnapshot = z.output<typeof SimulationSnapshotSchema>;

export interface SnapshotSource {
  runId: string;
  clock: SimulationClock;
  noise: SeededNoiseSource;
}

export function createSnapshot(source: SnapshotSource, savedAt: Date = new Date()): SimulationSnapshotJSON {
  const { clock } = source;
  return {
    version: SNAPSHOT_VERSION,
    runId: source.runId,
    savedAt: savedAt.toISOString(),
    state: toStarterStateJSON(clock.state),
    policy: toFeedingPolicyJSON(clock.policy),
    noise: source.noise.getState(),
    run: {
      parameters: clock.model.parameters,
      integrator: clock.model.integrator,
      stepSizeHours: clock.stepSize,
      timeScale: clock.timeScale,
      ...(clock.maxSubstep !== undefined ? { maxSubstepHours: clock.maxSubstep } : {}),
      ambient: clock.ambient.toJSON(),
    },
  };
}

/**
 * @throws SnapshotFormatError
 */
export function parseSnapshot(json: unknown, key: string): SimulationSnapshot {
  const result = SimulationSnapshotSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    const reason = issue ? `${path || '(root)'}: ${issue.message}` : 'schema mismatch';
    throw new SnapshotFormatError(key, reason, result.error);
  }
  return result.data;
}

export function serializeSnapshot(snapshot: SimulationSnapshotJSON): string {
  return `${JSON.stringify(snapshot, null, 2)}\n`;
}

/**
 * @throws SnapshotFormatError
 */
export function deserializeSnapshot(text: string, key: string): SimulationSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new SnapshotFormatError(key, 'not valid JSON', error);
  }
  return parseSnapshot(json, key);
}
