/**
 * Ambient Temperature Schedule
 *
 * Room temperature as a function of simulated time. A constant kitchen, or a
 * piecewise profile (optionally repeating, e.g. a 24h day/night cycle).
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';

export interface AmbientSchedule {
  temperatureAt(timeElapsed: number): number;
  toJSON(): AmbientScheduleJSON;
}

export type Interpolation = 'step' | 'linear';

export interface TemperaturePoint {
  /** Hours from the start of the profile */
  atHours: number;
  temperature: number;
}

// ============================================================================
// JSON SHAPES
// ============================================================================

export const AmbientScheduleJSONSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('constant'),
    temperature: z.number().finite(),
  }),
  z.object({
    kind: z.literal('piecewise'),
    points: z
      .array(
        z.object({
          atHours: z.number().finite().nonnegative(),
          temperature: z.number().finite(),
        })
      )
      .min(1, 'at least one point is required'),
    interpolation: z.enum(['step', 'linear']).default('linear'),
    repeatEveryHours: z.number().finite().positive().optional(),
  }),
]);

export type AmbientScheduleJSON = z.input<typeof AmbientScheduleJSONSchema>;

// ============================================================================
// IMPLEMENTATIONS
// ============================================================================

export class ConstantAmbient implements AmbientSchedule {
  constructor(readonly temperature: number) {}

  temperatureAt(_timeElapsed: number): number {
    return this.temperature;
  }

  toJSON(): AmbientScheduleJSON {
    return { kind: 'constant', temperature: this.temperature };
  }
}

export class PiecewiseAmbient implements AmbientSchedule {
  private readonly points: TemperaturePoint[];

  /**
   * @throws InvalidConfigurationError on an empty profile or a bad repeat period
   */
  constructor(
    points: readonly TemperaturePoint[],
    readonly interpolation: Interpolation = 'linear',
    readonly repeatEveryHours?: number
  ) {
    if (points.length === 0) {
      throw new InvalidConfigurationError('ambient.points', 'at least one point is required');
    }
    if (repeatEveryHours !== undefined && !(repeatEveryHours > 0 && Number.isFinite(repeatEveryHours))) {
      throw new InvalidConfigurationError('ambient.repeatEveryHours', 'must be a positive number of hours');
    }
    this.points = [...points].sort((a, b) => a.atHours - b.atHours);
  }

  temperatureAt(timeElapsed: number): number {
    const t =
      this.repeatEveryHours === undefined ? timeElapsed : timeElapsed % this.repeatEveryHours;

    const first = this.points[0];
    const last = this.points[this.points.length - 1];
    if (!first || !last) {
      throw new InvalidConfigurationError('ambient.points', 'at least one point is required');
    }
    if (t <= first.atHours) return first.temperature;
    if (t >= last.atHours) return last.temperature;

    for (let i = 1; i < this.points.length; i++) {
      const right = this.points[i];
      const left = this.points[i - 1];
      if (!right || !left || t >= right.atHours) continue;

      if (this.interpolation === 'step') return left.temperature;
      const span = right.atHours - left.atHours;
      const fraction = span > 0 ? (t - left.atHours) / span : 0;
      return left.temperature + fraction * (right.temperature - left.temperature);
    }
    return last.temperature;
  }

  toJSON(): AmbientScheduleJSON {
    return {
      kind: 'piecewise',
      points: this.points.map((p) => ({ ...p })),
      interpolation: this.interpolation,
      ...(this.repeatEveryHours !== undefined ? { repeatEveryHours: this.repeatEveryHours } : {}),
    };
  }
}

/**
 * Build a schedule from its JSON form.
 *
 * @throws InvalidConfigurationError
 */
export function ambientFromJSON(json: unknown): ConstantAmbient | PiecewiseAmbient {
  const result = AmbientScheduleJSONSchema.safeParse(json);
  if (!result.success) {
    throw InvalidConfigurationError.fromZodError('ambient', result.error);
  }
  const schedule = result.data;
  if (schedule.kind === 'constant') {
    return new ConstantAmbient(schedule.temperature);
  }
  return new PiecewiseAmbient(schedule.points, schedule.interpolation, schedule.repeatEveryHours);
}
