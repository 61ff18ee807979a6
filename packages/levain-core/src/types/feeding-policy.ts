/**
 * Feeding Policy
 *
 * How often the starter is fed and what one feeding adds.
 * A feeding keeps `retainedMass` of the old starter and mixes in fresh flour and water.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';

export interface FeedingPolicy {
  /** Hours between feedings. `Infinity` disables scheduled feeding. */
  intervalHours: number;
  /** Fresh flour per feeding (g) */
  flourMass: number;
  /** Fresh water per feeding (g) */
  waterMass: number;
  /** Old starter kept at each feeding (g) */
  retainedMass: number;
  /** Nutrient added per feeding (relative units), > 0 */
  nutrientAmount: number;
}

/**
 * 1:1:1 feeding twice a day.
 */
export const DEFAULT_FEEDING_POLICY: Readonly<FeedingPolicy> = Object.freeze({
  intervalHours: 12,
  flourMass: 50,
  waterMass: 50,
  retainedMass: 50,
  nutrientAmount: 30,
});

export const FeedingPolicySchema = z.object({
  intervalHours: z
    .number()
    .nonnegative('interval must not be negative')
    .or(z.literal(Number.POSITIVE_INFINITY)),
  flourMass: z.number().finite().positive('flour mass must be positive'),
  waterMass: z.number().finite().nonnegative(),
  retainedMass: z.number().finite().nonnegative(),
  nutrientAmount: z.number().finite().positive('a feeding must add nutrient'),
});

/**
 * Validate a policy before a run starts.
 *
 * @throws InvalidConfigurationError
 */
export function validateFeedingPolicy(policy: FeedingPolicy): FeedingPolicy {
  const result = FeedingPolicySchema.safeParse(policy);
  if (!result.success) {
    throw InvalidConfigurationError.fromZodError('policy', result.error);
  }
  return result.data;
}

// ============================================================================
// JSON SERIALIZATION
// ============================================================================

/**
 * JSON has no Infinity; a policy without scheduled feeding stores `null`.
 */
export interface FeedingPolicyJSON {
  intervalHours: number | null;
  flourMass: number;
  waterMass: number;
  retainedMass: number;
  nutrientAmount: number;
}

export const FeedingPolicyJSONSchema = FeedingPolicySchema.extend({
  intervalHours: z.number().finite().nonnegative().nullable(),
});

export function toFeedingPolicyJSON(policy: FeedingPolicy): FeedingPolicyJSON {
  return {
    ...policy,
    intervalHours: Number.isFinite(policy.intervalHours) ? policy.intervalHours : null,
  };
}

export function fromFeedingPolicyJSON(json: FeedingPolicyJSON): FeedingPolicy {
  return validateFeedingPolicy({
    ...json,
    intervalHours: json.intervalHours ?? Number.POSITIVE_INFINITY,
  });
}
