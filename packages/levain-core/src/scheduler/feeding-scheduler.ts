/**
 * Feeding Scheduler
 *
 * Decides whether a feeding is due and applies it. Returns replacement
 * states only; the clock owns the swap.
 *
 * Neglect is not special-cased: if nothing is due, nutrient keeps draining
 * through the model and the starter starves.
 */

import type { FeedingPolicy } from '../types/feeding-policy.js';
import type { StarterState } from '../types/starter-state.js';
import { withStarterState } from '../types/starter-state.js';

/**
 * Slack (hours) on the due check. `timeSinceLastFeeding` is a running float sum,
 * so 120 steps of 0.1 h land just below 12.
 */
export const FEEDING_EPSILON = 1e-9;

/**
 * True once the time since the last feeding has reached the interval.
 * An infinite interval is never due.
 */
export function isFeedingDue(state: StarterState, policy: FeedingPolicy): boolean {
  return state.timeSinceLastFeeding >= policy.intervalHours - FEEDING_EPSILON;
}

/**
 * Hydration after mixing `retainedMass` of starter at its current hydration with
 * fresh flour and water, as a mass-weighted average of the two ratios.
 */
export function blendHydration(currentHydration: number, policy: FeedingPolicy): number {
  const feedMass = policy.flourMass + policy.waterMass;
  const totalMass = policy.retainedMass + feedMass;
  if (totalMass <= 0) return currentHydration;

  const feedHydration = policy.flourMass > 0 ? policy.waterMass / policy.flourMass : currentHydration;
  return (policy.retainedMass * currentHydration + feedMass * feedHydration) / totalMass;
}

/**
 * Salt after mixing: the retained starter carries its salt, fresh flour and water none.
 */
export function dilutedSalt(currentSalt: number, policy: FeedingPolicy): number {
  const totalMass = policy.retainedMass + policy.flourMass + policy.waterMass;
  if (totalMass <= 0) return currentSalt;
  return (currentSalt * policy.retainedMass) / totalMass;
}

/**
 * Apply one feeding regardless of the schedule:
 * add nutrient (uncapped), re-blend hydration, dilute salt, reset the feeding counter.
 */
export function applyFeeding(state: StarterState, policy: FeedingPolicy): StarterState {
  return withStarterState(state, {
    nutrientLevel: state.nutrientLevel + policy.nutrientAmount,
    hydration: blendHydration(state.hydration, policy),
    saltLevel: dilutedSalt(state.saltLevel, policy),
    timeSinceLastFeeding: 0,
  });
}

/**
 * Feed if due, otherwise return the very same state object.
 */
export function maybeApplyFeeding(state: StarterState, policy: FeedingPolicy): StarterState {
  return isFeedingDue(state, policy) ? applyFeeding(state, policy) : state;
}
