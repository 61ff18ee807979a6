import { describe, it, expect } from 'vitest';
import {
  isFeedingDue,
  blendHydration,
  dilutedSalt,
  applyFeeding,
  maybeApplyFeeding,
} from './feeding-scheduler.js';
import { createStarterState } from '../types/starter-state.js';
import type { FeedingPolicy } from '../types/feeding-policy.js';

const policy: FeedingPolicy = {
  intervalHours: 12,
  flourMass: 50,
  waterMass: 50,
  retainedMass: 100,
  nutrientAmount: 25,
};

function starterAt(timeSinceLastFeeding: number, hydration = 0.5) {
  return createStarterState({
    hydration,
    temperature: 24,
    yeastPopulation: 20,
    bacteriaPopulation: 30,
    nutrientLevel: 10,
    timeSinceLastFeeding,
  });
}

describe('FeedingScheduler', () => {
  describe('isFeedingDue', () => {
    it('should be due exactly at the interval', () => {
      expect(isFeedingDue(starterAt(12), policy)).toBe(true);
    });

    it('should be due when float accumulation lands just short of the interval', () => {
      let elapsed = 0;
      for (let i = 0; i < 120; i++) elapsed += 0.1;

      expect(elapsed).toBeLessThan(12);
      expect(isFeedingDue(starterAt(elapsed), policy)).toBe(true);
    });

    it('should not be due just before the interval', () => {
      expect(isFeedingDue(starterAt(11.999), policy)).toBe(false);
    });

    it('should never be due with an infinite interval', () => {
      const never = { ...policy, intervalHours: Number.POSITIVE_INFINITY };
      expect(isFeedingDue(starterAt(1e9), never)).toBe(false);
    });

    it('should always be due with a zero interval', () => {
      expect(isFeedingDue(starterAt(0), { ...policy, intervalHours: 0 })).toBe(true);
    });
  });

  describe('blendHydration', () => {
    it('should mass-weight retained starter and fresh feed', () => {
      // (100 * 0.5 + 100 * 1.0) / 200
      expect(blendHydration(0.5, policy)).toBe(0.75);
    });

    it('should reach the feed hydration when nothing is retained', () => {
      expect(blendHydration(1.8, { ...policy, retainedMass: 0, waterMass: 40 })).toBeCloseTo(0.8, 12);
    });
  });

  describe('dilutedSalt', () => {
    it('should scale salt by the retained share of the mix', () => {
      // 0.02 * 100 / 200
      expect(dilutedSalt(0.02, policy)).toBe(0.01);
    });

    it('should wash salt out when nothing is retained', () => {
      expect(dilutedSalt(0.02, { ...policy, retainedMass: 0 })).toBe(0);
    });
  });

  describe('applyFeeding', () => {
    it('should add nutrient, re-blend hydration and reset the counter', () => {
      const fed = applyFeeding(starterAt(12), policy);

      expect(fed.nutrientLevel).toBe(35);
      expect(fed.hydration).toBe(0.75);
      expect(fed.timeSinceLastFeeding).toBe(0);
    });

    it('should dilute salt', () => {
      const salted = createStarterState({ ...starterAt(12), saltLevel: 0.04 });
      expect(applyFeeding(salted, policy).saltLevel).toBe(0.02);
    });

    it('should leave populations and elapsed time alone', () => {
      const state = starterAt(12);
      const fed = applyFeeding(state, policy);

      expect(fed.yeastPopulation).toBe(20);
      expect(fed.bacteriaPopulation).toBe(30);
      expect(fed.timeElapsed).toBe(state.timeElapsed);
    });

    it('should not cap nutrient', () => {
      const state = createStarterState({ ...starterAt(12), nutrientLevel: 1e6 });
      expect(applyFeeding(state, policy).nutrientLevel).toBe(1e6 + 25);
    });

    it('should clamp the blended hydration', () => {
      const wet = { ...policy, retainedMass: 0, flourMass: 10, waterMass: 40 };
      expect(applyFeeding(starterAt(12), wet).hydration).toBe(2);
    });
  });

  describe('maybeApplyFeeding', () => {
    it('should return the same object when nothing is due', () => {
      const state = starterAt(3);
      expect(maybeApplyFeeding(state, policy)).toBe(state);
    });

    it('should feed when due', () => {
      const fed = maybeApplyFeeding(starterAt(12), policy);
      expect(fed.timeSinceLastFeeding).toBe(0);
      expect(fed.nutrientLevel).toBe(35);
    });
  });
});
