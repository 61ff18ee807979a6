import { describe, it, expect } from 'vitest';
import {
  createStarterState,
  withStarterState,
  parseStarterState,
  toStarterStateJSON,
  fromStarterStateJSON,
  findInvariantViolation,
} from './starter-state.js';
import { InvalidConfigurationError } from '../errors.js';

const base = {
  hydration: 1,
  temperature: 24,
  yeastPopulation: 5,
  bacteriaPopulation: 5,
  nutrientLevel: 40,
};

describe('StarterState', () => {
  describe('createStarterState', () => {
    it('should default time counters, gas and gluten to zero', () => {
      const state = createStarterState(base);

      expect(state.timeElapsed).toBe(0);
      expect(state.gasVolume).toBe(0);
      expect(state.glutenStrength).toBe(0);
      expect(state.timeSinceLastFeeding).toBe(0);
    });

    it('should clamp bounded fields into their ranges', () => {
      const state = createStarterState({
        ...base,
        hydration: 3,
        temperature: -5,
        glutenStrength: 1.4,
      });

      expect(state.hydration).toBe(2);
      expect(state.temperature).toBe(0);
      expect(state.glutenStrength).toBe(1);
    });

    it('should floor negative and NaN amounts to zero', () => {
      const state = createStarterState({
        ...base,
        yeastPopulation: -1,
        bacteriaPopulation: Number.NaN,
        gasVolume: -0.5,
        timeSinceLastFeeding: -3,
      });

      expect(state.yeastPopulation).toBe(0);
      expect(state.bacteriaPopulation).toBe(0);
      expect(state.gasVolume).toBe(0);
      expect(state.timeSinceLastFeeding).toBe(0);
    });

    it('should saturate +Infinity at the upper bound of closed ranges', () => {
      const state = createStarterState({
        ...base,
        hydration: Number.POSITIVE_INFINITY,
        glutenStrength: Number.POSITIVE_INFINITY,
      });

      expect(state.hydration).toBe(2);
      expect(state.glutenStrength).toBe(1);
    });

    it('should never produce NaN hydration', () => {
      const state = createStarterState({ ...base, hydration: Number.NaN });
      expect(state.hydration).toBe(0);
    });

    it('should return a frozen object', () => {
      expect(Object.isFrozen(createStarterState(base))).toBe(true);
    });
  });

  describe('withStarterState', () => {
    it('should replace fields and re-clamp without touching the original', () => {
      const state = createStarterState(base);
      const next = withStarterState(state, { nutrientLevel: -10, hydration: 1.5 });

      expect(next.nutrientLevel).toBe(0);
      expect(next.hydration).toBe(1.5);
      expect(state.nutrientLevel).toBe(40);
    });
  });

  describe('parseStarterState', () => {
    it('should accept valid values and fill defaults', () => {
      const state = parseStarterState(base);
      expect(state).toEqual(createStarterState(base));
    });

    it('should reject out-of-range hydration instead of clamping', () => {
      expect(() => parseStarterState({ ...base, hydration: 2.5 })).toThrow(
        InvalidConfigurationError
      );

      try {
        parseStarterState({ ...base, hydration: 2.5 });
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidConfigurationError);
        if (error instanceof InvalidConfigurationError) {
          expect(error.field).toBe('initialState.hydration');
        }
      }
    });

    it('should reject non-finite populations', () => {
      expect(() =>
        parseStarterState({ ...base, yeastPopulation: Number.POSITIVE_INFINITY })
      ).toThrow(InvalidConfigurationError);
    });

    it('should reject a missing required field', () => {
      const partial = {
        hydration: 1,
        temperature: 24,
        yeastPopulation: 5,
        bacteriaPopulation: 5,
      };
      expect(() => parseStarterState(partial)).toThrow(InvalidConfigurationError);
    });
  });

  describe('JSON serialization', () => {
    it('should expose exactly the state fields', () => {
      const json = toStarterStateJSON(createStarterState(base));

      expect(Object.keys(json).sort()).toEqual([
        'bacteriaPopulation',
        'gasVolume',
        'glutenStrength',
        'hydration',
        'nutrientLevel',
        'saltLevel',
        'temperature',
        'timeElapsed',
        'timeSinceLastFeeding',
        'yeastPopulation',
      ]);
    });

    it('should restore an identical state', () => {
      const state = createStarterState({ ...base, timeElapsed: 12.5, gasVolume: 3, glutenStrength: 0.4 });
      const restored = fromStarterStateJSON(JSON.parse(JSON.stringify(toStarterStateJSON(state))));

      expect(restored).toEqual(state);
    });
  });

  describe('findInvariantViolation', () => {
    it('should return null for a constructed state', () => {
      expect(findInvariantViolation(createStarterState(base))).toBeNull();
    });

    it('should name the first violated field', () => {
      const state = { ...createStarterState(base), glutenStrength: 1.2 };
      expect(findInvariantViolation(state)).toBe('glutenStrength');
    });

    it('should flag non-finite amounts', () => {
      const state = { ...createStarterState(base), gasVolume: Number.NaN };
      expect(findInvariantViolation(state)).toBe('gasVolume');
    });
  });
});
