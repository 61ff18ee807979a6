import { describe, it, expect } from 'vitest';
import { DEFAULT_MODEL_PARAMETERS, resolveModelParameters } from './model-parameters.js';
import { InvalidConfigurationError } from '../errors.js';

describe('resolveModelParameters', () => {
  it('should return the defaults without overrides', () => {
    expect(resolveModelParameters()).toEqual(DEFAULT_MODEL_PARAMETERS);
  });

  it('should merge nested overrides and keep sibling defaults', () => {
    const params = resolveModelParameters({ yeast: { growthRate: 0.5 }, noiseMagnitude: 0 });

    expect(params.yeast.growthRate).toBe(0.5);
    expect(params.yeast.optimalTemperature).toBe(27);
    expect(params.bacteria).toEqual(DEFAULT_MODEL_PARAMETERS.bacteria);
    expect(params.noiseMagnitude).toBe(0);
  });

  it('should not mutate the defaults', () => {
    resolveModelParameters({ gas: { releaseRate: 2 } });
    expect(DEFAULT_MODEL_PARAMETERS.gas.releaseRate).toBe(0.1);
  });

  it('should freeze every section of the defaults', () => {
    expect(Object.isFrozen(DEFAULT_MODEL_PARAMETERS)).toBe(true);
    for (const section of Object.values(DEFAULT_MODEL_PARAMETERS)) {
      if (typeof section === 'object') {
        expect(Object.isFrozen(section)).toBe(true);
      }
    }
    expect(() => {
      DEFAULT_MODEL_PARAMETERS.yeast.growthRate = 9;
    }).toThrow(TypeError);
    expect(DEFAULT_MODEL_PARAMETERS.yeast.growthRate).toBe(0.35);
  });

  it('should merge salt overrides', () => {
    expect(resolveModelParameters({ salt: { dose: 0.01 } }).salt).toEqual({
      dose: 0.01,
      glutenBoost: 0.2,
      growthDrag: 0.25,
    });
  });

  it('should report the offending path', () => {
    try {
      resolveModelParameters({ yeast: { growthRate: -1 } });
      expect.unreachable('negative growth rate was accepted');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.field).toBe('parameters.yeast.growthRate');
      }
    }
  });

  it('should reject a noise magnitude of 1 or more', () => {
    expect(() => resolveModelParameters({ noiseMagnitude: 1 })).toThrow(InvalidConfigurationError);
  });

  it('should reject a zero temperature width', () => {
    expect(() => resolveModelParameters({ bacteria: { temperatureWidth: 0 } })).toThrow(
      InvalidConfigurationError
    );
  });
});
