import { describe, it, expect } from 'vitest';
import { PRESET_NAMES, getPreset, createPresetState, isPresetName } from './starter-presets.js';
import { findInvariantViolation } from '../types/starter-state.js';
import { InvalidConfigurationError } from '../errors.js';

describe('StarterPresets', () => {
  it('should list classic, stiff and liquid', () => {
    expect([...PRESET_NAMES]).toEqual(['classic', 'stiff', 'liquid']);
  });

  it.each(PRESET_NAMES)('should build a consistent %s starter', (name) => {
    const state = createPresetState(name);

    expect(findInvariantViolation(state)).toBeNull();
    expect(state.timeElapsed).toBe(0);
    expect(state.hydration).toBe(getPreset(name).initial.hydration);
  });

  it('should order presets by hydration', () => {
    const stiff = createPresetState('stiff').hydration;
    const classic = createPresetState('classic').hydration;
    const liquid = createPresetState('liquid').hydration;

    expect(stiff).toBeLessThan(classic);
    expect(classic).toBeLessThan(liquid);
  });

  it('should apply overrides on top of the preset', () => {
    const state = createPresetState('classic', { temperature: 30, nutrientLevel: 10 });

    expect(state.temperature).toBe(30);
    expect(state.nutrientLevel).toBe(10);
    expect(state.yeastPopulation).toBe(5);
  });

  it('should reject an unknown preset', () => {
    expect(isPresetName('rye')).toBe(false);
    expect(() => getPreset('rye')).toThrow(InvalidConfigurationError);
  });
});
