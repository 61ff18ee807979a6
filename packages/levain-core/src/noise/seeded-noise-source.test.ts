import { describe, it, expect } from 'vitest';
import { SeededNoiseSource } from './seeded-noise-source.js';
import { InvalidConfigurationError } from '../errors.js';

function drawMany(source: SeededNoiseSource, count: number, magnitude = 1): number[] {
  return Array.from({ length: count }, () => source.sample(magnitude));
}

describe('SeededNoiseSource', () => {
  it('should produce the minimal standard sequence', () => {
    const source = new SeededNoiseSource(1);

    // first state: 48271 / (2^31 - 1)
    expect(source.sample(1)).toBeCloseTo(2 * (48271 / 2147483647) - 1, 15);
  });

  it('should repeat the same sequence for the same seed', () => {
    expect(drawMany(new SeededNoiseSource(42), 100)).toEqual(drawMany(new SeededNoiseSource(42), 100));
  });

  it('should produce different sequences for different seeds', () => {
    expect(drawMany(new SeededNoiseSource(42), 10)).not.toEqual(drawMany(new SeededNoiseSource(43), 10));
  });

  it('should stay within [-magnitude, +magnitude]', () => {
    const samples = drawMany(new SeededNoiseSource(7), 5000, 0.3);

    for (const value of samples) {
      expect(value).toBeGreaterThanOrEqual(-0.3);
      expect(value).toBeLessThanOrEqual(0.3);
    }
  });

  it('should treat a negative magnitude by absolute value', () => {
    const a = new SeededNoiseSource(9);
    const b = new SeededNoiseSource(9);

    expect(a.sample(-0.5)).toBe(b.sample(0.5));
  });

  it('should return exactly zero for zero magnitude but still consume a draw', () => {
    const source = new SeededNoiseSource(3);

    expect(source.sample(0)).toBe(0);
    expect(source.draws).toBe(1);
  });

  it('should map seed 0 onto a valid generator state', () => {
    expect(drawMany(new SeededNoiseSource(0), 5)).toEqual(drawMany(new SeededNoiseSource(1), 5));
  });

  it('should accept negative seeds', () => {
    const samples = drawMany(new SeededNoiseSource(-12345), 20);
    expect(samples.every((value) => Number.isFinite(value))).toBe(true);
  });

  it('should reject non-integer seeds', () => {
    expect(() => new SeededNoiseSource(1.5)).toThrow(InvalidConfigurationError);
  });

  describe('restore', () => {
    it('should continue exactly where the saved stream left off', () => {
      const original = new SeededNoiseSource(2024);
      drawMany(original, 37);

      const restored = SeededNoiseSource.restore(original.getState());

      expect(restored.draws).toBe(37);
      expect(drawMany(restored, 10)).toEqual(drawMany(original, 10));
    });

    it('should reject a negative draw count', () => {
      expect(() => SeededNoiseSource.restore({ seed: 1, draws: -1 })).toThrow(
        InvalidConfigurationError
      );
    });
  });
});
