import type { NoiseSource } from './noise-source.js';
import { InvalidConfigurationError } from '../errors.js';

const MODULUS = 2147483647; // 2^31 - 1
const MULTIPLIER = 48271;

/**
 * Persistable position of a seeded stream.
 */
export interface NoiseSourceState {
  seed: number;
  draws: number;
}

/**
 * Park–Miller minimal standard generator.
 * Same seed, same sequence; `draws` counts samples so a stream can be
 * restored to the exact position it was saved at.
 */
export class SeededNoiseSource implements NoiseSource {
  readonly seed: number;
  private current: number;
  private drawCount = 0;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new InvalidConfigurationError('noise.seed', `seed must be an integer, got ${seed}`);
    }
    this.seed = seed;
    this.current = SeededNoiseSource.normalizeSeed(seed);
  }

  /**
   * Rebuild a stream and fast-forward it past the draws already consumed.
   */
  static restore(state: NoiseSourceState): SeededNoiseSource {
    if (!Number.isSafeInteger(state.draws) || state.draws < 0) {
      throw new InvalidConfigurationError('noise.draws', `draw count must be a non-negative integer`);
    }
    const source = new SeededNoiseSource(state.seed);
    for (let i = 0; i < state.draws; i++) {
      source.next();
    }
    return source;
  }

  /** Number of samples drawn so far */
  get draws(): number {
    return this.drawCount;
  }

  sample(magnitude: number): number {
    const unit = this.next();
    const bound = Math.abs(magnitude);
    if (bound === 0 || !Number.isFinite(bound)) return 0;
    return (2 * unit - 1) * bound;
  }

  getState(): NoiseSourceState {
    return { seed: this.seed, draws: this.drawCount };
  }

  /**
   * Advance one step; returns a value in (0, 1).
   */
  private next(): number {
    this.current = (this.current * MULTIPLIER) % MODULUS;
    this.drawCount++;
    return this.current / MODULUS;
  }

  /**
   * Map any integer onto the generator's valid state range [1, 2^31 - 2].
   */
  private static normalizeSeed(seed: number): number {
    const reduced = seed % MODULUS;
    const positive = reduced < 0 ? reduced + MODULUS : reduced;
    return positive === 0 ? 1 : positive;
  }
}
