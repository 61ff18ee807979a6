import { describe, it, expect } from 'vitest';
import { rk4Step, eulerStep } from './integrator.js';

const keys = ['y'] as const;
const decay = (point: { y: number }) => ({ y: -point.y });

describe('integrator', () => {
  it('should match exponential decay to fourth order with rk4', () => {
    const next = rk4Step(keys, { y: 1 }, 0.1, decay);
    expect(next.y).toBeCloseTo(Math.exp(-0.1), 6);
  });

  it('should take a single forward slope with euler', () => {
    const next = eulerStep(keys, { y: 1 }, 0.1, decay);
    expect(next.y).toBeCloseTo(0.9, 12);
  });

  it('should project every stage before evaluating the derivative', () => {
    const seen: number[] = [];
    rk4Step(
      keys,
      { y: 1 },
      1,
      (point) => {
        seen.push(point.y);
        return { y: -10 };
      },
      (point) => ({ y: Math.max(0, point.y) })
    );

    expect(seen).toEqual([1, 0, 0, 0]);
  });
});
