/**
 * Numeric helpers shared by the state constructor and the model.
 */

/**
 * Clamp into [min, max]. NaN maps to `min` so a bad input never leaks NaN;
 * infinities saturate at the nearest bound.
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/**
 * Floor at zero. Non-finite values also map to zero.
 */
export function nonNegative(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return value;
}
