/**
 * Source of bounded perturbations consumed by the fermentation model.
 */
export interface NoiseSource {
  /**
   * Draw one perturbation in [-magnitude, +magnitude].
   * Advances the underlying stream by exactly one draw.
   */
  sample(magnitude: number): number;
}
