/**
 * Core Error Classes
 *
 * The fermentation model degrades rather than fails, so the taxonomy is narrow:
 * configuration problems are fatal at setup, numeric divergence is recoverable.
 */

import type { ZodError } from 'zod';

/**
 * Rejected setup input: step size, time scale, feeding policy, model parameters
 * or initial values of a run.
 */
export class InvalidConfigurationError extends Error {
  constructor(
    public readonly field: string,
    public readonly reason: string,
    cause?: unknown
  ) {
    super(`Invalid configuration for ${field}: ${reason}`);
    this.name = 'InvalidConfigurationError';
    this.cause = cause;
  }

  /**
   * Build from a failed zod parse, naming the first offending path.
   */
  static fromZodError(scope: string, error: ZodError): InvalidConfigurationError {
    const issue = error.issues[0];
    const path = issue && issue.path.length > 0 ? `${scope}.${issue.path.join('.')}` : scope;
    return new InvalidConfigurationError(path, issue?.message ?? 'invalid value', error);
  }
}

/**
 * A derivative or integrated value came out non-finite.
 * The step that produced it is rejected; the previous state stays current.
 */
export class NumericDivergenceError extends Error {
  constructor(
    public readonly field: string,
    public readonly value: number,
    public readonly timeElapsed: number
  ) {
    super(`Numeric divergence in ${field} (value ${value}) at t=${timeElapsed}h`);
    this.name = 'NumericDivergenceError';
  }
}
