/**
 * @levain/services
 *
 * Everything around the fermentation engine: logging, configuration,
 * snapshot persistence, run orchestration and the real-time driver.
 */

export * from './config/index.js';
export * from './logging/index.js';
export * from './persistence/index.js';
export * from './simulation/index.js';
export * from './runtime/index.js';
