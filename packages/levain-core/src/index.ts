/**
 * @levain/core
 *
 * Sourdough starter fermentation engine: state, model, feeding schedule,
 * noise and the simulation clock.
 */

export * from './errors.js';
export * from './types/index.js';
export * from './noise/index.js';
export * from './model/index.js';
export * from './scheduler/index.js';
export * from './interventions/index.js';
export * from './ambient/index.js';
export * from './presets/index.js';
export * from './clock/index.js';
