export type { NoiseSource } from './noise-source.js';
export { SeededNoiseSource } from './seeded-noise-source.js';
export type { NoiseSourceState } from './seeded-noise-source.js';
