export { SimulationService } from './simulation-service.js';
export type { SimulationServiceDependencies } from './simulation-service.js';
export { SimulationRun } from './simulation-run.js';
export type { SimulationRunInit } from './simulation-run.js';
export { createLoggingObserver } from './logging-observer.js';
