export {
  FermentationModel,
  EVOLVING_FIELDS,
  carryingCapacity,
  saltResponse,
} from './fermentation-model.js';
export type {
  EvolvingField,
  IntegratorKind,
  FermentationRates,
  FermentationModelOptions,
} from './fermentation-model.js';
export { temperatureFactor, clampAmbientTemperature } from './temperature-response.js';
export { rk4Step, eulerStep } from './integrator.js';
export type { Vector, Derivative, StageProjection } from './integrator.js';
