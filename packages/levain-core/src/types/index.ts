export {
  HYDRATION_RANGE,
  TEMPERATURE_RANGE,
  GLUTEN_RANGE,
  StarterStateSchema,
  createStarterState,
  withStarterState,
  parseStarterState,
  toStarterStateJSON,
  fromStarterStateJSON,
  findInvariantViolation,
} from './starter-state.js';
export type { StarterState, StarterStateInput, StarterStateJSON } from './starter-state.js';

export {
  DEFAULT_FEEDING_POLICY,
  FeedingPolicySchema,
  FeedingPolicyJSONSchema,
  validateFeedingPolicy,
  toFeedingPolicyJSON,
  fromFeedingPolicyJSON,
} from './feeding-policy.js';
export type { FeedingPolicy, FeedingPolicyJSON } from './feeding-policy.js';

export {
  DEFAULT_MODEL_PARAMETERS,
  PopulationParametersSchema,
  ModelParametersSchema,
  ModelParameterOverridesSchema,
  resolveModelParameters,
} from './model-parameters.js';
export type {
  PopulationParameters,
  ModelParameters,
  ModelParameterOverrides,
} from './model-parameters.js';
