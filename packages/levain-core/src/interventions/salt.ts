import type { ModelParameters } from '../types/model-parameters.js';
import type { StarterState } from '../types/starter-state.js';
import { withStarterState } from '../types/starter-state.js';

/**
 * Work one dose of salt into the starter. The level saturates at SALT_RANGE.max.
 */
export function applySalt(state: StarterState, salt: ModelParameters['salt']): StarterState {
  return withStarterState(state, { saltLevel: state.saltLevel + salt.dose });
}
