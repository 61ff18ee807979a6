import type { ModelParameters } from '../types/model-parameters.js';
import type { StarterState } from '../types/starter-state.js';
import { withStarterState } from '../types/starter-state.js';

/**
 * Stretch-and-fold: closes part of the gap to full gluten strength and knocks
 * out part of the trapped gas.
 */
export function applyFold(state: StarterState, fold: ModelParameters['fold']): StarterState {
  return withStarterState(state, {
    glutenStrength: state.glutenStrength + fold.strengthGain * (1 - state.glutenStrength),
    gasVolume: state.gasVolume * (1 - fold.degasFraction),
  });
}
