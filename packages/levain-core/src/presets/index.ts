export {
  PRESET_NAMES,
  STARTER_PRESETS,
  isPresetName,
  getPreset,
  createPresetState,
} from './starter-presets.js';
export type { PresetName, StarterPreset } from './starter-presets.js';
