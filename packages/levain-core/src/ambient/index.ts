export {
  ConstantAmbient,
  PiecewiseAmbient,
  AmbientScheduleJSONSchema,
  ambientFromJSON,
} from './ambient-schedule.js';
export type {
  AmbientSchedule,
  AmbientScheduleJSON,
  Interpolation,
  TemperaturePoint,
} from './ambient-schedule.js';
