export { SimulationClock, type SimulationClockConfig } from './simulation-clock.js';
export {
  ClockStateError,
  VALID_CLOCK_TRANSITIONS,
  isValidClockTransition,
  isTerminalClockStatus,
  type ClockStatus,
} from './clock-status.js';
export type {
  InterventionKind,
  RunSummary,
  SimulationObserver,
  TickInfo,
  TickOutcome,
  TickStatus,
} from './types.js';
