import type { NumericDivergenceError } from '../errors.js';
import type { StarterState } from '../types/starter-state.js';
import type { ClockStatus } from './clock-status.js';

export type InterventionKind = 'feed' | 'fold' | 'salt';

/**
 * What one tick did.
 * - `advanced`: a new snapshot was published
 * - `skipped`: the clock is idle or paused, nothing changed
 * - `diverged`: the step was rejected and the previous state retained
 */
export type TickStatus = 'advanced' | 'skipped' | 'diverged';

export interface TickOutcome {
  status: TickStatus;
  /** Current snapshot after the tick */
  state: StarterState;
  /** Ticks published so far */
  tick: number;
  /** Total hours requested for this tick (step size x time scale) */
  dt: number;
  /** Substeps the tick was split into */
  substeps: number;
  /** Scheduled feedings applied during this tick */
  feedings: number;
  error?: NumericDivergenceError;
}

export interface TickInfo {
  tick: number;
  dt: number;
  substeps: number;
  feedings: number;
  ambientTemperature: number;
}

/**
 * Receives read-only snapshots. All callbacks run after the state swap,
 * so an observer never sees a partially updated tick.
 */
export interface SimulationObserver {
  onTick?(snapshot: StarterState, info: TickInfo): void;
  onDivergence?(error: NumericDivergenceError, retained: StarterState): void;
  onStatusChange?(from: ClockStatus, to: ClockStatus): void;
  onIntervention?(kind: InterventionKind, snapshot: StarterState): void;
}

export interface RunSummary {
  ticks: number;
  advanced: number;
  diverged: number;
  feedings: number;
  state: StarterState;
}
