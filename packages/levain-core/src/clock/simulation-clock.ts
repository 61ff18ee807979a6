/**
 * Simulation Clock
 *
 * Owns the current StarterState and is the only thing that replaces it.
 * Each tick while running:
 *
 *   scheduler.maybeApplyFeeding → model.step → swap → observers
 *
 * A tick computes into locals first; the swap happens only once every
 * substep has succeeded. A diverged tick leaves the previous snapshot current.
 */

import type { AmbientSchedule } from '../ambient/ambient-schedule.js';
import { InvalidConfigurationError, NumericDivergenceError } from '../errors.js';
import { applyFold } from '../interventions/fold.js';
import { applySalt } from '../interventions/salt.js';
import type { FermentationModel } from '../model/fermentation-model.js';
import { applyFeeding, maybeApplyFeeding } from '../scheduler/feeding-scheduler.js';
import type { FeedingPolicy } from '../types/feeding-policy.js';
import { validateFeedingPolicy } from '../types/feeding-policy.js';
import type { StarterState } from '../types/starter-state.js';
import { findInvariantViolation } from '../types/starter-state.js';
import type { ClockStatus } from './clock-status.js';
import { ClockStateError, isValidClockTransition } from './clock-status.js';
import type {
  InterventionKind,
  RunSummary,
  SimulationObserver,
  TickOutcome,
} from './types.js';

// ============================================================================
// CONFIG
// ============================================================================

export interface SimulationClockConfig {
  initialState: StarterState;
  model: FermentationModel;
  policy: FeedingPolicy;
  ambient: AmbientSchedule;
  /** Simulated hours per tick at time scale 1 */
  stepSize: number;
  /** Multiplier on stepSize. Default 1. */
  timeScale?: number;
  /** Largest dt integrated in one go; longer ticks are split */
  maxSubstep?: number;
}

/**
 * Float slack for runFor so 1.0 / 0.1 does not become 11 ticks.
 */
const TICK_COUNT_EPSILON = 1e-9;

function requirePositive(field: string, value: number): number {
  if (!(Number.isFinite(value) && value > 0)) {
    throw new InvalidConfigurationError(field, `must be a positive finite number, got ${value}`);
  }
  return value;
}

// ============================================================================
// CLOCK
// ============================================================================

export class SimulationClock {
  readonly model: FermentationModel;
  readonly ambient: AmbientSchedule;
  readonly stepSize: number;
  readonly maxSubstep: number | undefined;

  private current: StarterState;
  private currentStatus: ClockStatus = 'idle';
  private currentPolicy: FeedingPolicy;
  private currentTimeScale: number;
  private tickCount = 0;
  private readonly observers = new Set<SimulationObserver>();

  /**
   * @throws InvalidConfigurationError on a bad step size, time scale,
   *         substep bound, feeding policy or initial state
   */
  constructor(config: SimulationClockConfig) {
    this.stepSize = requirePositive('stepSize', config.stepSize);
    this.currentTimeScale = requirePositive('timeScale', config.timeScale ?? 1);
    this.maxSubstep =
      config.maxSubstep === undefined ? undefined : requirePositive('maxSubstep', config.maxSubstep);
    this.currentPolicy = validateFeedingPolicy(config.policy);

    const violation = findInvariantViolation(config.initialState);
    if (violation !== null) {
      throw new InvalidConfigurationError(
        `initialState.${violation}`,
        `value ${config.initialState[violation]} is out of range`
      );
    }

    this.current = config.initialState;
    this.model = config.model;
    this.ambient = config.ambient;
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  get state(): StarterState {
    return this.current;
  }

  get status(): ClockStatus {
    return this.currentStatus;
  }

  get policy(): FeedingPolicy {
    return this.currentPolicy;
  }

  get timeScale(): number {
    return this.currentTimeScale;
  }

  /** Ticks that published a new snapshot */
  get ticks(): number {
    return this.tickCount;
  }

  /** Simulated hours one tick advances at the current time scale */
  get tickDuration(): number {
    return this.stepSize * this.currentTimeScale;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  start(): void {
    if (this.currentStatus !== 'idle') {
      throw new ClockStateError(this.currentStatus, 'start');
    }
    this.transition('running', 'start');
  }

  pause(): void {
    this.transition('paused', 'pause');
  }

  resume(): void {
    if (this.currentStatus !== 'paused') {
      throw new ClockStateError(this.currentStatus, 'resume');
    }
    this.transition('running', 'resume');
  }

  stop(): void {
    this.transition('stopped', 'stop');
  }

  // --------------------------------------------------------------------------
  // Settings
  // --------------------------------------------------------------------------

  setTimeScale(timeScale: number): void {
    this.assertNotStopped('change time scale');
    this.currentTimeScale = requirePositive('timeScale', timeScale);
  }

  setFeedingPolicy(policy: FeedingPolicy): void {
    this.assertNotStopped('change feeding policy');
    this.currentPolicy = validateFeedingPolicy(policy);
  }

  subscribe(observer: SimulationObserver): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  // --------------------------------------------------------------------------
  // Ticking
  // --------------------------------------------------------------------------

  /**
   * Advance one tick.
   *
   * @throws ClockStateError after stop
   */
  tick(): TickOutcome {
    if (this.currentStatus === 'stopped') {
      throw new ClockStateError('stopped', 'tick');
    }

    const dt = this.tickDuration;
    const substeps =
      this.maxSubstep !== undefined && dt > this.maxSubstep ? Math.ceil(dt / this.maxSubstep) : 1;

    if (this.currentStatus !== 'running') {
      return { status: 'skipped', state: this.current, tick: this.tickCount, dt, substeps: 0, feedings: 0 };
    }

    const h = dt / substeps;
    const start = this.current;
    let next = start;
    let feedings = 0;
    let ambientTemperature = this.ambient.temperatureAt(start.timeElapsed);

    try {
      for (let i = 0; i < substeps; i++) {
        ambientTemperature = this.ambient.temperatureAt(next.timeElapsed);
        const fed = maybeApplyFeeding(next, this.currentPolicy);
        if (fed !== next) feedings++;
        next = this.model.step(fed, h, ambientTemperature);
      }
    } catch (error) {
      if (!(error instanceof NumericDivergenceError)) throw error;
      for (const observer of [...this.observers]) {
        observer.onDivergence?.(error, start);
      }
      return { status: 'diverged', state: start, tick: this.tickCount, dt, substeps, feedings: 0, error };
    }

    this.current = next;
    this.tickCount++;

    const info = { tick: this.tickCount, dt, substeps, feedings, ambientTemperature };
    for (const observer of [...this.observers]) {
      observer.onTick?.(next, info);
    }
    return { status: 'advanced', state: next, tick: this.tickCount, dt, substeps, feedings };
  }

  /**
   * Run `count` ticks and summarize them.
   */
  advance(count: number): RunSummary {
    if (!(Number.isSafeInteger(count) && count >= 0)) {
      throw new InvalidConfigurationError('ticks', `must be a non-negative integer, got ${count}`);
    }

    const summary: RunSummary = { ticks: 0, advanced: 0, diverged: 0, feedings: 0, state: this.current };
    for (let i = 0; i < count; i++) {
      const outcome = this.tick();
      summary.ticks++;
      summary.feedings += outcome.feedings;
      if (outcome.status === 'advanced') summary.advanced++;
      if (outcome.status === 'diverged') summary.diverged++;
    }
    summary.state = this.current;
    return summary;
  }

  /**
   * Ticks needed to cover `hours` of simulated time at the current time scale.
   */
  ticksFor(hours: number): number {
    requirePositive('hours', hours);
    return Math.ceil(hours / this.tickDuration - TICK_COUNT_EPSILON);
  }

  /**
   * Run enough ticks to cover `hours` of simulated time at the current time scale.
   */
  runFor(hours: number): RunSummary {
    return this.advance(this.ticksFor(hours));
  }

  // --------------------------------------------------------------------------
  // Interventions
  // --------------------------------------------------------------------------

  /**
   * Feed immediately with the active policy, independent of the schedule.
   */
  feedNow(): StarterState {
    return this.intervene('feed', (state) => applyFeeding(state, this.currentPolicy));
  }

  /**
   * Stretch-and-fold the starter.
   */
  fold(): StarterState {
    return this.intervene('fold', (state) => applyFold(state, this.model.parameters.fold));
  }

  /**
   * Add one dose of salt.
   */
  addSalt(): StarterState {
    return this.intervene('salt', (state) => applySalt(state, this.model.parameters.salt));
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private intervene(kind: InterventionKind, apply: (state: StarterState) => StarterState): StarterState {
    if (this.currentStatus !== 'idle' && this.currentStatus !== 'running') {
      throw new ClockStateError(this.currentStatus, kind);
    }
    const next = apply(this.current);
    this.current = next;
    for (const observer of [...this.observers]) {
      observer.onIntervention?.(kind, next);
    }
    return next;
  }

  private transition(to: ClockStatus, action: string): void {
    const from = this.currentStatus;
    if (!isValidClockTransition(from, to)) {
      throw new ClockStateError(from, action);
    }
    this.currentStatus = to;
    for (const observer of [...this.observers]) {
      observer.onStatusChange?.(from, to);
    }
  }

  private assertNotStopped(action: string): void {
    if (this.currentStatus === 'stopped') {
      throw new ClockStateError('stopped', action);
    }
  }
}
