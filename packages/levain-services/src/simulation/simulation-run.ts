/**
 * SimulationRun
 *
 * A clock together with the noise stream it draws from and the id it is
 * stored under. The noise source is kept here because the clock only sees
 * it through the model, and a snapshot needs its position.
 */

import {
  FermentationModel,
  SeededNoiseSource,
  SimulationClock,
  ambientFromJSON,
  createPresetState,
  fromFeedingPolicyJSON,
  parseStarterState,
  resolveModelParameters,
  toFeedingPolicyJSON,
  DEFAULT_FEEDING_POLICY,
  type StarterState,
} from '@levain/core';
import type { RunConfig } from '../config/run-config.js';
import { createSnapshot, type SimulationSnapshot, type SimulationSnapshotJSON } from '../persistence/snapshot.js';

export interface SimulationRunInit {
  id: string;
  clock: SimulationClock;
  noise: SeededNoiseSource;
  /** Simulated hours the run is meant to cover, when known */
  durationHours?: number;
}

export class SimulationRun {
  readonly id: string;
  readonly clock: SimulationClock;
  readonly noise: SeededNoiseSource;
  readonly durationHours: number | undefined;

  constructor(init: SimulationRunInit) {
    this.id = init.id;
    this.clock = init.clock;
    this.noise = init.noise;
    this.durationHours = init.durationHours;
  }

  get state(): StarterState {
    return this.clock.state;
  }

  snapshot(savedAt?: Date): SimulationSnapshotJSON {
    return createSnapshot({ runId: this.id, clock: this.clock, noise: this.noise }, savedAt);
  }

  /**
   * Build a fresh run from a validated configuration.
   *
   * @throws InvalidConfigurationError
   */
  static fromConfig(id: string, config: RunConfig, seed: number): SimulationRun {
    const preset = createPresetState(config.preset);
    const initialState = parseStarterState({ ...preset, ...config.initialState });

    const policy = fromFeedingPolicyJSON({
      ...toFeedingPolicyJSON(DEFAULT_FEEDING_POLICY),
      ...config.policy,
    });

    const noise = new SeededNoiseSource(seed);
    const model = new FermentationModel({
      noise,
      parameters: resolveModelParameters(config.parameters),
      integrator: config.integrator,
    });

    const clock = new SimulationClock({
      initialState,
      model,
      policy,
      ambient: ambientFromJSON(config.ambient),
      stepSize: config.clock.stepSizeHours,
      timeScale: config.clock.timeScale,
      maxSubstep: config.clock.maxSubstepHours,
    });

    return new SimulationRun({ id, clock, noise, durationHours: config.durationHours });
  }

  /**
   * Rebuild a run at the exact position it was saved, noise stream included.
   */
  static fromSnapshot(snapshot: SimulationSnapshot): SimulationRun {
    const noise = SeededNoiseSource.restore(snapshot.noise);
    const model = new FermentationModel({
      noise,
      parameters: snapshot.run.parameters,
      integrator: snapshot.run.integrator,
    });

    const clock = new SimulationClock({
      initialState: parseStarterState(snapshot.state),
      model,
      policy: fromFeedingPolicyJSON(snapshot.policy),
      ambient: ambientFromJSON(snapshot.run.ambient),
      stepSize: snapshot.run.stepSizeHours,
      timeScale: snapshot.run.timeScale,
      maxSubstep: snapshot.run.maxSubstepHours,
    });

    return new SimulationRun({ id: snapshot.runId, clock, noise });
  }
}
