/**
 * SimulationService
 *
 * Creates, saves and resumes simulation runs. Each run gets a nanoid and a
 * logging observer; persistence goes through an injected SnapshotStore.
 */

import { nanoid } from 'nanoid';
import { getSnapshotDir } from '../config/env.js';
import { parseRunConfig, type RunConfig, type RunConfigInput } from '../config/run-config.js';
import { createServiceLogger, log, simLog, type ServiceLogger } from '../logging/index.js';
import { FileSnapshotStore } from '../persistence/file-snapshot-store.js';
import type { SimulationSnapshotJSON } from '../persistence/snapshot.js';
import type { SnapshotStore } from '../persistence/snapshot-store.js';
import { createLoggingObserver } from './logging-observer.js';
import { SimulationRun } from './simulation-run.js';

const RUN_ID_LENGTH = 12;

/**
 * Dependencies for SimulationService
 * All dependencies are optional and will use defaults if not provided
 */
export interface SimulationServiceDependencies {
  /** Defaults to a FileSnapshotStore under LEVAIN_SNAPSHOT_DIR */
  store?: SnapshotStore;
  generateId?: () => string;
  /** Seed source for configs without one */
  generateSeed?: () => number;
}

function randomSeed(): number {
  return Math.floor(Math.random() * 2 ** 31);
}

export class SimulationService {
  private readonly store: SnapshotStore;
  private readonly generateId: () => string;
  private readonly generateSeed: () => number;
  private readonly logger: ServiceLogger;
  private readonly detachers = new Map<string, () => void>();

  constructor(dependencies: SimulationServiceDependencies = {}) {
    this.store = dependencies.store ?? new FileSnapshotStore(getSnapshotDir());
    this.generateId = dependencies.generateId ?? (() => nanoid(RUN_ID_LENGTH));
    this.generateSeed = dependencies.generateSeed ?? randomSeed;
    this.logger = createServiceLogger('SimulationService');
  }

  /**
   * Validate a configuration and build a run from it.
   *
   * @throws InvalidConfigurationError
   */
  createRun(input: RunConfig | RunConfigInput): SimulationRun {
    log.methodEntry(this.logger, 'createRun');

    try {
      const config = parseRunConfig(input);
      const seed = config.seed ?? this.generateSeed();
      const run = SimulationRun.fromConfig(this.generateId(), config, seed);
      this.attach(run);

      simLog.runCreated(this.logger, run.id, {
        preset: config.preset,
        seed,
        stepSizeHours: config.clock.stepSizeHours,
        timeScale: config.clock.timeScale,
        durationHours: config.durationHours,
      });
      return run;
    } catch (error) {
      log.methodError(this.logger, 'createRun', error);
      throw error;
    }
  }

  /**
   * Store the run's current position under `key` (the run id by default).
   */
  async save(run: SimulationRun, key: string = run.id): Promise<SimulationSnapshotJSON> {
    log.methodEntry(this.logger, 'save', { runId: run.id, key });

    try {
      const snapshot = run.snapshot();
      await this.store.save(key, snapshot);
      log.methodExit(this.logger, 'save', {
        runId: run.id,
        key,
        timeElapsed: snapshot.state.timeElapsed,
      });
      return snapshot;
    } catch (error) {
      log.methodError(this.logger, 'save', error, { runId: run.id, key });
      throw error;
    }
  }

  /**
   * Load a snapshot and rebuild its run, idle and ready to start.
   *
   * @throws SnapshotNotFoundError
   * @throws SnapshotFormatError
   */
  async resume(key: string): Promise<SimulationRun> {
    log.methodEntry(this.logger, 'resume', { key });

    try {
      const snapshot = await this.store.load(key);
      const run = SimulationRun.fromSnapshot(snapshot);
      this.attach(run);
      log.methodExit(this.logger, 'resume', {
        key,
        runId: run.id,
        timeElapsed: run.state.timeElapsed,
        noiseDraws: run.noise.draws,
      });
      return run;
    } catch (error) {
      log.methodError(this.logger, 'resume', error, { key });
      throw error;
    }
  }

  async list(): Promise<string[]> {
    return this.store.list();
  }

  /**
   * Stop logging a run's events. The run itself is left as is.
   */
  release(run: SimulationRun): void {
    this.detachers.get(run.id)?.();
    this.detachers.delete(run.id);
  }

  private attach(run: SimulationRun): void {
    this.release(run);
    this.detachers.set(run.id, run.clock.subscribe(createLoggingObserver(this.logger, run.id)));
  }
}
