import type { SimulationObserver } from '@levain/core';
import { simLog, type ServiceLogger } from '../logging/index.js';

/**
 * Observer that mirrors clock events into structured logs.
 * Ticks log at trace, feedings and lifecycle at info, divergence at warn.
 */
export function createLoggingObserver(logger: ServiceLogger, runId: string): SimulationObserver {
  return {
    onTick: (snapshot, info) => {
      simLog.tick(logger, runId, snapshot, info);
      if (info.feedings > 0) {
        simLog.feeding(logger, runId, snapshot, 'schedule');
      }
    },
    onDivergence: (error, retained) => {
      simLog.divergence(logger, runId, error, retained);
    },
    onStatusChange: (from, to) => {
      simLog.lifecycle(logger, runId, from, to);
    },
    onIntervention: (kind, snapshot) => {
      simLog.intervention(logger, runId, kind, snapshot);
    },
  };
}
