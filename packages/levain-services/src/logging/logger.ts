/**
 * Service Logging
 *
 * One root pino logger per process, child loggers per service.
 * Development output goes through pino-pretty; everything else is JSON lines.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';
import type {
  ClockStatus,
  InterventionKind,
  NumericDivergenceError,
  StarterState,
  TickInfo,
} from '@levain/core';
import { getLogLevel, isDevelopment } from '../config/env.js';

export type ServiceLogger = Logger;

function buildOptions(): LoggerOptions {
  const options: LoggerOptions = {
    name: 'levain',
    level: getLogLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isDevelopment()) {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
    };
  } else {
    options.formatters = {
      level: (label) => ({ level: label }),
    };
  }
  return options;
}

export const rootLogger: Logger = pino(buildOptions());

/**
 * Create a child logger for a named service
 */
export function createServiceLogger(service: string): ServiceLogger {
  return rootLogger.child({ service });
}

/**
 * Method entry/exit logging
 */
export const log = {
  methodEntry: (logger: ServiceLogger, method: string, params?: Record<string, unknown>) => {
    logger.debug({ method, ...params }, `→ ${method}`);
  },

  methodExit: (logger: ServiceLogger, method: string, result?: Record<string, unknown>) => {
    logger.debug({ method, ...result }, `← ${method}`);
  },

  methodError: (
    logger: ServiceLogger,
    method: string,
    error: unknown,
    context?: Record<string, unknown>
  ) => {
    logger.error(
      {
        method,
        error: error instanceof Error ? error.message : String(error),
        errorName: error instanceof Error ? error.name : undefined,
        ...context,
      },
      `✗ ${method}`
    );
  },
};

/**
 * Structured log helpers for simulation events
 */
export const simLog = {
  runCreated: (logger: ServiceLogger, runId: string, details: Record<string, unknown>) => {
    logger.info({ runId, ...details }, 'Simulation run created');
  },

  tick: (logger: ServiceLogger, runId: string, state: StarterState, info: TickInfo) => {
    logger.trace(
      {
        runId,
        tick: info.tick,
        dt: info.dt,
        substeps: info.substeps,
        timeElapsed: state.timeElapsed,
        yeast: state.yeastPopulation,
        bacteria: state.bacteriaPopulation,
        nutrient: state.nutrientLevel,
      },
      'Tick'
    );
  },

  feeding: (logger: ServiceLogger, runId: string, state: StarterState, source: 'schedule' | 'manual') => {
    logger.info(
      {
        runId,
        source,
        timeElapsed: state.timeElapsed,
        nutrient: state.nutrientLevel,
        hydration: state.hydration,
      },
      'Starter fed'
    );
  },

  fold: (logger: ServiceLogger, runId: string, state: StarterState) => {
    logger.info(
      { runId, timeElapsed: state.timeElapsed, gluten: state.glutenStrength, gas: state.gasVolume },
      'Starter folded'
    );
  },

  salt: (logger: ServiceLogger, runId: string, state: StarterState) => {
    logger.info({ runId, timeElapsed: state.timeElapsed, salt: state.saltLevel }, 'Starter salted');
  },

  divergence: (
    logger: ServiceLogger,
    runId: string,
    error: NumericDivergenceError,
    retained: StarterState
  ) => {
    logger.warn(
      {
        runId,
        field: error.field,
        value: String(error.value),
        timeElapsed: retained.timeElapsed,
      },
      'Step diverged, previous state retained'
    );
  },

  lifecycle: (logger: ServiceLogger, runId: string, from: ClockStatus, to: ClockStatus) => {
    logger.info({ runId, from, to }, `Clock ${to}`);
  },

  intervention: (logger: ServiceLogger, runId: string, kind: InterventionKind, state: StarterState) => {
    switch (kind) {
      case 'feed':
        simLog.feeding(logger, runId, state, 'manual');
        break;
      case 'fold':
        simLog.fold(logger, runId, state);
        break;
      case 'salt':
        simLog.salt(logger, runId, state);
        break;
    }
  },
};
