/**
 * RealtimeDriver
 *
 * Ticks a SimulationClock from a wall-clock interval. The clock itself stays
 * synchronous; the driver only decides when `tick()` is called.
 *
 * The timer is cleared as soon as the clock stops, whoever stops it.
 */

import type { SimulationClock } from '@levain/core';
import { createServiceLogger, log, type ServiceLogger } from '../logging/index.js';

export interface RealtimeDriverOptions {
  /** Wall-clock milliseconds between ticks */
  intervalMs: number;
  /** Stop the clock once simulated time reaches this many hours */
  untilHours?: number;
  /** Receives an error thrown by a tick; the driver has already halted */
  onError?: (error: unknown) => void;
}

export class RealtimeDriver {
  private readonly logger: ServiceLogger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly waiters: Array<{ resolve: () => void; reject: (error: unknown) => void }> = [];
  private failure: unknown = null;

  constructor(
    private readonly clock: SimulationClock,
    private readonly options: RealtimeDriverOptions
  ) {
    if (!(Number.isFinite(options.intervalMs) && options.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be a positive number, got ${options.intervalMs}`);
    }
    this.logger = createServiceLogger('RealtimeDriver');
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Start (or resume) the clock and begin ticking.
   */
  start(): void {
    if (this.timer !== null) return;
    this.failure = null;

    if (this.clock.status === 'idle') {
      this.clock.start();
    } else if (this.clock.status === 'paused') {
      this.clock.resume();
    }

    this.unsubscribe = this.clock.subscribe({
      onStatusChange: (_from, to) => {
        if (to === 'stopped') this.halt();
      },
    });

    this.timer = setInterval(() => this.onInterval(), this.options.intervalMs);
    this.logger.info(
      { intervalMs: this.options.intervalMs, untilHours: this.options.untilHours },
      'Realtime driver started'
    );
  }

  /**
   * Stop ticking and pause the clock so it can be resumed later.
   */
  pause(): void {
    if (this.clock.status === 'running') this.clock.pause();
    this.halt();
  }

  /**
   * Stop ticking and stop the clock for good.
   */
  stop(): void {
    if (this.clock.status !== 'stopped') this.clock.stop();
    this.halt();
  }

  /**
   * Resolves when the driver halts; rejects if a tick threw.
   */
  whenHalted(): Promise<void> {
    if (this.timer === null) {
      return this.failure === null ? Promise.resolve() : Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  private onInterval(): void {
    try {
      this.clock.tick();
      const until = this.options.untilHours;
      if (until !== undefined && this.clock.state.timeElapsed >= until - 1e-9) {
        this.clock.stop();
      }
    } catch (error) {
      log.methodError(this.logger, 'tick', error);
      this.failure = error;
      this.halt();
      this.options.onError?.(error);
    }
  }

  private halt(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.unsubscribe?.();
    this.unsubscribe = null;

    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      if (this.failure === null) {
        waiter.resolve();
      } else {
        waiter.reject(this.failure);
      }
    }
  }
}
