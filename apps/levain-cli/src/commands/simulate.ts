/**
 * Shared run loop for `run` and `resume`.
 */

import type { StarterState } from '@levain/core';
import { RealtimeDriver, type SimulationRun, type SimulationService } from '@levain/services';
import { formatStatus, formatStatusLine } from '../format/status-format.js';

export interface SimulateOptions {
  hours: number;
  /** Simulated hours between progress lines */
  every: number;
  /** Tick on a wall-clock interval instead of as fast as possible */
  realtimeMs?: number;
  /** Snapshot key, or true for the run id */
  save?: string | boolean;
}

interface SimulateResult {
  diverged: number;
  feedings: number;
}

function printProgress(state: StarterState): void {
  console.log(`   ${formatStatusLine(state)}`);
}

/**
 * The total tick count is fixed up front; report intervals only split it.
 */
function runBatch(run: SimulationRun, hours: number, every: number): SimulateResult {
  const result: SimulateResult = { diverged: 0, feedings: 0 };
  const ticksPerReport = run.clock.ticksFor(every);
  let remaining = run.clock.ticksFor(hours);

  while (remaining > 0) {
    const count = Math.min(ticksPerReport, remaining);
    const summary = run.clock.advance(count);
    result.diverged += summary.diverged;
    result.feedings += summary.feedings;
    printProgress(summary.state);
    remaining -= count;
  }
  return result;
}

async function runRealtime(
  run: SimulationRun,
  hours: number,
  every: number,
  intervalMs: number
): Promise<SimulateResult> {
  const result: SimulateResult = { diverged: 0, feedings: 0 };
  let nextReport = run.state.timeElapsed + every;

  const unsubscribe = run.clock.subscribe({
    onTick: (state, info) => {
      result.feedings += info.feedings;
      if (state.timeElapsed >= nextReport - 1e-9) {
        printProgress(state);
        nextReport += every;
      }
    },
    onDivergence: () => {
      result.diverged++;
    },
  });

  const driver = new RealtimeDriver(run.clock, {
    intervalMs,
    untilHours: run.state.timeElapsed + hours,
  });
  const interrupt = (): void => {
    console.log('\n⏹️  Interrupted');
    driver.stop();
  };
  process.once('SIGINT', interrupt);

  try {
    driver.start();
    await driver.whenHalted();
  } finally {
    process.off('SIGINT', interrupt);
    unsubscribe();
  }
  return result;
}

/**
 * Start the run's clock, advance it, print the final state and optionally save.
 */
export async function simulate(
  service: SimulationService,
  run: SimulationRun,
  options: SimulateOptions
): Promise<void> {
  console.log(`\n🧪 Run ${run.id}: ${options.hours} h from t = ${run.state.timeElapsed.toFixed(1)} h\n`);

  if (run.clock.status === 'idle') {
    run.clock.start();
  }

  const result =
    options.realtimeMs === undefined
      ? runBatch(run, options.hours, options.every)
      : await runRealtime(run, options.hours, options.every, options.realtimeMs);

  console.log('');
  for (const line of formatStatus(run.state)) {
    console.log(line);
  }
  console.log(`\n   Feedings: ${result.feedings}`);
  if (result.diverged > 0) {
    console.log(`   ⚠️  ${result.diverged} tick(s) diverged and were skipped`);
  }

  if (options.save !== undefined && options.save !== false) {
    const key = typeof options.save === 'string' ? options.save : run.id;
    await service.save(run, key);
    console.log(`\n✅ Saved snapshot '${key}'`);
  }

  if (run.clock.status !== 'stopped') {
    run.clock.stop();
  }
}
