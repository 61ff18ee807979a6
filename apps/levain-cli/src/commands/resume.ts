import { Command } from 'commander';
import { SimulationService } from '@levain/services';
import { parsePositiveNumber, reportError } from './options.js';
import { simulate } from './simulate.js';

interface ResumeOptions {
  hours: number;
  every: number;
  realtime?: number;
  save?: string | boolean;
}

export const resumeCommand = new Command('resume')
  .description('Continue a saved simulation')
  .argument('<key>', 'Snapshot key')
  .option('-H, --hours <hours>', 'Simulated hours to run', parsePositiveNumber, 24)
  .option('-e, --every <hours>', 'Print progress every N simulated hours', parsePositiveNumber, 6)
  .option('--realtime <ms>', 'Tick every <ms> wall-clock milliseconds', parsePositiveNumber)
  .option('--save [key]', 'Save a snapshot when done (key defaults to the run id)')
  .action(async (key: string, options: ResumeOptions) => {
    try {
      const service = new SimulationService();
      const run = await service.resume(key);

      await simulate(service, run, {
        hours: options.hours,
        every: options.every,
        realtimeMs: options.realtime,
        save: options.save,
      });
    } catch (error) {
      reportError(error);
    }
  });
