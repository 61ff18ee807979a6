import { Command } from 'commander';
import { SimulationService, loadRunConfig, parseRunConfig } from '@levain/services';
import { parseInteger, parsePositiveNumber, reportError } from './options.js';
import { simulate } from './simulate.js';

interface RunOptions {
  preset?: string;
  hours?: number;
  seed?: number;
  every: number;
  realtime?: number;
  save?: string | boolean;
}

export const runCommand = new Command('run')
  .description('Run a simulation from a configuration file or a preset')
  .argument('[config]', 'Path to a run configuration JSON file')
  .option('-p, --preset <name>', 'Starter preset (classic, stiff, liquid)')
  .option('-H, --hours <hours>', 'Simulated hours to run', parsePositiveNumber)
  .option('-s, --seed <seed>', 'Noise seed', parseInteger)
  .option('-e, --every <hours>', 'Print progress every N simulated hours', parsePositiveNumber, 6)
  .option('--realtime <ms>', 'Tick every <ms> wall-clock milliseconds', parsePositiveNumber)
  .option('--save [key]', 'Save a snapshot when done (key defaults to the run id)')
  .action(async (configPath: string | undefined, options: RunOptions) => {
    try {
      const fileConfig = configPath ? await loadRunConfig(configPath) : {};
      const config = parseRunConfig({
        ...fileConfig,
        ...(options.preset !== undefined ? { preset: options.preset } : {}),
        ...(options.seed !== undefined ? { seed: options.seed } : {}),
        ...(options.hours !== undefined ? { durationHours: options.hours } : {}),
      });

      const service = new SimulationService();
      const run = service.createRun(config);

      await simulate(service, run, {
        hours: config.durationHours,
        every: options.every,
        realtimeMs: options.realtime,
        save: options.save,
      });
    } catch (error) {
      reportError(error);
    }
  });
