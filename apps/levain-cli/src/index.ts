#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { resumeCommand } from './commands/resume.js';
import { interveneCommand } from './commands/intervene.js';
import { statusCommand } from './commands/status.js';
import { presetsCommand } from './commands/presets.js';

const program = new Command();

program
  .name('levain')
  .description('Sourdough starter fermentation simulator')
  .version('0.1.0');

// Simulation commands
program.addCommand(runCommand);
program.addCommand(resumeCommand);
program.addCommand(interveneCommand);

// Inspection commands
program.addCommand(statusCommand);
program.addCommand(presetsCommand);

program.addHelpText('after', `

Examples:
  $ levain presets                          List starter presets
  $ levain run --preset stiff --hours 48    Simulate two days of a stiff levain
  $ levain run configs/classic-starter.json --save morning
  $ levain intervene feed morning           Feed a saved starter now
  $ levain intervene salt morning           Work a dose of salt in
  $ levain resume morning --hours 12 --save Continue and save again
  $ levain status morning                   Show a saved starter
  $ levain run --realtime 200               Tick every 200 ms of wall-clock time
`);

await program.parseAsync();
