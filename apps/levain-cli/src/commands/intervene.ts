import { Command, Argument } from 'commander';
import type { StarterState } from '@levain/core';
import { SimulationService, type SimulationRun } from '@levain/services';
import { formatStatus } from '../format/status-format.js';
import { reportError } from './options.js';

const ACTIONS = ['feed', 'fold', 'salt'] as const;
type Action = (typeof ACTIONS)[number];

const PAST_TENSE: Record<Action, string> = {
  feed: 'Fed',
  fold: 'Folded',
  salt: 'Salted',
};

function apply(run: SimulationRun, action: Action): StarterState {
  switch (action) {
    case 'feed':
      return run.clock.feedNow();
    case 'fold':
      return run.clock.fold();
    case 'salt':
      return run.clock.addSalt();
  }
}

export const interveneCommand = new Command('intervene')
  .description('Feed, fold or salt a saved starter outside its schedule')
  .addArgument(new Argument('<action>', 'What to do').choices(ACTIONS))
  .argument('<key>', 'Snapshot key')
  .action(async (action: Action, key: string) => {
    try {
      const service = new SimulationService();
      const run = await service.resume(key);

      const state = apply(run, action);
      await service.save(run, key);

      console.log(`\n✅ ${PAST_TENSE[action]} '${key}'\n`);
      for (const line of formatStatus(state)) {
        console.log(line);
      }
      console.log('');
    } catch (error) {
      reportError(error);
    }
  });
