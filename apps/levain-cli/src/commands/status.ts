import { Command } from 'commander';
import { FileSnapshotStore, getSnapshotDir } from '@levain/services';
import { formatStatus } from '../format/status-format.js';
import { reportError } from './options.js';

export const statusCommand = new Command('status')
  .description('Show a saved starter, or list saved snapshots')
  .argument('[key]', 'Snapshot key (lists all snapshots if omitted)')
  .action(async (key?: string) => {
    const store = new FileSnapshotStore(getSnapshotDir());

    try {
      if (key) {
        await showSnapshot(store, key);
      } else {
        await listSnapshots(store);
      }
    } catch (error) {
      reportError(error);
    }
  });

async function listSnapshots(store: FileSnapshotStore): Promise<void> {
  const keys = await store.list();
  console.log(`\n📋 Snapshots in ${store.directory}\n`);

  if (keys.length === 0) {
    console.log('   (none yet, run `levain run --save` to create one)\n');
    return;
  }
  for (const key of keys) {
    console.log(`   ${key}`);
  }
  console.log('');
}

async function showSnapshot(store: FileSnapshotStore, key: string): Promise<void> {
  const snapshot = await store.load(key);
  const interval = snapshot.policy.intervalHours;

  console.log(`\n📊 Snapshot '${key}' (run ${snapshot.runId}, saved ${snapshot.savedAt})\n`);
  for (const line of formatStatus(snapshot.state)) {
    console.log(line);
  }
  console.log('');
  console.log(`   Feeding:      ${interval === null ? 'never' : `every ${interval} h`}`);
  console.log(`   Clock:        ${snapshot.run.stepSizeHours} h/tick x${snapshot.run.timeScale}`);
  console.log(`   Noise:        seed ${snapshot.noise.seed}, ${snapshot.noise.draws} draws`);
  console.log('');
}
