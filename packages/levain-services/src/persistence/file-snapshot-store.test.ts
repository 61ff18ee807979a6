import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidConfigurationError } from '@levain/core';
import { FileSnapshotStore } from './file-snapshot-store.js';
import { SnapshotFormatError, SnapshotNotFoundError } from './errors.js';
import { SimulationRun } from '../simulation/simulation-run.js';
import { parseRunConfig } from '../config/run-config.js';

describe('FileSnapshotStore', () => {
  let directory: string;
  let store: FileSnapshotStore;
  const snapshot = SimulationRun.fromConfig('run-a', parseRunConfig({}), 3).snapshot(
    new Date('2026-02-01T00:00:00.000Z')
  );

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'levain-store-'));
    store = new FileSnapshotStore(join(directory, 'snapshots'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should save and load a snapshot', async () => {
    await store.save('run-a', snapshot);

    expect(await store.load('run-a')).toEqual(snapshot);
  });

  it('should write one pretty-printed file per key', async () => {
    await store.save('run-a', snapshot);

    const text = await readFile(join(directory, 'snapshots', 'run-a.json'), 'utf8');
    expect(text.startsWith('{\n  "version": 1,')).toBe(true);
  });

  it('should overwrite an existing key', async () => {
    await store.save('run-a', snapshot);
    await store.save('run-a', { ...snapshot, runId: 'run-b' });

    expect((await store.load('run-a')).runId).toBe('run-b');
  });

  it('should list keys in order', async () => {
    await store.save('zeta', snapshot);
    await store.save('alpha', snapshot);

    expect(await store.list()).toEqual(['alpha', 'zeta']);
  });

  it('should list nothing before the directory exists', async () => {
    expect(await store.list()).toEqual([]);
  });

  it('should delete a key', async () => {
    await store.save('run-a', snapshot);

    expect(await store.delete('run-a')).toBe(true);
    expect(await store.delete('run-a')).toBe(false);
    expect(await store.list()).toEqual([]);
  });

  it('should report a missing key', async () => {
    await expect(store.load('nope')).rejects.toBeInstanceOf(SnapshotNotFoundError);
  });

  it('should report a corrupt file', async () => {
    await store.save('run-a', snapshot);
    await writeFile(join(directory, 'snapshots', 'run-a.json'), '{"version":1}', 'utf8');

    await expect(store.load('run-a')).rejects.toBeInstanceOf(SnapshotFormatError);
  });

  it('should refuse keys that could escape the directory', async () => {
    await expect(store.save('../outside', snapshot)).rejects.toBeInstanceOf(InvalidConfigurationError);
    await expect(store.load('a/b')).rejects.toBeInstanceOf(InvalidConfigurationError);
  });
});
