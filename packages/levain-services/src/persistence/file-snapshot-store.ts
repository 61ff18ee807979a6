/**
 * FileSnapshotStore
 *
 * One pretty-printed JSON file per key under a directory.
 * Writes go to a temporary file first and are renamed into place.
 */

import { mkdir, readFile, readdir, rename, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { InvalidConfigurationError } from '@levain/core';
import { createServiceLogger, log, type ServiceLogger } from '../logging/index.js';
import { SnapshotNotFoundError } from './errors.js';
import { deserializeSnapshot, serializeSnapshot } from './snapshot.js';
import type { SimulationSnapshot, SimulationSnapshotJSON } from './snapshot.js';
import type { SnapshotStore } from './snapshot-store.js';

const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;
const EXTENSION = '.json';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileSnapshotStore implements SnapshotStore {
  private readonly logger: ServiceLogger;

  constructor(readonly directory: string) {
    this.logger = createServiceLogger('FileSnapshotStore');
  }

  async save(key: string, snapshot: SimulationSnapshotJSON): Promise<void> {
    const path = this.pathFor(key);
    log.methodEntry(this.logger, 'save', { key });

    try {
      await mkdir(this.directory, { recursive: true });
      const temporary = `${path}.tmp`;
      await writeFile(temporary, serializeSnapshot(snapshot), 'utf8');
      await rename(temporary, path);
      log.methodExit(this.logger, 'save', { key, path });
    } catch (error) {
      log.methodError(this.logger, 'save', error, { key });
      throw error;
    }
  }

  async load(key: string): Promise<SimulationSnapshot> {
    const path = this.pathFor(key);

    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new SnapshotNotFoundError(key);
      }
      throw error;
    }
    return deserializeSnapshot(text, key);
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return entries
      .filter((name) => name.endsWith(EXTENSION))
      .map((name) => name.slice(0, -EXTENSION.length))
      .sort();
  }

  async delete(key: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  private pathFor(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new InvalidConfigurationError(
        'snapshotKey',
        `'${key}' may only contain letters, digits, '-' and '_'`
      );
    }
    return join(this.directory, `${key}${EXTENSION}`);
  }
}
