import type { SimulationSnapshot, SimulationSnapshotJSON } from './snapshot.js';

/**
 * Keyed snapshot storage.
 */
export interface SnapshotStore {
  save(key: string, snapshot: SimulationSnapshotJSON): Promise<void>;

  /**
   * @throws SnapshotNotFoundError when nothing is stored under `key`
   * @throws SnapshotFormatError when the stored content is unusable
   */
  load(key: string): Promise<SimulationSnapshot>;

  list(): Promise<string[]>;

  /** Returns false if there was nothing to delete */
  delete(key: string): Promise<boolean>;
}
