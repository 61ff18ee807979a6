export { SnapshotNotFoundError, SnapshotFormatError } from './errors.js';
export {
  SNAPSHOT_VERSION,
  SimulationSnapshotSchema,
  createSnapshot,
  parseSnapshot,
  serializeSnapshot,
  deserializeSnapshot,
} from './snapshot.js';
export type { SimulationSnapshot, SimulationSnapshotJSON, SnapshotSource } from './snapshot.js';
export type { SnapshotStore } from './snapshot-store.js';
export { FileSnapshotStore } from './file-snapshot-store.js';
