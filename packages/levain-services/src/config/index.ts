export {
  LOG_LEVELS,
  DEFAULT_SNAPSHOT_DIR,
  getLogLevel,
  getNodeEnv,
  isDevelopment,
  getSnapshotDir,
} from './env.js';
export type { LogLevel } from './env.js';
export { RunConfigSchema, parseRunConfig, loadRunConfig } from './run-config.js';
export type { RunConfig, RunConfigInput } from './run-config.js';
