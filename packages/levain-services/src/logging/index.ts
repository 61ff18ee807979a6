export { rootLogger, createServiceLogger, log, simLog } from './logger.js';
export type { ServiceLogger } from './logger.js';
