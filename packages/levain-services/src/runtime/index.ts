export { RealtimeDriver } from './realtime-driver.js';
export type { RealtimeDriverOptions } from './realtime-driver.js';
