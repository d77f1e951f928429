export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { FlagSyncConfig, LogLevel } from './config.js';
