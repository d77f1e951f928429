export { loadConfig, DEFAULT_CONFIG } from './config/index.js';
export type { FlagSyncConfig, LogLevel } from './config/index.js';
export { HttpTransport, API_KEY_HEADER } from './transport/index.js';
export type { HttpTransportOptions } from './transport/index.js';
export { flagClientPlugin } from './plugins/index.js';
export type { FlagClientPluginOptions } from './plugins/index.js';
