export { default as flagClientPlugin } from './flag-client-plugin.js';
export type { FlagClientPluginOptions } from './flag-client-plugin.js';
