export { HttpTransport, API_KEY_HEADER } from './http-transport.js';
export type { HttpTransportOptions } from './http-transport.js';
