export { default as evaluationRoutes } from './evaluation-routes.js';
export { default as eventRoutes } from './event-routes.js';
export { default as healthRoutes } from './health-routes.js';
export { buildServer } from './server.js';
export type { BuildServerOptions } from './server.js';
