export { default as healthRoutes } from './health-routes.js';
export type { HealthRoutesOptions } from './health-routes.js';
export { buildHealthServer } from './server.js';
