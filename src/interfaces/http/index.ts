export { default as webhookRoutes } from './webhook-routes.js';
export { default as eventRoutes } from './event-routes.js';
export { default as healthRoutes, API_VERSION } from './health-routes.js';
export type { HealthRoutesOptions } from './health-routes.js';
