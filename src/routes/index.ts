export { createHealthRoutes, type HealthProbe } from './health.routes.js';
export { createItemRoutes } from './items.routes.js';
export { createUserRoutes } from './users.routes.js';
