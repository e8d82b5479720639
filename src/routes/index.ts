export { healthRoutes } from './health.routes.js';
export { sectorRoutes } from './sectors.routes.js';
