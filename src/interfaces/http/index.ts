export { default as healthRoutes } from './health-routes.js';
export { default as simulationRoutes } from './simulation-routes.js';
