export { default as connectorRoutes } from './connector-routes.js';
export { default as opsRoutes } from './ops-routes.js';
