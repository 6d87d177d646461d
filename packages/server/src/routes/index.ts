export { healthRoutes } from './health.js';
export { clientRoutes } from './clients.js';
export { downloadRoutes } from './downloads.js';
