export { default as worldRoutes } from './world-routes.js';
