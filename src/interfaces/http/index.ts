export { default as hookRoutes } from './hook-routes.js';
export { default as interactionRoutes } from './interaction-routes.js';
export { default as queryRoutes } from './query-routes.js';
