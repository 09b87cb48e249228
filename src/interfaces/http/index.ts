export { default as recordRoutes } from './record-routes.js';
export { default as pipelineRoutes } from './pipeline-routes.js';
export type { PipelineRoutesOptions } from './pipeline-routes.js';
export { default as dateRoutes } from './date-routes.js';
export type { DateRoutesOptions } from './date-routes.js';
export { default as syncRoutes } from './sync-routes.js';
export { default as healthRoutes } from './health-routes.js';
