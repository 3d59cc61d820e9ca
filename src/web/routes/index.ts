/**
 * @fileoverview Barrel export for all route modules.
 */

export { registerToolRoutes } from './tool-routes.js';
export { registerSystemRoutes } from './system-routes.js';
