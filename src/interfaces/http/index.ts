export { default as statusRoutes } from './status-routes.js';
export type { StatusRoutesOptions, ProcessStatus } from './status-routes.js';
export { StatusServer, buildStatusApp } from './status-server.js';
