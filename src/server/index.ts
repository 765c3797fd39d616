/**
 * HTTP service module.
 * Maps registry and engine operations onto REST routes.
 * No business logic lives here.
 */

export { createApp } from './app.js';
export { createSessionRouter } from './routes.js';
export type { ServiceDeps } from './routes.js';
export { startServer, listen, serverUrl } from './server.js';
export type { RunningServer } from './server.js';
