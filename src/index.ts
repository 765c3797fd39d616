/**
 * Library entry point.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './session/index.js';
export * from './server/index.js';
export * from './client/index.js';
export * from './browser/index.js';
export * from './llm/index.js';
export * from './config/index.js';
