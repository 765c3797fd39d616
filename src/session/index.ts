/**
 * Session module.
 * In-memory registry of browsing sessions with TTL expiry.
 */

export { SessionRegistry } from './registry.js';
export type { SessionRegistryOptions } from './registry.js';
export { SessionRecord } from './record.js';
export type { SessionState, SessionStatePatch, QueryRun } from './record.js';
export {
  SessionNotFoundError,
  SessionExpiredError,
  QueryInProgressError,
  ResourceUnavailableError,
} from './errors.js';
export type {
  StepEvent,
  DecisionGraph,
  BrowsingContext,
  SessionResources,
  SessionResourceFactory,
} from './types.js';
