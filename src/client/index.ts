export {
  WebAgentClient,
  ApiError,
  SessionLostError,
  QueryFailedError,
} from './webAgentClient.js';
export type { WebAgentClientOptions, QueryOptions } from './webAgentClient.js';
