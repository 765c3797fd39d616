/**
 * CLI module — thin wrapper over the server and client.
 * Parses arguments, delegates, handles exit codes.
 * No business logic lives here.
 */

export { registerServeCommand, mergeServeOptions } from './serve.js';
export { registerAskCommand, registerSessionsCommand } from './ask.js';
