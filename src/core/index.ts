/**
 * Core module.
 * Action parsing, the scratchpad, the agent graph and the query engine.
 * No HTTP, no CLI.
 */

export { parseAction } from './actionParser.js';
export { updateScratchpad, ScratchpadCorruptedError, SCRATCHPAD_HEADER } from './scratchpad.js';
export { formatDescriptions, buildStepPrompt } from './prompt.js';
export type { StepPromptInput } from './prompt.js';
export { createAgentGraph } from './agentGraph.js';
export type { AgentGraphDeps } from './agentGraph.js';
export { QueryEngine } from './queryEngine.js';
