/**
 * Browser module.
 * Playwright glue: launching chromium, labelling pages, the agent's tools.
 * No LLM calls.
 */

export { launchBrowser, createSessionResourceFactory } from './runner.js';
export type { RunnerConfig, SessionPageOptions } from './runner.js';
export { annotatePage } from './annotate.js';
export { createBrowserTools } from './tools.js';
export type { BrowserTool, ToolInput, ToolSet, BrowserToolOptions } from './tools.js';
