/**
 * Default configuration values.
 * Durations are milliseconds unless the name says otherwise.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 15_000,
  SESSION_TIMEOUT_MINUTES: 30,
  SWEEP_INTERVAL: 300_000,
  POLL_INTERVAL: 2_000,
  MARK_PAGE_RETRY_WAIT: 3_000,
  TOOL_WAIT: 5_000,
  LLM_RATE_LIMIT_BACKOFF: 5_000,
} as const;

export const LIMITS = {
  MAX_STEPS: 150,
  MARK_PAGE_ATTEMPTS: 10,
  WINDOW_SCROLL_PX: 500,
  ELEMENT_SCROLL_PX: 200,
  LLM_RATE_LIMIT_ATTEMPTS: 3,
  LLM_MAX_TOKENS: 1024,
} as const;

export const SERVER = {
  PORT: 8000,
  HOST: '127.0.0.1',
  START_URL: 'https://www.duckduckgo.com',
  SEARCH_ENGINE_URL: 'https://www.google.com/',
  CONFIG_FILE: '.web-searcher.yaml',
} as const;
