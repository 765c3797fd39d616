/**
 * LLM module.
 * One completion call per agent turn; nothing else in the tree talks to a model.
 */

import { API_KEY_ENV } from './client.js';
import type { LLMClient, LLMConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { RateLimitedError, retryOnRateLimit, parseRetryAfter } from './retry.js';
export type { RetryPolicy } from './retry.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockLLMClient } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

export function createLLMClient(config: LLMConfig): LLMClient {
  if (config.provider === 'mock') {
    return createMockClient();
  }

  const { apiKey } = config;
  if (!apiKey) {
    throw new Error(
      `${API_KEY_ENV[config.provider]} is required when using the ${config.provider} provider`,
    );
  }

  return config.provider === 'anthropic'
    ? createAnthropicClient(apiKey, config.model)
    : createOpenAIClient(apiKey, config.model);
}
