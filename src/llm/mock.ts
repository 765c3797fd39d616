import type { CompletionRequest, LLMClient } from './client.js';

const FALLBACK_REPLY = 'Thought: nothing to do.\nAction: ANSWER mock answer';

export interface MockLLMClient extends LLMClient {
  /** Every request received, oldest first. */
  readonly requests: CompletionRequest[];
}

/**
 * Offline provider: replays `replies` in order, then keeps answering
 * with a fixed ANSWER so an agent run always terminates.
 */
export function createMockClient(replies: readonly string[] = []): MockLLMClient {
  const requests: CompletionRequest[] = [];

  return {
    provider: 'mock',
    requests,
    async complete(request: CompletionRequest): Promise<string> {
      const reply = replies[requests.length] ?? FALLBACK_REPLY;
      requests.push(request);
      return reply;
    },
  };
}
