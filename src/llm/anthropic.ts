import Anthropic from '@anthropic-ai/sdk';

import { LIMITS } from '../config/defaults.js';
import type { CompletionRequest, LLMClient } from './client.js';
import { RateLimitedError, retryOnRateLimit } from './retry.js';

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

// ── Message building ─────────────────────────────────────────

/** Screenshot first, then the question, as one user turn. */
function userMessage({ user, image }: CompletionRequest): Anthropic.MessageParam {
  if (!image) {
    return { role: 'user', content: user };
  }
  return {
    role: 'user',
    content: [
      {
        type: 'image',
        source: { type: 'base64', media_type: image.mimeType, data: image.base64 },
      },
      { type: 'text', text: user },
    ],
  };
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(apiKey: string, model?: string): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  async function send(request: CompletionRequest): Promise<Anthropic.Message> {
    try {
      return await client.messages.create({
        model: resolvedModel,
        max_tokens: LIMITS.LLM_MAX_TOKENS,
        system: request.system,
        messages: [userMessage(request)],
        temperature: 0,
      });
    } catch (err) {
      if (err instanceof Anthropic.RateLimitError) {
        throw new RateLimitedError('Anthropic');
      }
      throw err;
    }
  }

  return {
    provider: 'anthropic',
    async complete(request: CompletionRequest): Promise<string> {
      const response = await retryOnRateLimit(() => send(request));

      const text = response.content
        .flatMap((block) => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (!text) {
        throw new Error('Anthropic API returned no text content');
      }
      return text;
    },
  };
}
