import { z } from 'zod';

import { LIMITS } from '../config/defaults.js';
import type { CompletionRequest, LLMClient } from './client.js';
import { RateLimitedError, parseRetryAfter, retryOnRateLimit } from './retry.js';

const DEFAULT_MODEL = 'gpt-4o';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .nonempty(),
});

// ── Message building ─────────────────────────────────────────

type UserContent =
  | string
  | Array<
      | { type: 'image_url'; image_url: { url: string } }
      | { type: 'text'; text: string }
    >;

function userContent({ user, image }: CompletionRequest): UserContent {
  if (!image) return user;
  return [
    { type: 'image_url', image_url: { url: `data:${image.mimeType};base64,${image.base64}` } },
    { type: 'text', text: user },
  ];
}

// ── Provider factory ─────────────────────────────────────────

/** Chat Completions over plain fetch; a 429 is retried, any other non-2xx throws. */
export function createOpenAIClient(apiKey: string, model?: string): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;

  async function send(request: CompletionRequest): Promise<string> {
    const response = await fetch(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model: resolvedModel,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: userContent(request) },
        ],
        max_tokens: LIMITS.LLM_MAX_TOKENS,
        temperature: 0,
      }),
    });

    if (response.status === 429) {
      throw new RateLimitedError('OpenAI', parseRetryAfter(response.headers.get('retry-after')));
    }
    const raw = await response.text();
    if (!response.ok) {
      throw new Error(`OpenAI API error (${String(response.status)}): ${raw}`);
    }
    return raw;
  }

  return {
    provider: 'openai',
    async complete(request: CompletionRequest): Promise<string> {
      const raw = await retryOnRateLimit(() => send(request));
      const body: unknown = JSON.parse(raw);
      return chatResponseSchema.parse(body).choices[0].message.content;
    },
  };
}
