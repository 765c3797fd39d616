import { z } from 'zod';

// ── Requests ─────────────────────────────────────────────────

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

export interface ImageInput {
  /** Base64 without the `data:` prefix. */
  base64: string;
  mimeType: ImageMimeType;
}

/** One single-turn completion: instructions, the user turn, and an optional screenshot. */
export interface CompletionRequest {
  system: string;
  user: string;
  image?: ImageInput | undefined;
}

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  /** Provider name, for logs. */
  readonly provider: LLMProvider;
  complete(request: CompletionRequest): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

/** Environment variable holding the key of each hosted provider. */
export const API_KEY_ENV = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const satisfies Partial<Record<LLMProvider, string>>;

// ── Env loader ───────────────────────────────────────────────

export interface LLMConfigOverrides {
  provider?: LLMProvider | undefined;
  model?: string | undefined;
}

/**
 * Read `LLM_PROVIDER`, `LLM_MODEL` and the API key of the chosen provider.
 * `overrides` win over the environment; the provider defaults to openai.
 * The key is looked up only once the provider is settled.
 */
export function loadLLMConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: LLMConfigOverrides = {},
): LLMConfig {
  const provider = overrides.provider ?? llmProviderSchema.parse(env['LLM_PROVIDER'] ?? 'openai');
  const keyVar = provider === 'mock' ? undefined : API_KEY_ENV[provider];

  return llmConfigSchema.parse({
    provider,
    apiKey: keyVar ? env[keyVar] : undefined,
    model: overrides.model ?? env['LLM_MODEL'],
  });
}
