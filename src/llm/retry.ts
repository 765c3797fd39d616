import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Rate-limit signal ────────────────────────────────────────

/** Thrown by an adapter when the provider answered 429. */
export class RateLimitedError extends Error {
  readonly retryAfterMs: number | null;

  constructor(provider: string, retryAfterMs: number | null = null) {
    super(`${provider} API: rate limited`);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

const DEFAULT_POLICY: RetryPolicy = {
  attempts: LIMITS.LLM_RATE_LIMIT_ATTEMPTS,
  baseDelayMs: TIMEOUTS.LLM_RATE_LIMIT_BACKOFF,
};

// ── Retry loop ───────────────────────────────────────────────

/**
 * Run `call`, retrying only on `RateLimitedError` with a linear backoff
 * (or the provider's retry-after). Other errors propagate at once.
 */
export async function retryOnRateLimit<T>(
  call: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_POLICY,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await call();
    } catch (err) {
      if (!(err instanceof RateLimitedError) || attempt >= policy.attempts) throw err;

      const waitMs = err.retryAfterMs ?? attempt * policy.baseDelayMs;
      log.llm(`Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }
}

/** Parse a `retry-after` header given in seconds. */
export function parseRetryAfter(header: string | null): number | null {
  if (header === null) return null;
  const seconds = Number.parseFloat(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}
