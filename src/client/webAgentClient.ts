import type { z } from 'zod';

import {
  closeSessionResponseSchema,
  errorResponseSchema,
  queryResponseSchema,
  sessionListResponseSchema,
  sessionResponseSchema,
} from '../schema/session.js';
import type {
  SessionListResponse,
  SessionResponse,
} from '../schema/session.js';
import { LIMITS, SERVER, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Errors ───────────────────────────────────────────────────

export class ApiError extends Error {
  readonly status: number;
  readonly body: string;
  /** The server's `error` field, when the body has one. */
  readonly detail: string | null;

  constructor(status: number, body: string) {
    const detail = errorDetail(body);
    super(`Request failed (${String(status)}): ${detail ?? body}`);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;
    this.detail = detail;
  }
}

function errorDetail(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  const result = errorResponseSchema.safeParse(parsed);
  return result.success ? result.data.error : null;
}

/** The session disappeared (closed or expired) while a query was running. */
export class SessionLostError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} not found or expired`);
    this.name = 'SessionLostError';
    this.sessionId = sessionId;
  }
}

export class QueryFailedError extends Error {
  constructor(reason: string) {
    super(`Query failed: ${reason}`);
    this.name = 'QueryFailedError';
  }
}

// ── Options ──────────────────────────────────────────────────

export interface WebAgentClientOptions {
  baseUrl?: string | undefined;
  fetch?: typeof fetch | undefined;
}

export interface QueryOptions {
  maxSteps?: number | undefined;
  pollIntervalMs?: number | undefined;
}

// ── Client ───────────────────────────────────────────────────

/**
 * HTTP client for the session service.
 * Holds at most one session id; `queryAsync` polls until the query ends.
 */
export class WebAgentClient {
  readonly baseUrl: string;
  readonly #fetch: typeof fetch;
  #sessionId: string | null = null;

  constructor(options: WebAgentClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? `http://localhost:${String(SERVER.PORT)}`).replace(/\/+$/, '');
    this.#fetch = options.fetch ?? fetch;
  }

  get sessionId(): string | null {
    return this.#sessionId;
  }

  async createSession(
    timeoutMinutes: number = TIMEOUTS.SESSION_TIMEOUT_MINUTES,
  ): Promise<string> {
    const params = new URLSearchParams({ timeoutMinutes: String(timeoutMinutes) });
    const session = await this.#request(
      `/sessions?${params.toString()}`,
      { method: 'POST' },
      sessionResponseSchema,
    );

    this.#sessionId = session.sessionId;
    log.info(`Created session: ${session.sessionId}`);
    return session.sessionId;
  }

  async getSession(): Promise<SessionResponse> {
    const sessionId = this.#requireSession();
    try {
      return await this.#request(`/sessions/${sessionId}`, { method: 'GET' }, sessionResponseSchema);
    } catch (err) {
      if (err instanceof ApiError && err.status === 404) {
        log.warn('Session not found or expired');
        this.#sessionId = null;
        throw new SessionLostError(sessionId);
      }
      throw err;
    }
  }

  /** Submit a question and poll until the session reports a result or an error. */
  async queryAsync(question: string, options: QueryOptions = {}): Promise<string | null> {
    const sessionId = this.#requireSession();
    const maxSteps = options.maxSteps ?? LIMITS.MAX_STEPS;
    const pollIntervalMs = options.pollIntervalMs ?? TIMEOUTS.POLL_INTERVAL;

    const started = await this.#request(
      `/sessions/${sessionId}/query`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ question, maxSteps }),
      },
      queryResponseSchema,
    );
    log.info(`Query started: ${started.status}`);

    const startTime = Date.now();
    let lastStep: number | null = null;

    for (;;) {
      const session = await this.getSession();

      if (session.currentStep && session.currentStep !== lastStep) {
        lastStep = session.currentStep;
        log.step(sessionId, session.currentStep, session.currentAction ?? 'Processing...');
      }

      if (session.status === 'completed') {
        const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
        log.info(`Query completed in ${elapsed}s`);
        return session.result ?? null;
      }

      if (session.status === 'error') {
        const reason = session.error ?? 'Unknown error';
        log.error(`Query failed: ${reason}`);
        throw new QueryFailedError(reason);
      }

      await new Promise((r) => setTimeout(r, pollIntervalMs));
    }
  }

  /** Close the current session. A session the server no longer knows counts as closed. */
  async closeSession(): Promise<boolean> {
    const sessionId = this.#sessionId;
    if (!sessionId) return false;

    const response = await this.#fetch(`${this.baseUrl}/sessions/${sessionId}`, {
      method: 'DELETE',
    });

    if (response.status === 404) {
      log.warn('Session not found (may have already expired)');
      this.#sessionId = null;
      return true;
    }
    const raw = await response.text();
    if (!response.ok) {
      throw new ApiError(response.status, raw);
    }

    const body: unknown = JSON.parse(raw);
    const { message } = closeSessionResponseSchema.parse(body);
    log.info(`Session ${sessionId}: ${message}`);
    this.#sessionId = null;
    return true;
  }

  async listSessions(): Promise<SessionListResponse> {
    return this.#request('/sessions', { method: 'GET' }, sessionListResponseSchema);
  }

  /** Run `fn` with a fresh session and always close it afterwards. */
  async withSession<T>(
    fn: (client: WebAgentClient) => Promise<T>,
    timeoutMinutes?: number,
  ): Promise<T> {
    await this.createSession(timeoutMinutes);
    try {
      return await fn(this);
    } finally {
      try {
        await this.closeSession();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error(`Error closing session: ${message}`);
      }
    }
  }

  // ── Internals ──────────────────────────────────────────────

  #requireSession(): string {
    if (!this.#sessionId) {
      throw new Error('No active session');
    }
    return this.#sessionId;
  }

  async #request<S extends z.ZodTypeAny>(
    path: string,
    init: RequestInit,
    schema: S,
  ): Promise<z.infer<S>> {
    const response = await this.#fetch(`${this.baseUrl}${path}`, init);
    const raw = await response.text();

    if (!response.ok) {
      throw new ApiError(response.status, raw);
    }

    const body: unknown = JSON.parse(raw);
    return schema.parse(body);
  }
}
