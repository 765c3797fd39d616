import type { SessionStatus, SessionSummary } from '../schema/session.js';
import type { BrowsingContext, DecisionGraph, SessionResources } from './types.js';

// ── State ────────────────────────────────────────────────────

export interface SessionState {
  readonly status: SessionStatus;
  readonly currentQuery: string | null;
  readonly currentStep: number | null;
  readonly currentAction: string | null;
  readonly result: string | null;
  readonly error: string | null;
  readonly lastAccessed: number;
}

export type SessionStatePatch = Partial<Omit<SessionState, 'lastAccessed'>>;

/** Handle on the query run currently driving this record. */
export interface QueryRun {
  readonly controller: AbortController;
  readonly done: Promise<void>;
}

// ── Record ───────────────────────────────────────────────────

/**
 * Mutable unit for one browsing session.
 *
 * The state is a frozen value that is replaced whole on every change,
 * so a reader holding `state` never sees a half-applied update.
 */
export class SessionRecord {
  readonly id: string;
  readonly createdAt: number;
  readonly timeoutMs: number;
  readonly context: BrowsingContext;
  readonly graph: DecisionGraph;

  #state: SessionState;
  #run: QueryRun | null = null;

  constructor(
    id: string,
    resources: SessionResources,
    timeoutMinutes: number,
    now: number = Date.now(),
  ) {
    this.id = id;
    this.createdAt = now;
    this.timeoutMs = timeoutMinutes * 60_000;
    this.context = resources.context;
    this.graph = resources.graph;
    this.#state = Object.freeze({
      status: 'active',
      currentQuery: null,
      currentStep: null,
      currentAction: null,
      result: null,
      error: null,
      lastAccessed: now,
    });
  }

  get state(): SessionState {
    return this.#state;
  }

  get isProcessing(): boolean {
    return this.#state.status === 'processing';
  }

  /** Apply a patch as one atomic replacement of the state value. */
  update(patch: SessionStatePatch): SessionState {
    this.#state = Object.freeze({ ...this.#state, ...patch });
    return this.#state;
  }

  touch(now: number = Date.now()): void {
    if (now <= this.#state.lastAccessed) return;
    this.#state = Object.freeze({ ...this.#state, lastAccessed: now });
  }

  isExpired(now: number = Date.now()): boolean {
    return now - this.#state.lastAccessed > this.timeoutMs;
  }

  pageUrl(): string | null {
    try {
      return this.context.url();
    } catch {
      return null;
    }
  }

  // ── Query run tracking ─────────────────────────────────────

  attachRun(run: QueryRun): void {
    this.#run = run;
    const clear = (): void => {
      if (this.#run === run) this.#run = null;
    };
    void run.done.then(clear, clear);
  }

  /** Abort the active run, if any, and wait until it has let go of the page. */
  async cancelRun(): Promise<void> {
    const run = this.#run;
    if (!run) return;
    run.controller.abort();
    await run.done;
  }

  async release(): Promise<void> {
    await this.cancelRun();
    await this.context.close();
  }

  summary(): SessionSummary {
    const state = this.#state;
    return {
      status: state.status,
      createdAt: new Date(this.createdAt).toISOString(),
      lastAccessed: new Date(state.lastAccessed).toISOString(),
      currentQuery: state.currentQuery,
      pageUrl: this.pageUrl(),
    };
  }
}
