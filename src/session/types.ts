import type { AgentAction } from '../schema/action.js';

// ── Decision graph ───────────────────────────────────────────

/**
 * One event from the decision stream. Only `agent` events carry a
 * prediction; tool and bookkeeping nodes carry an observation or nothing.
 * A prediction may arrive pre-parsed or as raw LLM text.
 */
export interface StepEvent {
  node: string;
  prediction?: AgentAction | string;
  observation?: string;
}

export interface DecisionGraph {
  /** Drive the agent for one question. Stops when `signal` aborts. */
  stream(question: string, signal: AbortSignal): AsyncIterable<StepEvent>;
}

// ── Browsing context ─────────────────────────────────────────

/** The slice of a browser page the session layer needs. */
export interface BrowsingContext {
  url(): string;
  close(): Promise<void>;
}

// ── Owned resources ──────────────────────────────────────────

export interface SessionResources {
  readonly context: BrowsingContext;
  readonly graph: DecisionGraph;
}

export type SessionResourceFactory = () => Promise<SessionResources>;
