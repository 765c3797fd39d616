import { vi } from 'vitest';

import type {
  BrowsingContext,
  DecisionGraph,
  SessionResourceFactory,
  StepEvent,
} from '../src/session/types.js';

// ── Browsing context ─────────────────────────────────────────

export function fakeContext(url = 'https://start.test/', onClose?: () => void) {
  const context = {
    url: (): string => url,
    close: vi.fn(async (): Promise<void> => {
      onClose?.();
    }),
  };
  return context satisfies BrowsingContext;
}

// ── Graphs ───────────────────────────────────────────────────

/** Replays `events`; an Error entry is thrown at that point of the stream. */
export function scriptedGraph(events: ReadonlyArray<StepEvent | Error>): DecisionGraph {
  return {
    async *stream(): AsyncGenerator<StepEvent> {
      for (const event of events) {
        await Promise.resolve();
        if (event instanceof Error) throw event;
        yield event;
      }
    },
  };
}

/** Emits Wait predictions until aborted. */
export function endlessGraph(): DecisionGraph {
  return {
    async *stream(_question: string, signal: AbortSignal): AsyncGenerator<StepEvent> {
      while (!signal.aborted) {
        await Promise.resolve();
        yield { node: 'agent', prediction: { kind: 'tool', name: 'Wait', args: null } };
      }
    },
  };
}

/**
 * Yields one Click prediction, then parks until aborted.
 * `onStop` runs when the stream is torn down.
 */
export function blockingGraph(onStop?: () => void): DecisionGraph {
  return {
    async *stream(_question: string, signal: AbortSignal): AsyncGenerator<StepEvent> {
      try {
        yield { node: 'agent', prediction: { kind: 'tool', name: 'Click', args: ['1'] } };
        await new Promise<void>((resolve) => {
          if (signal.aborted) resolve();
          signal.addEventListener('abort', () => resolve(), { once: true });
        });
      } finally {
        onStop?.();
      }
    },
  };
}

export function answerGraph(answer: string): DecisionGraph {
  return scriptedGraph([
    { node: 'agent', prediction: `Thought: found it\nAction: ANSWER; ${answer}` },
  ]);
}

// ── Factories ────────────────────────────────────────────────

export function staticFactory(
  makeGraph: () => DecisionGraph,
  url = 'https://start.test/',
): SessionResourceFactory {
  return async () => ({ context: fakeContext(url), graph: makeGraph() });
}

export function sequentialIds(prefix = 's'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${String(next)}`;
  };
}
