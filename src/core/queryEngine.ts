import { describeAction } from '../schema/action.js';
import type { AgentAction } from '../schema/action.js';
import { LIMITS } from '../config/defaults.js';
import { QueryInProgressError } from '../session/errors.js';
import type { SessionRecord, SessionState } from '../session/record.js';
import * as log from '../utils/logger.js';
import { parseAction } from './actionParser.js';

// ── Engine ───────────────────────────────────────────────────

/**
 * Runs one bounded question against a session's decision graph.
 *
 * `submit` returns as soon as the record is marked `processing`; the
 * step loop runs on its own and reports only through the record.
 */
export class QueryEngine {
  submit(
    record: SessionRecord,
    question: string,
    maxSteps: number = LIMITS.MAX_STEPS,
  ): SessionState {
    if (record.isProcessing) {
      throw new QueryInProgressError(record.id);
    }

    const state = record.update({
      status: 'processing',
      currentQuery: question,
      currentStep: 0,
      currentAction: null,
      result: null,
      error: null,
    });

    const controller = new AbortController();
    const done = this.#execute(record, question, maxSteps, controller.signal);
    record.attachRun({ controller, done });

    return state;
  }

  // ── Step loop ──────────────────────────────────────────────

  async #execute(
    record: SessionRecord,
    question: string,
    maxSteps: number,
    signal: AbortSignal,
  ): Promise<void> {
    log.session(record.id, `Query started: ${question}`);
    let step = 0;

    try {
      for await (const event of record.graph.stream(question, signal)) {
        if (signal.aborted) return;
        if (event.prediction === undefined) continue;

        const action: AgentAction =
          typeof event.prediction === 'string'
            ? parseAction(event.prediction)
            : event.prediction;

        step += 1;
        const currentAction = describeAction(action);
        log.step(record.id, step, currentAction);

        if (action.kind === 'answer') {
          record.update({
            status: 'completed',
            currentStep: step,
            currentAction,
            result: action.args?.[0] ?? null,
          });
          log.session(record.id, 'Query completed');
          return;
        }

        if (step > maxSteps) {
          record.update({
            status: 'error',
            currentStep: step,
            currentAction,
            error: `Max steps (${String(maxSteps)}) exceeded`,
          });
          log.warn(`Session ${record.id} exceeded ${String(maxSteps)} steps`);
          return;
        }

        record.update({ currentStep: step, currentAction });
      }

      if (signal.aborted) return;
      record.update({ status: 'completed', result: null });
      log.session(record.id, 'Decision stream ended without an answer');
    } catch (err) {
      if (signal.aborted) return;
      const message = err instanceof Error ? err.message : String(err);
      record.update({ status: 'error', error: message });
      log.error(`Query error in session ${record.id}: ${message}`);
    }
  }
}
