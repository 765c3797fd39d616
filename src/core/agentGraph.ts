import type { LLMClient } from '../llm/index.js';
import type { AgentAction, MarkedPage } from '../schema/action.js';
import type { ToolSet } from '../browser/tools.js';
import type { DecisionGraph, StepEvent } from '../session/types.js';
import * as log from '../utils/logger.js';
import { parseAction } from './actionParser.js';
import { buildStepPrompt } from './prompt.js';
import { updateScratchpad } from './scratchpad.js';

// ── Public types ─────────────────────────────────────────────

export interface AgentGraphDeps {
  llm: LLMClient;
  /** Label the current page and screenshot it. */
  annotate: () => Promise<MarkedPage>;
  tools: ToolSet;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Observe → decide → act loop for one page.
 *
 * Node order per turn: `agent` (carries the prediction), then the tool
 * node named by the action (carries the observation), then
 * `update_scratchpad`. ANSWER ends the stream; a retry goes straight back
 * to `agent`.
 */
export function createAgentGraph(deps: AgentGraphDeps): DecisionGraph {
  return {
    stream(question: string, signal: AbortSignal): AsyncIterable<StepEvent> {
      return runGraph(deps, question, signal);
    },
  };
}

// ── Graph loop ───────────────────────────────────────────────

async function* runGraph(
  deps: AgentGraphDeps,
  question: string,
  signal: AbortSignal,
): AsyncGenerator<StepEvent> {
  let scratchpad: string | null = null;

  while (!signal.aborted) {
    const marked = await deps.annotate();
    if (signal.aborted) return;

    const prediction = await predict(deps.llm, question, marked, scratchpad);
    yield { node: 'agent', prediction };

    if (prediction.kind === 'answer') return;
    if (prediction.kind === 'retry') continue;
    if (signal.aborted) return;

    const tool = deps.tools[prediction.name];
    const observation = tool
      ? await tool({ args: prediction.args, bboxes: marked.bboxes })
      : `Unsupported action "${prediction.name}". Use one of: ${Object.keys(deps.tools).join(', ')}.`;
    yield { node: prediction.name, observation };

    scratchpad = updateScratchpad(scratchpad, observation);
    yield { node: 'update_scratchpad' };
  }
}

// ── Agent node ───────────────────────────────────────────────

async function predict(
  llm: LLMClient,
  question: string,
  marked: MarkedPage,
  scratchpad: string | null,
): Promise<AgentAction> {
  const prompt = await buildStepPrompt({
    question,
    bboxes: marked.bboxes,
    scratchpad,
  });

  log.llm(`Agent deciding (${String(marked.bboxes.length)} labelled elements)...`);

  const raw = await llm.complete({
    system: prompt,
    user: question,
    image: { base64: marked.img, mimeType: 'image/png' },
  });

  return parseAction(raw);
}
