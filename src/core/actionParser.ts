import { ANSWER_ACTION } from '../schema/action.js';
import type { AgentAction } from '../schema/action.js';

const ACTION_PREFIX = 'Action: ';

// ── Parser ───────────────────────────────────────────────────

/**
 * Turn one raw LLM reply into a structured action.
 *
 * Only the last non-empty line is read. It must look like
 * `Action: <Name> [arg1; arg2; ...]`. Anything else yields a retry
 * action carrying the full reply, so the agent can be re-prompted.
 */
export function parseAction(text: string): AgentAction {
  const lines = text.trim().split('\n');
  const actionBlock = lines[lines.length - 1] ?? '';

  if (!actionBlock.startsWith(ACTION_PREFIX)) {
    return { kind: 'retry', diagnostic: `Could not parse LLM output: ${text}` };
  }

  const actionStr = actionBlock.slice(ACTION_PREFIX.length).trim();
  const split = /\s+/.exec(actionStr);

  const name = (split ? actionStr.slice(0, split.index) : actionStr).trim();
  const remainder = split ? actionStr.slice(split.index + split[0].length) : '';

  if (name.length === 0) {
    return { kind: 'retry', diagnostic: `Could not parse LLM output: ${text}` };
  }

  // The prompt asks for `ANSWER; <content>`; models also drop the space.
  const [head = '', ...glued] = name.split(';');
  if (head === ANSWER_ACTION) {
    const content = [glued.join(';'), remainder].filter((part) => part.length > 0).join(' ');
    return { kind: 'answer', args: content.length > 0 ? splitArgs(content) : null };
  }

  const args = remainder.length > 0 ? splitArgs(remainder) : null;
  return { kind: 'tool', name, args };
}

// ── Helpers ──────────────────────────────────────────────────

function splitArgs(remainder: string): string[] {
  return remainder.split(';').map((piece) => stripBrackets(piece.trim()));
}

function stripBrackets(value: string): string {
  let result = value;
  if (result.startsWith('[')) result = result.slice(1);
  if (result.endsWith(']')) result = result.slice(0, -1);
  return result;
}
