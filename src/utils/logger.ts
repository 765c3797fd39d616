/**
 * Terminal logger.
 *
 * Everything goes to stderr so `ask` and `sessions` can pipe stdout.
 * Lines carry a clock time because the server runs for hours and
 * several sessions interleave.
 */

type Kind = 'info' | 'detail' | 'warn' | 'error' | 'session' | 'step' | 'llm';

const PREFIX: Record<Kind, string> = {
  info: 'ℹ️ ',
  detail: '  ',
  warn: '⚠️ ',
  error: '💥',
  session: '🗂️ ',
  step: '📋',
  llm: '🧠',
};

const RULE = '─'.repeat(50);

// ── Output ───────────────────────────────────────────────────

function clock(): string {
  return new Date().toISOString().slice(11, 19);
}

function emit(kind: Kind, message: string): void {
  process.stderr.write(`${clock()} ${PREFIX[kind]} ${message}\n`);
}

/** Session ids are UUIDs; the first block is enough to tell them apart. */
function tag(sessionId: string): string {
  return `[${sessionId.slice(0, 8)}]`;
}

// ── Public API ───────────────────────────────────────────────

export const info = (message: string): void => emit('info', message);
export const detail = (message: string): void => emit('detail', message);
export const warn = (message: string): void => emit('warn', message);
export const error = (message: string): void => emit('error', message);
export const llm = (message: string): void => emit('llm', message);

export function section(title: string): void {
  process.stderr.write(`\n${RULE}\n▶  ${title}\n${RULE}\n`);
}

export function session(sessionId: string, message: string): void {
  emit('session', `${tag(sessionId)} ${message}`);
}

export function step(sessionId: string, index: number, action: string): void {
  emit('step', `${tag(sessionId)} step ${String(index)}: ${action}`);
}
