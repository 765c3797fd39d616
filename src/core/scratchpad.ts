export const SCRATCHPAD_HEADER = 'Previous action observations:\n';

// ── Error ────────────────────────────────────────────────────

export class ScratchpadCorruptedError extends Error {
  constructor(lastLine: string) {
    super(`Scratchpad last line has no step number: "${lastLine}"`);
    this.name = 'ScratchpadCorruptedError';
  }
}

// ── Accumulator ──────────────────────────────────────────────

/**
 * Append one observation to the numbered turn history.
 *
 * The step number is read back from the previous text, so the history
 * is the only state. A last line without a leading number means the
 * history was corrupted and throws.
 */
export function updateScratchpad(
  previous: string | null,
  observation: string,
): string {
  let txt: string;
  let step: number;

  if (previous) {
    txt = previous;
    const lastLine = previous.slice(previous.lastIndexOf('\n') + 1);
    const match = /^\d+/.exec(lastLine);
    if (!match) {
      throw new ScratchpadCorruptedError(lastLine);
    }
    step = Number(match[0]) + 1;
  } else {
    txt = SCRATCHPAD_HEADER;
    step = 1;
  }

  return `${txt}\n${String(step)}. ${observation}`;
}
