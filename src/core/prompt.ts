import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { BoundingBox } from '../schema/action.js';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

let stepTemplate: Promise<string> | undefined;

function loadStepTemplate(): Promise<string> {
  stepTemplate ??= readFile(path.join(PROMPTS_DIR, 'agent_step.txt'), 'utf-8');
  return stepTemplate;
}

// ── Element descriptions ─────────────────────────────────────

/** One line per label, e.g. `3 (<button/>): "Search"`. */
export function formatDescriptions(bboxes: readonly BoundingBox[]): string {
  const labels = bboxes.map((bbox, i) => {
    const text = bbox.ariaLabel.trim() ? bbox.ariaLabel : bbox.text;
    return `${String(i)} (<${bbox.type}/>): "${text}"`;
  });
  return '\nValid Bounding Boxes:\n' + labels.join('\n');
}

// ── Prompt building ──────────────────────────────────────────

export interface StepPromptInput {
  question: string;
  bboxes: readonly BoundingBox[];
  scratchpad: string | null;
}

export async function buildStepPrompt(input: StepPromptInput): Promise<string> {
  const template = await loadStepTemplate();

  // Replacer functions keep `$` sequences in page text literal.
  return template
    .replace('{{input}}', () => input.question)
    .replace('{{bbox_descriptions}}', () => formatDescriptions(input.bboxes))
    .replace('{{scratchpad}}', () => input.scratchpad ?? '');
}
