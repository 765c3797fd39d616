import { describe, expect, it } from 'vitest';

import { buildStepPrompt, formatDescriptions } from '../../src/core/prompt.js';
import type { BoundingBox } from '../../src/schema/action.js';

const BOXES: BoundingBox[] = [
  { x: 10, y: 20, text: 'Go', type: 'button', ariaLabel: 'Search button' },
  { x: 40, y: 80, text: 'About', type: 'a', ariaLabel: '  ' },
];

describe('formatDescriptions', () => {
  it('prefers the aria label and falls back to the text', () => {
    expect(formatDescriptions(BOXES)).toBe(
      '\nValid Bounding Boxes:\n0 (<button/>): "Search button"\n1 (<a/>): "About"',
    );
  });

  it('still emits the heading with no boxes', () => {
    expect(formatDescriptions([])).toBe('\nValid Bounding Boxes:\n');
  });
});

describe('buildStepPrompt', () => {
  it('fills question, labels and scratchpad', async () => {
    const prompt = await buildStepPrompt({
      question: 'Who wrote Dune?',
      bboxes: BOXES,
      scratchpad: 'Previous action observations:\n\n1. Clicked 0',
    });

    expect(prompt).toContain('Question: Who wrote Dune?\n');
    expect(prompt).toContain('0 (<button/>): "Search button"');
    expect(prompt).toContain('\n1. Clicked 0');
    expect(prompt).not.toContain('{{');
  });

  it('keeps dollar sequences in the question literal', async () => {
    const prompt = await buildStepPrompt({
      question: 'price in $& and $1',
      bboxes: [],
      scratchpad: null,
    });
    expect(prompt).toContain('Question: price in $& and $1\n');
  });
});
