import type { Page } from 'playwright';

import type { BoundingBox } from '../schema/action.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface ToolInput {
  args: readonly string[] | null;
  bboxes: readonly BoundingBox[];
}

/** A browser tool returns an observation for the agent's scratchpad. */
export type BrowserTool = (input: ToolInput) => Promise<string>;

export type ToolSet = Readonly<Record<string, BrowserTool>>;

export interface BrowserToolOptions {
  searchEngineUrl: string;
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Tools the agent can name in its `Action:` line, bound to one page.
 * Bad arguments become an observation, so the agent can correct itself.
 */
export function createBrowserTools(
  page: Page,
  options: BrowserToolOptions,
): ToolSet {
  return {
    Click: ({ args, bboxes }) => click(page, args, bboxes),
    Type: ({ args, bboxes }) => typeText(page, args, bboxes),
    Scroll: ({ args, bboxes }) => scroll(page, args, bboxes),
    Wait: () => wait(page),
    GoBack: () => goBack(page),
    Google: () => toSearchEngine(page, options.searchEngineUrl),
  };
}

// ── Tools ────────────────────────────────────────────────────

async function click(
  page: Page,
  args: readonly string[] | null,
  bboxes: readonly BoundingBox[],
): Promise<string> {
  if (args === null || args.length !== 1) {
    return `Failed to click bounding box labeled as number ${formatArgs(args)}`;
  }

  const bboxId = args[0] ?? '';
  const bbox = lookupBox(bboxes, bboxId);
  if (!bbox) {
    return `No bounding box labeled ${bboxId}`;
  }

  await page.mouse.click(bbox.x, bbox.y);
  return `Clicked ${bboxId}`;
}

async function typeText(
  page: Page,
  args: readonly string[] | null,
  bboxes: readonly BoundingBox[],
): Promise<string> {
  if (args === null || args.length !== 2) {
    return `Failed to type in element from bounding box labeled as number ${formatArgs(args)}`;
  }

  const [bboxId = '', text = ''] = args;
  const bbox = lookupBox(bboxes, bboxId);
  if (!bbox) {
    return `No bounding box labeled ${bboxId}`;
  }

  await page.mouse.click(bbox.x, bbox.y);
  await page.keyboard.press('ControlOrMeta+A');
  await page.keyboard.press('Backspace');
  await page.keyboard.type(text);
  await page.keyboard.press('Enter');
  return `Typed ${text} and submitted`;
}

async function scroll(
  page: Page,
  args: readonly string[] | null,
  bboxes: readonly BoundingBox[],
): Promise<string> {
  if (args === null || args.length !== 2) {
    return 'Failed to scroll due to incorrect arguments.';
  }

  const [target = '', direction = ''] = args;
  const sign = direction.toLowerCase() === 'up' ? -1 : 1;

  if (target.toUpperCase() === 'WINDOW') {
    const amount = sign * LIMITS.WINDOW_SCROLL_PX;
    await page.evaluate((dy) => window.scrollBy(0, dy), amount);
    return `Scrolled ${direction} in window`;
  }

  const bbox = lookupBox(bboxes, target);
  if (!bbox) {
    return `No bounding box labeled ${target}`;
  }

  await page.mouse.move(bbox.x, bbox.y);
  await page.mouse.wheel(0, sign * LIMITS.ELEMENT_SCROLL_PX);
  return `Scrolled ${direction} in element`;
}

async function wait(page: Page): Promise<string> {
  await page.waitForTimeout(TIMEOUTS.TOOL_WAIT);
  return `Waited for ${String(TIMEOUTS.TOOL_WAIT / 1000)}s.`;
}

async function goBack(page: Page): Promise<string> {
  await page.goBack({ timeout: TIMEOUTS.NAVIGATION_TIMEOUT });
  return `Navigated back a page to ${page.url()}.`;
}

async function toSearchEngine(page: Page, url: string): Promise<string> {
  await page.goto(url, {
    timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
    waitUntil: 'domcontentloaded',
  });
  return `Navigated to ${new URL(url).host}.`;
}

// ── Helpers ──────────────────────────────────────────────────

function lookupBox(
  bboxes: readonly BoundingBox[],
  label: string,
): BoundingBox | undefined {
  if (!/^\d+$/.test(label)) return undefined;
  return bboxes[Number(label)];
}

function formatArgs(args: readonly string[] | null): string {
  return args === null ? 'None' : `[${args.join(', ')}]`;
}
