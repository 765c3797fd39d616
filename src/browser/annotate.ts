import type { Page } from 'playwright';

import { boundingBoxListSchema } from '../schema/action.js';
import type { BoundingBox, MarkedPage } from '../schema/action.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';

// ── Public API ───────────────────────────────────────────────

/**
 * Label every visible interactive element, screenshot the page with the
 * labels drawn on, then remove them again. Label `n` in the screenshot is
 * `bboxes[n]`.
 */
export async function annotatePage(page: Page): Promise<MarkedPage> {
  const bboxes = await markWithRetry(page);

  try {
    const screenshot = await page.screenshot({ type: 'png' });
    return { img: screenshot.toString('base64'), bboxes };
  } finally {
    await page.evaluate(unmarkPage);
  }
}

// ── Retry ────────────────────────────────────────────────────
// Marking fails while the page is mid-navigation; give it time to settle.

async function markWithRetry(page: Page): Promise<BoundingBox[]> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= LIMITS.MARK_PAGE_ATTEMPTS; attempt++) {
    try {
      const raw = await page.evaluate(markPage);
      return boundingBoxListSchema.parse(raw);
    } catch (err) {
      lastError = err;
      if (attempt === LIMITS.MARK_PAGE_ATTEMPTS) break;
      log.detail(`Marking page failed (attempt ${String(attempt)}), retrying...`);
      await new Promise((r) => setTimeout(r, TIMEOUTS.MARK_PAGE_RETRY_WAIT));
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`Could not mark page: ${String(lastError)}`);
}

// ── Browser-context functions ────────────────────────────────
// These functions are serialized and executed inside the browser.
// They must NOT reference any outer-scope variables.

function markPage(): BoundingBox[] {
  const markerAttribute = 'data-web-searcher-label';

  document
    .querySelectorAll(`[${markerAttribute}]`)
    .forEach((el) => el.remove());

  const viewportWidth = Math.max(
    document.documentElement.clientWidth || 0,
    window.innerWidth || 0,
  );
  const viewportHeight = Math.max(
    document.documentElement.clientHeight || 0,
    window.innerHeight || 0,
  );

  function isInteractive(el: Element): boolean {
    const tag = el.tagName;
    if (
      tag === 'INPUT' ||
      tag === 'TEXTAREA' ||
      tag === 'SELECT' ||
      tag === 'BUTTON' ||
      tag === 'A' ||
      tag === 'IFRAME' ||
      tag === 'VIDEO'
    ) {
      return true;
    }
    if (el.getAttribute('role') === 'button' || el.hasAttribute('onclick')) {
      return true;
    }
    return window.getComputedStyle(el).cursor === 'pointer';
  }

  interface Candidate {
    el: Element;
    rect: DOMRect;
    text: string;
    type: string;
    ariaLabel: string;
  }

  const candidates: Candidate[] = [];

  document.querySelectorAll('*').forEach((el) => {
    if (!isInteractive(el)) return;

    const rect = el.getBoundingClientRect();
    const visible =
      rect.width > 0 &&
      rect.height > 0 &&
      rect.right > 0 &&
      rect.bottom > 0 &&
      rect.left < viewportWidth &&
      rect.top < viewportHeight;
    if (!visible) return;

    const centerX = rect.left + rect.width / 2;
    const centerY = rect.top + rect.height / 2;
    const topmost = document.elementFromPoint(centerX, centerY);
    if (topmost !== el && !el.contains(topmost)) return;

    candidates.push({
      el,
      rect,
      text: (el.textContent ?? '').trim().replace(/\s{2,}/g, ' '),
      type: el.tagName.toLowerCase(),
      ariaLabel: el.getAttribute('aria-label') ?? '',
    });
  });

  // Drop elements that merely wrap another candidate.
  const leaves = candidates.filter(
    (outer) => !candidates.some((inner) => inner !== outer && outer.el.contains(inner.el)),
  );

  return leaves.map((candidate, index) => {
    const { rect } = candidate;
    const colour = `hsl(${String((index * 47) % 360)}, 90%, 40%)`;

    const box = document.createElement('div');
    box.setAttribute(markerAttribute, '');
    box.style.position = 'fixed';
    box.style.left = `${String(rect.left)}px`;
    box.style.top = `${String(rect.top)}px`;
    box.style.width = `${String(rect.width)}px`;
    box.style.height = `${String(rect.height)}px`;
    box.style.outline = `2px dashed ${colour}`;
    box.style.pointerEvents = 'none';
    box.style.zIndex = '2147483647';

    const label = document.createElement('span');
    label.textContent = String(index);
    label.style.position = 'absolute';
    label.style.top = '-19px';
    label.style.left = '0';
    label.style.background = colour;
    label.style.color = 'white';
    label.style.padding = '2px 4px';
    label.style.fontSize = '12px';
    label.style.borderRadius = '2px';
    box.appendChild(label);

    document.body.appendChild(box);

    return {
      x: rect.left + rect.width / 2,
      y: rect.top + rect.height / 2,
      text: candidate.text,
      type: candidate.type,
      ariaLabel: candidate.ariaLabel,
    };
  });
}

function unmarkPage(): void {
  document
    .querySelectorAll('[data-web-searcher-label]')
    .forEach((el) => el.remove());
}
