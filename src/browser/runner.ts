import { chromium } from 'playwright';
import type { Browser } from 'playwright';

import type { LLMClient } from '../llm/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { createAgentGraph } from '../core/agentGraph.js';
import * as log from '../utils/logger.js';
import type { SessionResourceFactory } from '../session/types.js';
import { annotatePage } from './annotate.js';
import { createBrowserTools } from './tools.js';

// ── Public types ─────────────────────────────────────────────

export interface RunnerConfig {
  headless: boolean;
}

export interface SessionPageOptions {
  startUrl: string;
  searchEngineUrl: string;
}

// ── Browser launcher ─────────────────────────────────────────

export async function launchBrowser(config: RunnerConfig): Promise<Browser> {
  return chromium.launch({ headless: config.headless });
}

// ── Session resources ────────────────────────────────────────

/**
 * Each call opens a fresh page on the start URL and binds an agent graph
 * to it. A page that fails to load is closed before the error escapes.
 */
export function createSessionResourceFactory(
  browser: Browser,
  llm: LLMClient,
  options: SessionPageOptions,
): SessionResourceFactory {
  return async () => {
    const page = await browser.newPage();

    try {
      await page.goto(options.startUrl, {
        timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
        waitUntil: 'domcontentloaded',
      });
    } catch (err) {
      await page.close().catch((closeErr: unknown) => {
        log.warn(`Could not close page after failed navigation: ${String(closeErr)}`);
      });
      throw err;
    }

    const graph = createAgentGraph({
      llm,
      annotate: () => annotatePage(page),
      tools: createBrowserTools(page, {
        searchEngineUrl: options.searchEngineUrl,
      }),
    });

    return { context: page, graph };
  };
}
