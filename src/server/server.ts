import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';

import type { Express } from 'express';

import type { LLMClient } from '../llm/index.js';
import type { ServerConfig } from '../schema/config.js';
import { createSessionResourceFactory, launchBrowser } from '../browser/runner.js';
import { QueryEngine } from '../core/queryEngine.js';
import { SessionRegistry } from '../session/registry.js';
import * as log from '../utils/logger.js';
import { createApp } from './app.js';

// ── Public types ─────────────────────────────────────────────

export interface RunningServer {
  readonly url: string;
  readonly registry: SessionRegistry;
  /** Close every session, stop listening, then close the browser. */
  shutdown(): Promise<void>;
}

// ── Listen helper ────────────────────────────────────────────

export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

export function serverUrl(server: Server): string {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  const { address: host, port }: AddressInfo = address;
  const hostname = host.includes(':') ? `[${host}]` : host;
  return `http://${hostname}:${String(port)}`;
}

// ── Startup / shutdown ───────────────────────────────────────

export async function startServer(
  config: ServerConfig,
  llm: LLMClient,
): Promise<RunningServer> {
  log.section('web-searcher');
  log.info(`LLM provider: ${llm.provider}`);
  log.info(`Launching chromium (headless: ${String(config.headless)})`);
  const browser = await launchBrowser({ headless: config.headless });

  const registry = new SessionRegistry({
    sweepIntervalMs: config.sweepIntervalSeconds * 1000,
  });
  registry.initialize(
    createSessionResourceFactory(browser, llm, {
      startUrl: config.startUrl,
      searchEngineUrl: config.searchEngineUrl,
    }),
  );

  const app = createApp({ registry, engine: new QueryEngine() });

  let server: Server;
  try {
    server = await listen(app, config.port, config.host);
  } catch (err) {
    await registry.closeAll();
    await browser.close();
    throw err;
  }

  const url = serverUrl(server);
  log.info(`Listening on ${url}`);

  return {
    url,
    registry,
    async shutdown(): Promise<void> {
      log.info('Shutting down - closing all sessions...');
      await registry.closeAll();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      await browser.close();
    },
  };
}
