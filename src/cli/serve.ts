import type { Command } from 'commander';

import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMConfig } from '../llm/index.js';
import { SERVER } from '../config/defaults.js';
import { loadConfigFile, loadOptionalConfigFile } from '../config/loader.js';
import type { ServerConfig } from '../schema/config.js';
import { startServer } from '../server/server.js';
import * as log from '../utils/logger.js';

interface ServeOptions {
  config?: string;
  port?: string;
  host?: string;
  headless?: true;
}

// ── Config merge ─────────────────────────────────────────────

/** CLI flags take precedence over the config file. */
export function mergeServeOptions(
  fileConfig: ServerConfig,
  opts: ServeOptions,
): ServerConfig {
  return {
    ...fileConfig,
    port: opts.port !== undefined ? Number(opts.port) : fileConfig.port,
    host: opts.host ?? fileConfig.host,
    headless: opts.headless ?? fileConfig.headless,
  };
}

/** Provider and model from the config file win over `LLM_PROVIDER` / `LLM_MODEL`. */
export function resolveLLMConfig(
  config: ServerConfig,
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  return loadLLMConfig(env, { provider: config.provider, model: config.model });
}

// ── Command registration ─────────────────────────────────────

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Launch chromium and serve the session API')
    .option('--config <path>', `Path to config file (default: ${SERVER.CONFIG_FILE} if present)`)
    .option('--port <n>', 'Port to listen on')
    .option('--host <host>', 'Interface to bind')
    .option('--headless', 'Run browser headless')
    .action(async (opts: ServeOptions) => {
      let fileConfig: ServerConfig;
      try {
        fileConfig = opts.config !== undefined
          ? await loadConfigFile(opts.config)
          : await loadOptionalConfigFile(SERVER.CONFIG_FILE);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Config error: ${message}\n`);
        process.exitCode = 4;
        return;
      }

      const config = mergeServeOptions(fileConfig, opts);

      try {
        const llm = createLLMClient(resolveLLMConfig(config));
        const server = await startServer(config, llm);

        const stop = (signal: string): void => {
          log.info(`Received ${signal}`);
          server.shutdown().then(
            () => {
              process.exitCode = 0;
            },
            (err: unknown) => {
              const message = err instanceof Error ? err.message : String(err);
              log.error(`Shutdown failed: ${message}`);
              process.exitCode = 1;
            },
          );
        };
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = 4;
      }
    });
}
