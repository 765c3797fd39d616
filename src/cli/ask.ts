import type { Command } from 'commander';

import { WebAgentClient } from '../client/webAgentClient.js';
import { LIMITS, SERVER, TIMEOUTS } from '../config/defaults.js';

const DEFAULT_URL = `http://localhost:${String(SERVER.PORT)}`;

function fail(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${message}\n`);
  process.exitCode = 1;
}

// ── Ask command ──────────────────────────────────────────────

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Open a session on a running server, ask one question, print the answer')
    .argument('<question>', 'Question for the web agent')
    .option('--url <url>', 'Server base URL', DEFAULT_URL)
    .option('--max-steps <n>', 'Step budget for the agent', String(LIMITS.MAX_STEPS))
    .option(
      '--timeout-minutes <n>',
      'Idle timeout of the session',
      String(TIMEOUTS.SESSION_TIMEOUT_MINUTES),
    )
    .option(
      '--poll-interval <seconds>',
      'Seconds between status polls',
      String(TIMEOUTS.POLL_INTERVAL / 1000),
    )
    .action(
      async (
        question: string,
        opts: {
          url: string;
          maxSteps: string;
          timeoutMinutes: string;
          pollInterval: string;
        },
      ) => {
        const client = new WebAgentClient({ baseUrl: opts.url });

        try {
          const answer = await client.withSession(
            (c) =>
              c.queryAsync(question, {
                maxSteps: Number(opts.maxSteps) || LIMITS.MAX_STEPS,
                pollIntervalMs:
                  (Number(opts.pollInterval) || TIMEOUTS.POLL_INTERVAL / 1000) * 1000,
              }),
            Number(opts.timeoutMinutes) || TIMEOUTS.SESSION_TIMEOUT_MINUTES,
          );
          process.stdout.write(`${answer ?? ''}\n`);
        } catch (err) {
          fail(err);
        }
      },
    );
}

// ── Sessions command ─────────────────────────────────────────

export function registerSessionsCommand(program: Command): void {
  program
    .command('sessions')
    .description('List the sessions of a running server as JSON')
    .option('--url <url>', 'Server base URL', DEFAULT_URL)
    .action(async (opts: { url: string }) => {
      try {
        const client = new WebAgentClient({ baseUrl: opts.url });
        const list = await client.listSessions();
        process.stdout.write(JSON.stringify(list, null, 2) + '\n');
      } catch (err) {
        fail(err);
      }
    });
}
