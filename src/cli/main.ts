#!/usr/bin/env node

/**
 * web-searcher CLI entry point.
 * Thin wrapper — all logic delegated to the server and client modules.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerServeCommand } from './serve.js';
import { registerAskCommand, registerSessionsCommand } from './ask.js';

const program = new Command();

program
  .name('web-searcher')
  .description(
    'Stateful browsing sessions driven by an LLM web agent. Serve the HTTP API, or ask it questions.',
  )
  .version('0.1.0');

registerServeCommand(program);
registerAskCommand(program);
registerSessionsCommand(program);

program.parse();
