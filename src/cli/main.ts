#!/usr/bin/env node

/**
 * taskrelay CLI entry point.
 * Thin wrapper; all logic delegated to core and the server.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerConfigCommand, registerRunCommand, registerServeCommand } from './run.js';

const program = new Command();

program
  .name('taskrelay')
  .description(
    'Run natural-language browser instructions with ordered fallback across Stagehand and the browser-use CLI.',
  )
  .version('0.1.0');

registerServeCommand(program);
registerRunCommand(program);
registerConfigCommand(program);

await program.parseAsync();
