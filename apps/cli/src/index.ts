#!/usr/bin/env node

import { createInterface } from 'node:readline';
import { Command } from 'commander';
import type { CliFlags } from './config.js';
import { resolveConfig } from './config.js';
import { createSession, runLine } from './session.js';

const program = new Command()
  .name('sortbox')
  .description('Interactive section and task manager. Type "help" for commands, "exit" to quit.')
  .version('0.1.0')
  .option('--verbose', 'Log every store change notification')
  .option('--inbox-title <title>', 'Title of the default section')
  .parse();

const config = resolveConfig(program.opts<CliFlags>());
const session = createSession(config);

const interactive = process.stdin.isTTY === true;
const rl = createInterface({ input: process.stdin, output: process.stdout, terminal: interactive });
rl.setPrompt('sortbox> ');
if (interactive) rl.prompt();

for await (const line of rl) {
  if (runLine(session, line) === 'exit') break;
  if (interactive) rl.prompt();
}
rl.close();
