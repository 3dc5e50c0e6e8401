/**
 * One interactive session: a workspace that lives as long as the process,
 * and a commander program parsed once per input line.
 */

import { Command, CommanderError } from 'commander';
import { createWorkspace } from '@sortbox/core';
import type { Workspace } from '@sortbox/core';
import type { CliConfig } from './config.js';
import * as out from './output.js';
import { splitArgs } from './helpers.js';

import { createSectionsCommand } from './commands/sections.js';
import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createEditCommand } from './commands/edit.js';
import { createCheckCommand } from './commands/check.js';
import { createMoveCommand } from './commands/move.js';
import { createDeleteCommand } from './commands/delete.js';

export interface Session {
  readonly workspace: Workspace;
  readonly config: CliConfig;
}

export type LineOutcome = 'continue' | 'exit';

const EXIT_WORDS = new Set(['exit', 'quit']);

export function createSession(config: CliConfig, options: { now?: () => Date } = {}): Session {
  const workspace = createWorkspace({
    defaultSectionTitle: config.inboxTitle,
    now: options.now,
    onListenerError: (err) => out.error(`Change listener failed: ${err instanceof Error ? err.message : String(err)}`),
  });

  if (config.verbose) {
    workspace.sections.subscribe(() => out.debug(`sections changed (${workspace.sections.list().length} total)`));
    workspace.tasks.subscribe(() => out.debug(`tasks changed (${workspace.tasks.list().length} total)`));
  }

  return { workspace, config };
}

/** Make a command and all of its subcommands throw instead of exiting, and print through output.ts */
function keepSessionAlive(cmd: Command): void {
  for (const sub of cmd.commands) {
    sub.copyInheritedSettings(cmd);
    keepSessionAlive(sub);
  }
}

export function createProgram(session: Session): Command {
  const ws = session.workspace;
  const program = new Command()
    .name('sortbox')
    .description('Sections and tasks, kept in memory for this session')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => out.info(str.trimEnd()),
      writeErr: (str) => out.error(str.trimEnd()),
    })
    .showSuggestionAfterError(true);

  program.addCommand(createSectionsCommand(ws));
  program.addCommand(createAddCommand(ws));
  program.addCommand(createListCommand(ws));
  program.addCommand(createShowCommand(ws));
  program.addCommand(createEditCommand(ws));
  program.addCommand(createCheckCommand(ws));
  program.addCommand(createMoveCommand(ws));
  program.addCommand(createDeleteCommand(ws));

  keepSessionAlive(program);
  return program;
}

/** Run one input line. Parse errors are printed by commander and leave the session running. */
export function runLine(session: Session, line: string): LineOutcome {
  const args = splitArgs(line);
  const first = args[0];
  if (first === undefined) return 'continue';
  if (EXIT_WORDS.has(first)) return 'exit';

  try {
    createProgram(session).parse(args, { from: 'user' });
  } catch (err: unknown) {
    if (!(err instanceof CommanderError)) throw err;
  }
  return 'continue';
}
