import { Command } from 'commander';
import type { Workspace } from '@sortbox/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createCheckCommand(ws: Workspace): Command {
  return new Command('check')
    .description('Toggle one or more tasks between open and done')
    .argument('<ids...>', 'The id(s) of the task(s) to toggle')
    .action((ids: string[]) => $try(() => {
      for (const id of ids) {
        out.printResult(ws.tasks.toggleCompleted(id), task =>
          task.completed ? `Completed ${task.id}` : `Reopened ${task.id}`);
      }
    }));
}
