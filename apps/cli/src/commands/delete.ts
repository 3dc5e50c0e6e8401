import { Command } from 'commander';
import type { Workspace } from '@sortbox/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createDeleteCommand(ws: Workspace): Command {
  return new Command('delete')
    .description('Delete one or more tasks')
    .argument('<ids...>', 'The id(s) of the task(s) to delete')
    .action((ids: string[]) => $try(() => {
      for (const id of ids) {
        const existed = ws.tasks.has(id);
        ws.tasks.delete(id);
        if (existed) out.success(`Deleted task ${id}`);
        else out.info(`No task with id ${id}`);
      }
    }));
}
