import { Command } from 'commander';
import type { Workspace } from '@sortbox/core';
import { unwrap } from '@sortbox/core';
import * as out from '../output.js';
import { $try, requirePriority, requireReminder, requireTitle, warnIfUnknownSection } from '../helpers.js';
import type { TaskOptions } from './add.js';

export function createEditCommand(ws: Workspace): Command {
  return new Command('edit')
    .description('Change a task; fields not given keep their current value')
    .argument('<id>', 'The task id')
    .option('-t, --title <text>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('-p, --priority <level>', 'low, medium or high')
    .option('-s, --section <id>', 'New section id')
    .option('-r, --reminder <when>', 'none, tonight, tomorrow, next-week or yyyy-MM-dd [HH:mm]')
    .action((id: string, opts: TaskOptions) => $try(() => {
      // The store replaces every field, so start from the current values
      const task = unwrap(ws.tasks.getById(id));
      const sectionId = opts.section ?? task.sectionId;
      if (opts.section !== undefined) warnIfUnknownSection(ws, sectionId);

      const result = ws.tasks.update(id, {
        title: opts.title !== undefined ? requireTitle([opts.title]) : task.title,
        description: opts.description ?? task.description,
        priority: opts.priority !== undefined ? requirePriority(opts.priority) : task.priority,
        sectionId,
        reminder: opts.reminder !== undefined ? requireReminder(opts.reminder) : task.reminder,
      });
      out.printResult(result, updated => `Updated task ${updated.id}`);
    }));
}
