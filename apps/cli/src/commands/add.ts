import { Command } from 'commander';
import type { Workspace } from '@sortbox/core';
import { DEFAULT_SECTION_ID, Priority, resolveSection } from '@sortbox/core';
import * as out from '../output.js';
import { $try, requirePriority, requireReminder, requireTitle, warnIfUnknownSection } from '../helpers.js';

export interface TaskOptions {
  title?: string;
  description?: string;
  priority?: string;
  section?: string;
  reminder?: string;
}

export function createAddCommand(ws: Workspace): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title...>', 'The task title')
    .option('-d, --description <text>', 'Longer description')
    .option('-p, --priority <level>', 'low, medium or high', 'low')
    .option('-s, --section <id>', 'Section id', DEFAULT_SECTION_ID)
    .option('-r, --reminder <when>', 'none, tonight, tomorrow, next-week or yyyy-MM-dd [HH:mm]')
    .action((words: string[], opts: TaskOptions) => $try(() => {
      const title = requireTitle(words);
      const priority = opts.priority ? requirePriority(opts.priority) : Priority.Low;
      const reminder = opts.reminder ? requireReminder(opts.reminder) : null;
      const sectionId = opts.section ?? DEFAULT_SECTION_ID;
      warnIfUnknownSection(ws, sectionId);

      const task = ws.tasks.add({ title, description: opts.description ?? '', priority, sectionId, reminder });
      const section = resolveSection(ws.sections.list(), task.sectionId);
      out.success(`Added task ${task.id} to '${section.title}'`);
    }));
}
