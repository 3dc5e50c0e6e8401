import { Command } from 'commander';
import chalk from 'chalk';
import type { Workspace } from '@sortbox/core';
import { PriorityName, resolveSection, unwrap } from '@sortbox/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createShowCommand(ws: Workspace): Command {
  return new Command('show')
    .description('Show a task in full')
    .argument('<id>', 'The task id')
    .action((id: string) => $try(() => {
      const task = unwrap(ws.tasks.getById(id));
      const section = resolveSection(ws.sections.list(), task.sectionId);
      out.info(chalk.bold(task.title));
      out.info(`  ${chalk.dim('id:')}       ${task.id}`);
      out.info(`  ${chalk.dim('section:')}  ${section.title}`);
      out.info(`  ${chalk.dim('priority:')} ${PriorityName[task.priority]}`);
      out.info(`  ${chalk.dim('status:')}   ${task.completed ? 'Done' : 'Open'}`);
      if (task.reminder) out.info(`  ${chalk.dim('reminder:')} ${out.formatTimestamp(task.reminder)}`);
      out.info(`  ${chalk.dim('created:')}  ${out.formatTimestamp(task.createdAt)}`);
      if (task.description) {
        out.info('');
        out.info(task.description);
      }
    }));
}
