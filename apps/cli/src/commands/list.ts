import { Command } from 'commander';
import chalk from 'chalk';
import type { Workspace } from '@sortbox/core';
import { groupBySection } from '@sortbox/core';
import * as out from '../output.js';
import { $try } from '../helpers.js';

export function createListCommand(ws: Workspace): Command {
  return new Command('list')
    .description('List tasks by section, optionally filtered')
    .argument('[query...]', 'Search text and filters (priority:high status:done section:<id> has:reminder)')
    .option('-s, --section <id>', 'Only this section')
    .action((words: string[], opts: { section?: string }) => $try(() => {
      const query = words.join(' ');
      let found = ws.tasks.search(query);
      if (opts.section) {
        const sectionId = opts.section;
        found = found.filter(t => t.sectionId === sectionId);
      }

      if (found.length === 0) {
        out.info(query || opts.section
          ? 'No matching tasks'
          : 'No tasks saved yet... use the add command to create one');
        return;
      }

      for (const group of groupBySection(ws.sections.list(), found)) {
        if (group.tasks.length === 0) continue;
        out.info(chalk.bold.underline(group.section.title));
        for (const task of group.tasks) {
          out.info(`  ${out.formatTaskLine(task)}`);
        }
      }
    }));
}
