import { Command } from 'commander';
import chalk from 'chalk';
import type { Workspace } from '@sortbox/core';
import { DEFAULT_SECTION_ID, resolveSection, summarizeSections } from '@sortbox/core';
import * as out from '../output.js';
import { $try, requireTitle } from '../helpers.js';

export function createSectionsCommand(ws: Workspace): Command {
  const sectionsCommand = new Command('sections')
    .description('List and manage sections')
    .action(() => $try(() => {
      out.info('Sections:');
      for (const { section, taskCount, completedCount } of summarizeSections(ws.sections.list(), ws.tasks.list())) {
        const label = section.id === DEFAULT_SECTION_ID ? chalk.bold(`${section.title} (default)`) : section.title;
        out.info(`  ${chalk.dim(section.id)}  ${label}  ${chalk.dim(out.formatCount(taskCount, completedCount))}`);
      }
    }));

  sectionsCommand.addCommand(
    new Command('add')
      .description('Create a section')
      .argument('<title...>', 'The section title')
      .action((words: string[]) => $try(() => {
        const section = ws.sections.add(requireTitle(words));
        out.success(`Created section '${section.title}' (${section.id})`);
      })),
  );

  sectionsCommand.addCommand(
    new Command('rename')
      .description('Rename a section')
      .argument('<id>', 'The section id')
      .argument('<title...>', 'The new title')
      .action((id: string, words: string[]) => $try(() => {
        const result = ws.sections.update(id, requireTitle(words));
        out.printResult(result, section => `Renamed section ${section.id} to '${section.title}'`);
      })),
  );

  sectionsCommand.addCommand(
    new Command('delete')
      .description('Delete a section, moving its tasks to the default section')
      .argument('<id>', 'The section id')
      .action((id: string) => $try(() => {
        if (id === DEFAULT_SECTION_ID) {
          out.warning('The default section cannot be deleted');
          return;
        }

        const summary = ws.coordinator.deleteSectionCascading(id);
        if (summary.removed) out.success(`Deleted section ${id}`);
        else out.info(`No section with id ${id}`);

        if (summary.reassigned.length > 0) {
          const inbox = resolveSection(ws.sections.list(), DEFAULT_SECTION_ID);
          out.info(`Moved ${summary.reassigned.length} task(s) to '${inbox.title}'`);
        }
      })),
  );

  return sectionsCommand;
}
