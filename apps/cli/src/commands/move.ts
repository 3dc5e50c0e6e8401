import { Command } from 'commander';
import type { Workspace } from '@sortbox/core';
import { resolveSection } from '@sortbox/core';
import * as out from '../output.js';
import { $try, warnIfUnknownSection } from '../helpers.js';

export function createMoveCommand(ws: Workspace): Command {
  return new Command('move')
    .description('Move a task to a different section')
    .argument('<id>', 'The task id to move')
    .argument('<section>', 'The section id to move the task to')
    .action((id: string, sectionId: string) => $try(() => {
      if (ws.tasks.has(id)) warnIfUnknownSection(ws, sectionId);
      out.printResult(ws.coordinator.moveTask(id, sectionId), task =>
        `Moved ${task.id} to '${resolveSection(ws.sections.list(), task.sectionId).title}'`);
    }));
}
