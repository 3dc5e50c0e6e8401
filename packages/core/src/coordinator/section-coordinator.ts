import type { SectionStore } from '../stores/section-store.js';
import type { TaskStore } from '../stores/task-store.js';
import type { SectionId } from '../types/section.js';
import { DEFAULT_SECTION_ID } from '../types/section.js';
import type { Task, TaskId, TaskFields } from '../types/task.js';
import type { Result } from '../types/results.js';

export interface CascadeSummary {
  readonly sectionId: SectionId;
  /** Tasks moved to the default section */
  readonly reassigned: readonly TaskId[];
  /** Tasks that disappeared before they could be moved */
  readonly skipped: readonly TaskId[];
  /** False when the section did not exist or is the default section */
  readonly removed: boolean;
}

/** The mutable fields of a task, ready to pass back to TaskStore.update */
export function taskFields(task: Task): TaskFields {
  return {
    title: task.title,
    description: task.description,
    priority: task.priority,
    sectionId: task.sectionId,
    reminder: task.reminder,
  };
}

/** Operations that span both stores. */
export class SectionCoordinator {
  constructor(
    private readonly sections: SectionStore,
    private readonly tasks: TaskStore,
  ) {}

  /**
   * Delete a section after moving its tasks to the default section.
   * Runs as one transaction: subscribers of either store are notified once,
   * after it commits, and never see the tasks half moved. Both stores share
   * the database, so one batch covers them.
   */
  deleteSectionCascading(sectionId: SectionId): CascadeSummary {
    if (sectionId === DEFAULT_SECTION_ID) {
      return { sectionId, reassigned: [], skipped: [], removed: false };
    }

    return this.sections.batch(() => {
      const reassigned: TaskId[] = [];
      const skipped: TaskId[] = [];

      for (const task of this.tasks.listBySection(sectionId)) {
        const result = this.tasks.update(task.id, { ...taskFields(task), sectionId: DEFAULT_SECTION_ID });
        if (result.type === 'success') reassigned.push(task.id);
        else skipped.push(task.id);
      }

      const removed = this.sections.has(sectionId);
      this.sections.delete(sectionId);
      return { sectionId, reassigned, skipped, removed };
    });
  }

  /**
   * Move a task to another section, keeping every other field.
   * The target is not required to exist; reads fall back to the default section.
   */
  moveTask(taskId: TaskId, sectionId: SectionId): Result<Task> {
    const current = this.tasks.getById(taskId);
    if (current.type === 'not-found') return current;
    return this.tasks.update(taskId, { ...taskFields(current.data), sectionId });
  }
}
