import type { Priority } from './priority.js';
import type { SectionId } from './section.js';

export type TaskId = string;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string;
  readonly priority: Priority;
  readonly completed: boolean;
  /** Weak reference to a section; may name a section that no longer exists */
  readonly sectionId: SectionId;
  readonly reminder: string | null; // ISO string
  readonly createdAt: string; // ISO string
  /** Highest value = newest */
  readonly sortOrder: number;
}

/** The mutable fields of a task. Updates replace all of them at once. */
export interface TaskFields {
  title: string;
  description: string;
  priority: Priority;
  sectionId: SectionId;
  reminder?: string | null;
}

export type NewTaskFields = Omit<TaskFields, 'priority'> & { priority?: Priority };
