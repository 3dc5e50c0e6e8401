import { createDb } from './db.js';
import type { SortboxDb } from './db.js';
import { SectionStore } from './stores/section-store.js';
import { TaskStore } from './stores/task-store.js';
import type { ListenerErrorHandler } from './stores/change-notifier.js';
import { SectionCoordinator } from './coordinator/section-coordinator.js';

export interface WorkspaceOptions {
  /** Title of the default section (default "Inbox") */
  defaultSectionTitle?: string;
  /** Clock used for task createdAt */
  now?: () => Date;
  /** Receives errors thrown by change listeners of either store */
  onListenerError?: ListenerErrorHandler;
}

/** Both stores over one database, plus the coordinator that spans them */
export interface Workspace {
  readonly db: SortboxDb;
  readonly sections: SectionStore;
  readonly tasks: TaskStore;
  readonly coordinator: SectionCoordinator;
}

export function createWorkspace(options: WorkspaceOptions = {}): Workspace {
  const db = createDb();
  const { onListenerError } = options;
  const sections = new SectionStore(db, { defaultSectionTitle: options.defaultSectionTitle, onListenerError });
  const tasks = new TaskStore(db, { now: options.now, onListenerError });
  return { db, sections, tasks, coordinator: new SectionCoordinator(sections, tasks) };
}
