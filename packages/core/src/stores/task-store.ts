import { and, desc, eq, isNotNull, isNull, max, ne, not } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { SortboxDb } from '../db.js';
import { tasks } from '../schema/tasks.js';
import type { Task, TaskId, TaskFields, NewTaskFields } from '../types/task.js';
import type { SectionId } from '../types/section.js';
import { Priority } from '../types/priority.js';
import type { Result } from '../types/results.js';
import { success, notFound } from '../types/results.js';
import { parseSearchFilters } from '../parsers/search-filter-parser.js';
import { generateUniqueId } from './ids.js';
import { Store } from './store.js';
import type { StoreOptions } from './store.js';

export interface TaskStoreOptions extends StoreOptions {
  /** Clock used for createdAt */
  now?: () => Date;
}

function toTask(row: typeof tasks.$inferSelect): Task {
  return Object.freeze({ ...row });
}

/** Ordered set of tasks, newest first. Section membership is the sectionId value alone. */
export class TaskStore extends Store {
  private readonly now: () => Date;

  constructor(db: SortboxDb, options: TaskStoreOptions = {}) {
    super(db, options);
    this.now = options.now ?? (() => new Date());
  }

  // ---------------------------------------------------------------------------
  // Read queries
  // ---------------------------------------------------------------------------

  list(): readonly Task[] {
    return Object.freeze(this.db.select().from(tasks).orderBy(desc(tasks.sortOrder)).all().map(toTask));
  }

  /** Tasks whose sectionId equals `sectionId`, in list order. Unknown ids yield an empty list. */
  listBySection(sectionId: SectionId): readonly Task[] {
    const rows = this.db.select().from(tasks)
      .where(eq(tasks.sectionId, sectionId))
      .orderBy(desc(tasks.sortOrder))
      .all();
    return Object.freeze(rows.map(toTask));
  }

  getById(id: TaskId): Result<Task> {
    const row = this.db.select().from(tasks).where(eq(tasks.id, id)).get();
    return row ? success(toTask(row)) : notFound('task', id);
  }

  has(id: TaskId): boolean {
    return this.db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, id)).get() !== undefined;
  }

  /** Search by free text and filters (priority:high status:done section:x has:reminder) */
  search(query: string): readonly Task[] {
    const filters = parseSearchFilters(query);
    const conditions: SQL[] = [];

    if (filters.priority != null) conditions.push(eq(tasks.priority, filters.priority));
    if (filters.notPriority != null) conditions.push(ne(tasks.priority, filters.notPriority));
    if (filters.completed != null) conditions.push(eq(tasks.completed, filters.completed));
    if (filters.sectionId != null) conditions.push(eq(tasks.sectionId, filters.sectionId));
    if (filters.notSectionId != null) conditions.push(ne(tasks.sectionId, filters.notSectionId));
    if (filters.has.reminder) conditions.push(isNotNull(tasks.reminder));
    if (filters.notHas.reminder) conditions.push(isNull(tasks.reminder));

    const rows = this.db.select().from(tasks).where(and(...conditions)).orderBy(desc(tasks.sortOrder)).all();
    const results = rows.map(toTask);
    if (!filters.text) return Object.freeze(results);

    // SQLite LIKE only folds ASCII, so free text is matched here
    const q = filters.text.toLowerCase();
    return Object.freeze(results.filter(t => t.title.toLowerCase().includes(q) || t.description.toLowerCase().includes(q)));
  }

  // ---------------------------------------------------------------------------
  // Write operations
  // ---------------------------------------------------------------------------

  /** Create a task at the top of the list. sectionId is not checked against existing sections. */
  add(fields: NewTaskFields): Task {
    const id = generateUniqueId(candidate => this.has(candidate));
    const row = this.db.select({ maxOrder: max(tasks.sortOrder) }).from(tasks).get();
    const inserted = this.db.insert(tasks).values({
      id,
      title: fields.title,
      description: fields.description,
      priority: fields.priority ?? Priority.Low,
      completed: false,
      sectionId: fields.sectionId,
      reminder: fields.reminder ?? null,
      createdAt: this.now().toISOString(),
      sortOrder: (row?.maxOrder ?? -1) + 1,
    }).returning().get();
    this.changed();
    return toTask(inserted);
  }

  /**
   * Replace every mutable field of a task. This is not a patch: an omitted
   * reminder clears it. Position in the list is unchanged.
   */
  update(id: TaskId, fields: TaskFields): Result<Task> {
    const row = this.db.update(tasks).set({
      title: fields.title,
      description: fields.description,
      priority: fields.priority,
      sectionId: fields.sectionId,
      reminder: fields.reminder ?? null,
    }).where(eq(tasks.id, id)).returning().get();
    if (!row) return notFound('task', id);
    this.changed();
    return success(toTask(row));
  }

  toggleCompleted(id: TaskId): Result<Task> {
    const row = this.db.update(tasks)
      .set({ completed: not(tasks.completed) })
      .where(eq(tasks.id, id))
      .returning()
      .get();
    if (!row) return notFound('task', id);
    this.changed();
    return success(toTask(row));
  }

  /** Remove a task. Unknown ids are a no-op. */
  delete(id: TaskId): void {
    const removed = this.db.delete(tasks).where(eq(tasks.id, id)).returning({ id: tasks.id }).all();
    if (removed.length > 0) this.changed();
  }
}
