import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { Priority } from '../types/priority.js';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description').notNull().default(''),
  priority: text('priority').$type<Priority>().notNull().default('low'),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  /** Matches sections.id by value only: no foreign key, deletes never cascade */
  sectionId: text('section_id').notNull(),
  reminder: text('reminder'),
  createdAt: text('created_at').notNull(),
  /** Highest value = newest. Display uses ORDER BY sort_order DESC */
  sortOrder: integer('sort_order').notNull().default(0),
}, (table) => [
  index('idx_tasks_section_id').on(table.sectionId),
  index('idx_tasks_sort').on(table.sortOrder),
]);
