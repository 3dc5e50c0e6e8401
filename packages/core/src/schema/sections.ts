import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const sections = sqliteTable('sections', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  /** Creation order. Display uses ORDER BY sort_order ASC */
  sortOrder: integer('sort_order').notNull().default(0),
});
