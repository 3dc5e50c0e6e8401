import { asc, eq, max } from 'drizzle-orm';
import type { SortboxDb } from '../db.js';
import { sections } from '../schema/sections.js';
import type { Section, SectionId } from '../types/section.js';
import { DEFAULT_SECTION_ID, DEFAULT_SECTION_TITLE } from '../types/section.js';
import type { Result } from '../types/results.js';
import { success, notFound } from '../types/results.js';
import { generateUniqueId } from './ids.js';
import { Store } from './store.js';
import type { StoreOptions } from './store.js';

export interface SectionStoreOptions extends StoreOptions {
  /** Title given to the default section when the store creates it */
  defaultSectionTitle?: string;
}

function toSection(row: typeof sections.$inferSelect): Section {
  return Object.freeze({ id: row.id, title: row.title, sortOrder: row.sortOrder });
}

/**
 * Ordered set of sections. The default section ("inbox") is created with
 * the store and survives every delete.
 */
export class SectionStore extends Store {
  constructor(db: SortboxDb, options: SectionStoreOptions = {}) {
    super(db, options);
    this.db.insert(sections).values({
      id: DEFAULT_SECTION_ID,
      title: options.defaultSectionTitle ?? DEFAULT_SECTION_TITLE,
      sortOrder: 0,
    }).onConflictDoNothing().run();
  }

  /** All sections in creation order */
  list(): readonly Section[] {
    return Object.freeze(this.db.select().from(sections).orderBy(asc(sections.sortOrder)).all().map(toSection));
  }

  getById(id: SectionId): Result<Section> {
    const row = this.db.select().from(sections).where(eq(sections.id, id)).get();
    return row ? success(toSection(row)) : notFound('section', id);
  }

  has(id: SectionId): boolean {
    return this.db.select({ id: sections.id }).from(sections).where(eq(sections.id, id)).get() !== undefined;
  }

  /** Append a section. The title is stored as given; callers reject empty ones. */
  add(title: string): Section {
    const id = generateUniqueId(candidate => this.has(candidate));
    const row = this.db.select({ maxOrder: max(sections.sortOrder) }).from(sections).get();
    const inserted = this.db.insert(sections).values({
      id,
      title,
      sortOrder: (row?.maxOrder ?? -1) + 1,
    }).returning().get();
    this.changed();
    return toSection(inserted);
  }

  /** Replace a section's title; id and position are unchanged */
  update(id: SectionId, title: string): Result<Section> {
    const row = this.db.update(sections).set({ title }).where(eq(sections.id, id)).returning().get();
    if (!row) return notFound('section', id);
    this.changed();
    return success(toSection(row));
  }

  /**
   * Remove a section. No-op for the default section and for unknown ids.
   * Tasks pointing at the section are left as they are; use
   * SectionCoordinator.deleteSectionCascading to move them first.
   */
  delete(id: SectionId): void {
    if (id === DEFAULT_SECTION_ID) return;
    const removed = this.db.delete(sections).where(eq(sections.id, id)).returning({ id: sections.id }).all();
    if (removed.length > 0) this.changed();
  }
}
