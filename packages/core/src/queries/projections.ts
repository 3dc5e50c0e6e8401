/**
 * Read-side joins between sections and tasks, for display.
 * Nothing here mutates either store.
 */

import type { Section, SectionId } from '../types/section.js';
import { DEFAULT_SECTION_ID, DEFAULT_SECTION_TITLE } from '../types/section.js';
import type { Task } from '../types/task.js';

export interface SectionSummary {
  readonly section: Section;
  readonly taskCount: number;
  readonly completedCount: number;
}

const FALLBACK_SECTION: Section = Object.freeze({
  id: DEFAULT_SECTION_ID,
  title: DEFAULT_SECTION_TITLE,
  sortOrder: 0,
});

/** The section a task displays under: its own, or the default section when its id resolves to nothing */
export function resolveSection(sections: readonly Section[], sectionId: SectionId): Section {
  return sections.find(s => s.id === sectionId)
    ?? sections.find(s => s.id === DEFAULT_SECTION_ID)
    ?? FALLBACK_SECTION;
}

/** Per-section counts, in section order. Counts match sectionId exactly. */
export function summarizeSections(sections: readonly Section[], tasks: readonly Task[]): SectionSummary[] {
  return sections.map(section => {
    const own = tasks.filter(t => t.sectionId === section.id);
    return {
      section,
      taskCount: own.length,
      completedCount: own.filter(t => t.completed).length,
    };
  });
}

/** Group tasks by the section they display under, in section order. Empty sections are kept. */
export function groupBySection(
  sections: readonly Section[],
  tasks: readonly Task[],
): Array<{ section: Section; tasks: Task[] }> {
  const groups = new Map<SectionId, { section: Section; tasks: Task[] }>();
  for (const section of sections) {
    groups.set(section.id, { section, tasks: [] });
  }
  for (const task of tasks) {
    const section = resolveSection(sections, task.sectionId);
    let group = groups.get(section.id);
    if (!group) {
      group = { section, tasks: [] };
      groups.set(section.id, group);
    }
    group.tasks.push(task);
  }
  return [...groups.values()];
}
