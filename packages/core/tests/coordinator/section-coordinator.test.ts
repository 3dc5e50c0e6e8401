import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createWorkspace } from '../../src/workspace.js';
import type { Workspace } from '../../src/workspace.js';
import { taskFields } from '../../src/coordinator/section-coordinator.js';
import { Priority } from '../../src/types/priority.js';
import { ListenerError } from '../../src/stores/change-notifier.js';

let ws: Workspace;

beforeEach(() => {
  ws = createWorkspace();
});

describe('deleteSectionCascading', () => {
  it('moves tasks to the inbox and removes the section', () => {
    const work = ws.sections.add('Work');
    const report = ws.tasks.add({ title: 'Report', description: '', sectionId: work.id });
    const email = ws.tasks.add({ title: 'Email', description: '', sectionId: 'inbox' });

    const summary = ws.coordinator.deleteSectionCascading(work.id);

    expect(summary).toEqual({ sectionId: work.id, reassigned: [report.id], skipped: [], removed: true });
    expect(ws.sections.list().map(s => s.id)).toEqual(['inbox']);
    expect(ws.tasks.list()).toEqual([email, { ...report, sectionId: 'inbox' }]);
  });

  it('leaves no task pointing at the deleted section', () => {
    const work = ws.sections.add('Work');
    const home = ws.sections.add('Home');
    for (let i = 0; i < 4; i++) {
      ws.tasks.add({ title: `w${i}`, description: '', sectionId: work.id });
      ws.tasks.add({ title: `h${i}`, description: '', sectionId: home.id });
    }

    ws.coordinator.deleteSectionCascading(work.id);

    expect(ws.tasks.list().filter(t => t.sectionId === work.id)).toEqual([]);
    expect(ws.tasks.listBySection('inbox')).toHaveLength(4);
    expect(ws.tasks.listBySection(home.id)).toHaveLength(4);
    expect(ws.sections.list().some(s => s.id === work.id)).toBe(false);
  });

  it('keeps every other field and the list position of moved tasks', () => {
    const work = ws.sections.add('Work');
    const task = ws.tasks.add({
      title: 'Plan',
      description: 'Q3',
      priority: Priority.High,
      sectionId: work.id,
      reminder: '2026-05-01T09:00:00.000Z',
    });
    ws.tasks.toggleCompleted(task.id);
    ws.tasks.add({ title: 'Later', description: '', sectionId: 'inbox' });

    ws.coordinator.deleteSectionCascading(work.id);

    expect(ws.tasks.list()[1]).toEqual({ ...task, completed: true, sectionId: 'inbox' });
  });

  it('refuses to delete the default section', () => {
    ws.tasks.add({ title: 'Stay', description: '', sectionId: 'inbox' });
    const before = { sections: ws.sections.list(), tasks: ws.tasks.list() };

    const summary = ws.coordinator.deleteSectionCascading('inbox');

    expect(summary).toEqual({ sectionId: 'inbox', reassigned: [], skipped: [], removed: false });
    expect(ws.sections.list()).toEqual(before.sections);
    expect(ws.tasks.list()).toEqual(before.tasks);
  });

  it('reports removed: false for an unknown section and changes nothing', () => {
    const summary = ws.coordinator.deleteSectionCascading('ghost');
    expect(summary).toEqual({ sectionId: 'ghost', reassigned: [], skipped: [], removed: false });
    expect(ws.sections.list().map(s => s.id)).toEqual(['inbox']);
  });

  it('rescues tasks referencing a section id that was never created', () => {
    const stray = ws.tasks.add({ title: 'Stray', description: '', sectionId: 'ghost' });
    const summary = ws.coordinator.deleteSectionCascading('ghost');
    expect(summary.reassigned).toEqual([stray.id]);
    expect(ws.tasks.listBySection('inbox').map(t => t.id)).toEqual([stray.id]);
  });

  it('notifies each store once, after the section is gone', () => {
    const work = ws.sections.add('Work');
    ws.tasks.add({ title: 'a', description: '', sectionId: work.id });
    ws.tasks.add({ title: 'b', description: '', sectionId: work.id });

    const seen: Array<{ store: string; sectionExists: boolean; leftInSection: number }> = [];
    const observe = (store: string) => () => {
      seen.push({
        store,
        sectionExists: ws.sections.has(work.id),
        leftInSection: ws.tasks.listBySection(work.id).length,
      });
    };
    ws.sections.subscribe(observe('sections'));
    ws.tasks.subscribe(observe('tasks'));

    ws.coordinator.deleteSectionCascading(work.id);

    expect(seen).toEqual([
      { store: 'tasks', sectionExists: false, leftInSection: 0 },
      { store: 'sections', sectionExists: false, leftInSection: 0 },
    ]);
  });

  it('skips a task that disappears mid-cascade and carries on', () => {
    const work = ws.sections.add('Work');
    const first = ws.tasks.add({ title: 'first', description: '', sectionId: work.id });
    const second = ws.tasks.add({ title: 'second', description: '', sectionId: work.id });

    // Simulate a concurrent delete of `first` landing between the read and its reassignment
    const update = ws.tasks.update.bind(ws.tasks);
    vi.spyOn(ws.tasks, 'update').mockImplementation((id, fields) => {
      if (id === second.id) ws.tasks.delete(first.id);
      return update(id, fields);
    });

    const summary = ws.coordinator.deleteSectionCascading(work.id);

    expect(summary).toEqual({ sectionId: work.id, reassigned: [second.id], skipped: [first.id], removed: true });
    expect(ws.tasks.list().map(t => t.id)).toEqual([second.id]);
    expect(ws.sections.has(work.id)).toBe(false);
  });

  it('rolls back every step when a step throws', () => {
    const work = ws.sections.add('Work');
    const a = ws.tasks.add({ title: 'a', description: '', sectionId: work.id });
    const b = ws.tasks.add({ title: 'b', description: '', sectionId: work.id });
    const listener = vi.fn();
    ws.tasks.subscribe(listener);

    vi.spyOn(ws.sections, 'delete').mockImplementation(() => {
      throw new Error('disk on fire');
    });

    expect(() => ws.coordinator.deleteSectionCascading(work.id)).toThrow('disk on fire');
    expect(ws.tasks.listBySection(work.id).map(t => t.id)).toEqual([b.id, a.id]);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('deleteSectionCascading with failing listeners', () => {
  it('shows listeners only the committed state when a later listener throws', () => {
    const work = ws.sections.add('Work');
    ws.tasks.add({ title: 'a', description: '', sectionId: work.id });

    const seen: string[] = [];
    ws.tasks.subscribe(() => {
      seen.push(`inbox=${ws.tasks.listBySection('inbox').length} workExists=${ws.sections.has(work.id)}`);
    });
    ws.tasks.subscribe(() => {
      throw new Error('listener bug');
    });
    const sectionListener = vi.fn();
    ws.sections.subscribe(sectionListener);

    expect(() => ws.coordinator.deleteSectionCascading(work.id)).toThrow(ListenerError);

    expect(seen).toEqual(['inbox=1 workExists=false']);
    expect(ws.sections.has(work.id)).toBe(false);
    expect(ws.tasks.listBySection('inbox')).toHaveLength(1);
    expect(sectionListener).toHaveBeenCalledTimes(1);
  });

  it('notifies nobody when a step fails after the tasks were moved', () => {
    const work = ws.sections.add('Work');
    ws.tasks.add({ title: 'a', description: '', sectionId: work.id });
    const taskListener = vi.fn();
    const sectionListener = vi.fn();
    ws.tasks.subscribe(taskListener);
    ws.sections.subscribe(sectionListener);

    const remove = ws.sections.delete.bind(ws.sections);
    vi.spyOn(ws.sections, 'delete').mockImplementation((id) => {
      remove(id);
      throw new Error('late failure');
    });

    expect(() => ws.coordinator.deleteSectionCascading(work.id)).toThrow('late failure');

    expect(ws.sections.has(work.id)).toBe(true);
    expect(ws.tasks.listBySection(work.id)).toHaveLength(1);
    expect(taskListener).not.toHaveBeenCalled();
    expect(sectionListener).not.toHaveBeenCalled();
  });

  it('returns the summary when the workspace reports listener errors', () => {
    const errors: unknown[] = [];
    ws = createWorkspace({ onListenerError: (err) => errors.push(err) });
    const work = ws.sections.add('Work');
    const task = ws.tasks.add({ title: 'a', description: '', sectionId: work.id });
    ws.tasks.subscribe(() => {
      throw new Error('listener bug');
    });

    const summary = ws.coordinator.deleteSectionCascading(work.id);

    expect(summary).toEqual({ sectionId: work.id, reassigned: [task.id], skipped: [], removed: true });
    expect(errors).toHaveLength(1);
  });
});

describe('moveTask', () => {
  it('changes only the section', () => {
    const home = ws.sections.add('Home');
    const task = ws.tasks.add({ title: 'Laundry', description: 'whites', priority: Priority.Medium, sectionId: 'inbox' });

    const result = ws.coordinator.moveTask(task.id, home.id);

    expect(result).toEqual({ type: 'success', data: { ...task, sectionId: home.id } });
    expect(ws.tasks.listBySection(home.id)).toHaveLength(1);
  });

  it('returns not-found for an unknown task', () => {
    expect(ws.coordinator.moveTask('missing', 'inbox')).toEqual({ type: 'not-found', entity: 'task', id: 'missing' });
  });
});

describe('taskFields', () => {
  it('copies the mutable fields only', () => {
    const task = ws.tasks.add({ title: 't', description: 'd', priority: Priority.High, sectionId: 'inbox' });
    expect(taskFields(task)).toEqual({ title: 't', description: 'd', priority: 'high', sectionId: 'inbox', reminder: null });
  });
});
