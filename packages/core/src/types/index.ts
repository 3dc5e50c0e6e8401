export { Priority, PriorityName, isPriority } from './priority.js';
export { DEFAULT_SECTION_ID, DEFAULT_SECTION_TITLE } from './section.js';
export type { SectionId, Section } from './section.js';
export type { TaskId, Task, TaskFields, NewTaskFields } from './task.js';
export type { EntityKind, Result, NotFound } from './results.js';
export {
  success, notFound, describeNotFound, NotFoundError, unwrap,
} from './results.js';
