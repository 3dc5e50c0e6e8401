export { ChangeNotifier, ListenerError } from './change-notifier.js';
export type { ChangeListener, ListenerErrorHandler } from './change-notifier.js';
export { Store } from './store.js';
export type { StoreOptions } from './store.js';
export { SectionStore } from './section-store.js';
export type { SectionStoreOptions } from './section-store.js';
export { TaskStore } from './task-store.js';
export type { TaskStoreOptions } from './task-store.js';
export { generateId, generateUniqueId, ID_LENGTH } from './ids.js';
