// Types
export * from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, getRawDb } from './db.js';
export type { SortboxDb } from './db.js';

// Stores
export * from './stores/index.js';

// Coordinator
export { SectionCoordinator, taskFields } from './coordinator/section-coordinator.js';
export type { CascadeSummary } from './coordinator/section-coordinator.js';

// Parsers
export * from './parsers/index.js';

// Read projections
export * from './queries/index.js';

// Workspace
export { createWorkspace } from './workspace.js';
export type { Workspace, WorkspaceOptions } from './workspace.js';
