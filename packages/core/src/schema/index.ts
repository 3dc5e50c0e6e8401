export { sections } from './sections.js';
export { tasks } from './tasks.js';
