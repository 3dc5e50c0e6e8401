export { resolveSection, summarizeSections, groupBySection } from './projections.js';
export type { SectionSummary } from './projections.js';
