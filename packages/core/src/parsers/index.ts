export { parseSearchFilters } from './search-filter-parser.js';
export type { SearchFilters } from './search-filter-parser.js';
export { parseReminder, addDays } from './reminder-parser.js';
