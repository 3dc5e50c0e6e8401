/**
 * Parses search strings into structured task filters.
 * Tokens like `priority:high status:done section:inbox has:reminder` are
 * extracted; remaining text becomes the free-text query, matched against
 * title and description.
 *
 * Negation: prefix the value with `!` (e.g. `status:!done`, `section:!inbox`).
 */

import type { Priority } from '../types/priority.js';
import { Priority as P } from '../types/priority.js';

export interface SearchFilters {
  text: string;
  priority: Priority | null;
  notPriority: Priority | null;
  completed: boolean | null;
  sectionId: string | null;
  notSectionId: string | null;
  has: { reminder?: boolean };
  notHas: { reminder?: boolean };
}

const STATUS_MAP: Record<string, boolean> = {
  done: true,
  completed: true,
  open: false,
  pending: false,
  todo: false,
};

const PRIORITY_MAP: Record<string, Priority> = {
  high: P.High,
  p1: P.High,
  medium: P.Medium,
  p2: P.Medium,
  low: P.Low,
  p3: P.Low,
};

// Matches prefix:value tokens; value can be quoted or unquoted
const TOKEN_RE = /\b(priority|status|section|has):("[^"]*"|[^\s]+)/gi;

export function parseSearchFilters(query: string): SearchFilters {
  const filters: SearchFilters = {
    text: '',
    priority: null,
    notPriority: null,
    completed: null,
    sectionId: null,
    notSectionId: null,
    has: {},
    notHas: {},
  };

  const remaining = query.replace(TOKEN_RE, (token: string, prefix: string, rawValue: string) => {
    const unquoted = rawValue.replace(/^"|"$/g, '');
    const negated = unquoted.startsWith('!');
    const cleanValue = negated ? unquoted.slice(1) : unquoted;
    const value = cleanValue.toLowerCase();

    switch (prefix.toLowerCase()) {
      case 'priority': {
        const priority = PRIORITY_MAP[value];
        if (priority === undefined) return token; // Unknown priority: keep as text
        if (negated) filters.notPriority = priority;
        else filters.priority = priority;
        break;
      }
      case 'status': {
        const completed = STATUS_MAP[value];
        if (completed === undefined) return token;
        filters.completed = negated ? !completed : completed;
        break;
      }
      case 'section':
        // Section ids are matched exactly, so keep the original case
        if (negated) filters.notSectionId = cleanValue;
        else filters.sectionId = cleanValue;
        break;
      case 'has':
        if (value !== 'reminder') return token;
        if (negated) filters.notHas.reminder = true;
        else filters.has.reminder = true;
        break;
    }
    return '';
  });

  filters.text = remaining.replace(/\s+/g, ' ').trim();
  return filters;
}
