/**
 * CLI helpers: argument splitting, option parsing, error handling.
 */

import type { Priority as PriorityType, Workspace } from '@sortbox/core';
import { Priority, isPriority, parseReminder, resolveSection } from '@sortbox/core';
import * as out from './output.js';

/**
 * Split a command line into arguments. Single or double quotes group
 * words; an unterminated quote runs to the end of the line.
 */
export function splitArgs(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (const ch of line) {
    if (quote) {
      if (ch === quote) quote = null;
      else current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }
  if (inToken) args.push(current);
  return args;
}

/**
 * Parse a priority string into a Priority value, or null if unrecognized.
 */
export function parsePriorityArg(level: string): PriorityType | null {
  const normalized = level.toLowerCase();
  if (isPriority(normalized)) return normalized;
  switch (normalized) {
    case '1': case 'p1': return Priority.High;
    case '2': case 'p2': return Priority.Medium;
    case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

export function requirePriority(level: string): PriorityType {
  const priority = parsePriorityArg(level);
  if (priority === null) throw new Error(`Invalid priority '${level}'. Use low, medium or high`);
  return priority;
}

/** Parse a reminder option; null clears the reminder */
export function requireReminder(input: string, now?: Date): string | null {
  const reminder = parseReminder(input, now);
  if (reminder === undefined) {
    throw new Error(`Invalid reminder '${input}'. Use none, tonight, tomorrow, next-week or yyyy-MM-dd [HH:mm]`);
  }
  return reminder;
}

/** Join title words; titles may not be blank */
export function requireTitle(words: readonly string[]): string {
  const title = words.join(' ').trim();
  if (!title) throw new Error('Title cannot be empty');
  return title;
}

/** Warn when a task is about to reference a section that does not exist */
export function warnIfUnknownSection(ws: Workspace, sectionId: string): void {
  if (ws.sections.has(sectionId)) return;
  const fallback = resolveSection(ws.sections.list(), sectionId);
  out.warning(`Section '${sectionId}' does not exist; the task will show under '${fallback.title}'`);
}

/**
 * Run a command action, printing any thrown error instead of ending the session.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
  }
}
