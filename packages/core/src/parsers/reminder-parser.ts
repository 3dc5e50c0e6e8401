/**
 * Parses reminder input into an ISO timestamp.
 * Supports presets (none, tonight, tomorrow, next-week), local
 * `yyyy-MM-dd` / `yyyy-MM-dd HH:mm`, and full ISO timestamps with an offset.
 */

const LOCAL_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{1,2}):(\d{2}))?$/;
const ISO_WITH_OFFSET_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;

/** Hour used when only a date is given, and by the morning presets */
export const DEFAULT_REMINDER_HOUR = 9;

/** [days from today, hour] */
const PRESETS: Record<string, readonly [number, number]> = {
  tonight: [0, 20],
  tomorrow: [1, DEFAULT_REMINDER_HOUR],
  'next-week': [7, DEFAULT_REMINDER_HOUR],
};

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

function atTime(d: Date, hour: number, minute: number): Date {
  return new Date(d.getFullYear(), d.getMonth(), d.getDate(), hour, minute);
}

function tryParseLocal(input: string): string | undefined {
  const m = LOCAL_RE.exec(input);
  if (!m) return undefined;

  const year = Number(m[1]);
  const month = Number(m[2]) - 1;
  const day = Number(m[3]);
  const hour = m[4] !== undefined ? Number(m[4]) : DEFAULT_REMINDER_HOUR;
  const minute = m[5] !== undefined ? Number(m[5]) : 0;
  if (hour > 23 || minute > 59) return undefined;

  const candidate = new Date(year, month, day, hour, minute);
  // Reject rollovers such as 2026-02-30
  if (candidate.getMonth() !== month || candidate.getDate() !== day) return undefined;
  return candidate.toISOString();
}

/**
 * Parse reminder input relative to `now`.
 * Returns null for "none" (clear the reminder) and undefined when the input is not understood.
 */
export function parseReminder(input: string, now: Date = new Date()): string | null | undefined {
  const normalized = input.trim().toLowerCase();
  if (normalized === '' || normalized === 'none') return null;

  const preset = Object.hasOwn(PRESETS, normalized) ? PRESETS[normalized] : undefined;
  if (preset) {
    const [days, hour] = preset;
    return atTime(addDays(now, days), hour, 0).toISOString();
  }

  const trimmed = input.trim();
  const local = tryParseLocal(trimmed);
  if (local !== undefined) return local;

  if (ISO_WITH_OFFSET_RE.test(trimmed)) {
    const parsed = new Date(trimmed);
    if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
  }
  return undefined;
}
