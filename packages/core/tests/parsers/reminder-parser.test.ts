import { describe, it, expect } from 'vitest';
import { parseReminder, addDays } from '../../src/parsers/reminder-parser.js';

// Local time, so expectations hold in any timezone
const NOW = new Date(2026, 0, 15, 14, 30);

describe('parseReminder', () => {
  it('returns null for none and empty input', () => {
    expect(parseReminder('none', NOW)).toBeNull();
    expect(parseReminder('  ', NOW)).toBeNull();
  });

  it('resolves tonight to 20:00 today', () => {
    expect(parseReminder('tonight', NOW)).toBe(new Date(2026, 0, 15, 20, 0).toISOString());
  });

  it('resolves tomorrow to 09:00 the next day', () => {
    expect(parseReminder('Tomorrow', NOW)).toBe(new Date(2026, 0, 16, 9, 0).toISOString());
  });

  it('resolves next-week to 09:00 seven days out', () => {
    expect(parseReminder('next-week', NOW)).toBe(new Date(2026, 0, 22, 9, 0).toISOString());
  });

  it('crosses month boundaries', () => {
    const endOfMonth = new Date(2026, 0, 31, 8, 0);
    expect(parseReminder('tomorrow', endOfMonth)).toBe(new Date(2026, 1, 1, 9, 0).toISOString());
  });

  it('parses a local date with and without a time', () => {
    expect(parseReminder('2026-02-03', NOW)).toBe(new Date(2026, 1, 3, 9, 0).toISOString());
    expect(parseReminder('2026-02-03 18:45', NOW)).toBe(new Date(2026, 1, 3, 18, 45).toISOString());
    expect(parseReminder('2026-02-03T07:05', NOW)).toBe(new Date(2026, 1, 3, 7, 5).toISOString());
  });

  it('parses an ISO timestamp with an offset', () => {
    expect(parseReminder('2026-02-03T10:00:00Z', NOW)).toBe('2026-02-03T10:00:00.000Z');
    expect(parseReminder('2026-02-03T10:00:00+02:00', NOW)).toBe('2026-02-03T08:00:00.000Z');
  });

  it('rejects impossible dates and times', () => {
    expect(parseReminder('2026-02-30', NOW)).toBeUndefined();
    expect(parseReminder('2026-02-03 24:00', NOW)).toBeUndefined();
  });

  it('rejects unknown input', () => {
    expect(parseReminder('someday', NOW)).toBeUndefined();
    expect(parseReminder('03/02/2026', NOW)).toBeUndefined();
  });
});

describe('addDays', () => {
  it('returns a new date', () => {
    const result = addDays(NOW, 2);
    expect(result.getDate()).toBe(17);
    expect(NOW.getDate()).toBe(15);
  });
});
