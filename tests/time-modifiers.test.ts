import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';
import { applyModifier, applyModifiers, CalendarError } from '../src/time';

const NY = 'America/New_York';

function ny(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: NY });
}

describe('applyModifier', () => {
  it('adds a delay as elapsed time, across a DST change', () => {
    // DST starts 2024-03-10 02:00 in New York.
    const result = applyModifier({ type: 'delay', ms: 86_400_000 }, ny('2024-03-09T12:00:00'));
    expect(result.toISO()).toBe('2024-03-10T13:00:00.000-04:00');
  });

  it('replaces the time of day and zeroes seconds', () => {
    const result = applyModifier({ type: 'timeOfDay', hour: 15, minute: 0 }, ny('2024-01-02T09:30:45.123'));
    expect(result.toISO()).toBe('2024-01-02T15:00:00.000-05:00');
  });

  it('rejects an out-of-range time of day', () => {
    expect(() => applyModifier({ type: 'timeOfDay', hour: 24, minute: 0 }, ny('2024-01-02T09:30:00'))).toThrow(
      CalendarError
    );
  });

  it('replaces the date and keeps the time of day', () => {
    const result = applyModifier({ type: 'date', year: 2001, month: 3, day: 6 }, ny('2024-01-02T09:30:45.123'));
    expect(result.toISO()).toBe('2001-03-06T09:30:45.000-05:00');
  });

  it('takes a missing year and month from the base', () => {
    const result = applyModifier({ type: 'date', day: 15 }, ny('2024-01-02T09:30:00'));
    expect(result.toISODate()).toBe('2024-01-15');
  });

  it('fails on a date that does not exist', () => {
    expect(() => applyModifier({ type: 'date', year: 2023, month: 2, day: 29 }, ny('2024-01-02T09:30:00'))).toThrow(
      '2023-02-29 is not a valid date'
    );
  });

  it('moves a Tuesday to the following Tuesday, never the same day', () => {
    const tuesday = ny('2024-01-02T09:30:00');
    expect(tuesday.weekday).toBe(2);

    const result = applyModifier({ type: 'weekday', weekday: 1 }, tuesday);
    expect(result.toISO()).toBe('2024-01-09T09:30:00.000-05:00');
    expect(result.diff(tuesday, 'days').days).toBe(7);
  });

  it('finds the next occurrence of a later weekday', () => {
    const result = applyModifier({ type: 'weekday', weekday: 4 }, ny('2024-01-02T09:30:00'));
    expect(result.toISODate()).toBe('2024-01-05');
  });

  it('wraps around the week for an earlier weekday', () => {
    const result = applyModifier({ type: 'weekday', weekday: 0 }, ny('2024-01-05T09:30:00'));
    expect(result.toISODate()).toBe('2024-01-08');
  });

  it('adds calendar months and clamps to the end of a shorter month', () => {
    expect(applyModifier({ type: 'months', count: 1 }, ny('2024-01-31T10:00:00')).toISODate()).toBe('2024-02-29');
    expect(applyModifier({ type: 'months', count: 1 }, ny('2023-01-31T10:00:00')).toISODate()).toBe('2023-02-28');
    expect(applyModifier({ type: 'months', count: 2 }, ny('2024-01-15T10:00:00')).toISO()).toBe(
      '2024-03-15T10:00:00.000-04:00'
    );
  });
});

describe('applyModifiers', () => {
  it('applies modifiers left to right', () => {
    // 1w from Tuesday Jan 2 lands on Tuesday Jan 9; the next Tuesday after that is Jan 16.
    const result = applyModifiers(
      [
        { type: 'delay', ms: 7 * 86_400_000 },
        { type: 'weekday', weekday: 1 },
      ],
      ny('2024-01-02T09:30:00')
    );
    expect(result.toISODate()).toBe('2024-01-16');
  });

  it('returns the base unchanged for no modifiers', () => {
    const base = ny('2024-01-02T09:30:00');
    expect(applyModifiers([], base)).toBe(base);
  });
});
