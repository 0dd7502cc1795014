import { DateTime } from 'luxon';

/**
 * A single timestamp transformation from the time-expression language.
 *
 * `weekday` counts from Monday (0) to Sunday (6). `date` falls back to the
 * base timestamp's year and month when they are omitted.
 */
export type TimeModifier =
  | { type: 'delay'; ms: number }
  | { type: 'weekday'; weekday: number }
  | { type: 'timeOfDay'; hour: number; minute: number }
  | { type: 'date'; year?: number; month?: number; day: number }
  | { type: 'months'; count: number };

export const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

export class CalendarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalendarError';
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function ensureValid(result: DateTime, what: string): DateTime {
  if (!result.isValid) {
    throw new CalendarError(`${what}: ${result.invalidExplanation ?? result.invalidReason ?? 'invalid time'}`);
  }
  return result;
}

export function applyModifier(modifier: TimeModifier, base: DateTime): DateTime {
  switch (modifier.type) {
    case 'delay':
      return ensureValid(base.plus({ milliseconds: modifier.ms }), `Cannot add ${modifier.ms}ms`);

    case 'timeOfDay': {
      const { hour, minute } = modifier;
      if (hour < 0 || hour > 23 || minute < 0 || minute > 59) {
        throw new CalendarError(`${hour}:${pad2(minute)} is not a valid time of day`);
      }
      return ensureValid(base.set({ hour, minute, second: 0, millisecond: 0 }), 'Cannot set time of day');
    }

    case 'date': {
      const year = modifier.year ?? base.year;
      const month = modifier.month ?? base.month;
      const { day } = modifier;
      const result = DateTime.fromObject(
        { year, month, day, hour: base.hour, minute: base.minute, second: base.second },
        { zone: base.zone }
      );
      if (!result.isValid) {
        throw new CalendarError(`${year}-${pad2(month)}-${pad2(day)} is not a valid date`);
      }
      return result;
    }

    case 'weekday': {
      if (!Number.isInteger(modifier.weekday) || modifier.weekday < 0 || modifier.weekday > 6) {
        throw new CalendarError(`Weekday offset ${modifier.weekday} is out of range`);
      }
      // luxon numbers weekdays 1 (Monday) through 7 (Sunday).
      const target = modifier.weekday + 1;
      const days = (target - base.weekday + 7) % 7 || 7;
      return ensureValid(base.plus({ days }), `Cannot advance to ${WEEKDAY_NAMES[modifier.weekday]}`);
    }

    case 'months':
      // luxon clamps to the last day of a shorter month (Jan 31 + 1mo = Feb 28).
      return ensureValid(base.plus({ months: modifier.count }), `Cannot add ${modifier.count} month(s)`);
  }
}

/** Applies modifiers left to right, each one seeing the previous result. */
export function applyModifiers(modifiers: readonly TimeModifier[], base: DateTime): DateTime {
  return modifiers.reduce((time, modifier) => applyModifier(modifier, time), base);
}
