import type { DateTime } from 'luxon';

export type DisplayFormat = '12h' | '24h';

export const DISPLAY_FORMATS: readonly DisplayFormat[] = ['12h', '24h'];

export function isDisplayFormat(value: string): value is DisplayFormat {
  return (DISPLAY_FORMATS as readonly string[]).includes(value);
}

/**
 * e.g. `Tuesday, March 06, 2001 at 3:00pm EST` (12h) or `... at 15:00 EST` (24h).
 * Rendered in the timestamp's own zone.
 */
export function formatReminderTime(time: DateTime, format: DisplayFormat = '12h'): string {
  const local = time.setLocale('en-US');
  const date = local.toFormat('cccc, LLLL dd, yyyy');
  const clock =
    format === '24h' ? local.toFormat('HH:mm') : `${local.toFormat('h:mm')}${local.hour < 12 ? 'am' : 'pm'}`;
  return `${date} at ${clock} ${local.toFormat('ZZZZ')}`;
}
