import type { DateTime } from 'luxon';
import { applyModifiers, CalendarError, toZonedString, type TimeModifier } from '../time';

/**
 * Next trigger time for a repeating reminder. An interval that does not move
 * strictly forward (e.g. `3pm` on a 3pm reminder) would fire forever, so it
 * is rejected.
 */
export function nextTriggerTime(triggerTime: DateTime, interval: readonly TimeModifier[]): DateTime {
  const next = applyModifiers(interval, triggerTime);
  if (next.toMillis() <= triggerTime.toMillis()) {
    throw new CalendarError(`Interval does not move the reminder past ${toZonedString(triggerTime)}`);
  }
  return next;
}
