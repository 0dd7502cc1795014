import type { DateTime } from 'luxon';
import type { DisplayFormat, TimeModifier } from '../time';

export interface Reminder {
  triggerTime: DateTime;
  message: string;
  /** Applied to `triggerTime` after each firing to get the next one. */
  interval?: TimeModifier[];
}

export interface UserReminder {
  user: string;
  reminder: Reminder;
}

export interface Preferences {
  timezone: string;
  displayFormat: DisplayFormat;
}

export interface FiredReminder {
  user: string;
  reminder: Reminder;
  /** The successor, when the reminder repeats and its interval could be applied. */
  next?: Reminder;
  /** Why a repeating reminder produced no successor. */
  recurrenceError?: Error;
}
