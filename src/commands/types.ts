import type { DateTime } from 'luxon';
import type { DisplayFormat, TimeModifier } from '../time';

/** One position in a time expression: a fixed modifier, or a branch of alternatives. */
export type Modifier =
  | { type: 'single'; modifier: TimeModifier; position: number }
  | { type: 'permutation'; alternatives: TimeModifier[]; position: number };

export type Command =
  | { type: 'scheduleReminder'; times: DateTime[]; message: string }
  | { type: 'cancelReminder'; id: number }
  | { type: 'setInterval'; id: number; modifiers: TimeModifier[] }
  | { type: 'clearInterval'; id: number }
  | { type: 'setTimezone'; timezone: string }
  | { type: 'setTimeFormat'; format: DisplayFormat }
  | { type: 'listReminders' }
  | { type: 'help' };

export type CommandType = Command['type'];
