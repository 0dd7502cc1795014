import type { DateTime } from 'luxon';
import { isDisplayFormat, nowInTimeZone, type TimeModifier } from '../time';
import { ParseError } from './errors';
import { evaluateTimeExpression, parseTimeExpression } from './time-expression';
import type { Command, CommandType } from './types';

export const DEFAULT_COMMAND_PREFIX = '$';

const KEYWORDS: ReadonlyMap<string, CommandType> = new Map<string, CommandType>([
  ['r', 'scheduleReminder'],
  ['remindme', 'scheduleReminder'],
  ['reminder', 'scheduleReminder'],
  ['cr', 'cancelReminder'],
  ['cancelreminder', 'cancelReminder'],
  ['si', 'setInterval'],
  ['setinterval', 'setInterval'],
  ['ci', 'clearInterval'],
  ['clearinterval', 'clearInterval'],
  ['rs', 'listReminders'],
  ['reminders', 'listReminders'],
  ['tz', 'setTimezone'],
  ['timezone', 'setTimezone'],
  ['tf', 'setTimeFormat'],
  ['timeformat', 'setTimeFormat'],
  ['h', 'help'],
  ['help', 'help'],
]);

export interface ParseOptions {
  /** Zone that relative expressions are evaluated in. */
  timeZone: string;
  /** Defaults to the current time. */
  now?: DateTime;
  prefix?: string;
}

interface Args {
  text: string;
  start: number;
}

function requireArgs(args: Args | null, keyword: string, end: number): Args {
  if (!args || args.text === '') {
    throw new ParseError(`"${keyword}" needs arguments`, end, '');
  }
  return args;
}

function parseId(text: string, start: number): number {
  if (!/^[0-9]+$/.test(text)) {
    throw new ParseError(`Invalid reminder ID "${text}"`, start, text);
  }
  const id = Number(text);
  if (!Number.isSafeInteger(id)) {
    throw new ParseError(`Reminder ID "${text}" is too large`, start, text);
  }
  return id;
}

function parseSchedule(args: Args, options: ParseOptions): Command {
  const semicolon = args.text.indexOf(';');
  if (semicolon === -1) {
    throw new ParseError('Expected ";" between the time and the message', args.start + args.text.length, '');
  }

  const modifiers = parseTimeExpression(args.text.slice(0, semicolon), args.start);

  let message = args.text.slice(semicolon + 1);
  if (message.startsWith(' ')) message = message.slice(1);
  if (message.trim() === '') {
    throw new ParseError('Missing reminder message', args.start + semicolon + 1, '');
  }

  const base = nowInTimeZone(options.timeZone, options.now);
  return { type: 'scheduleReminder', times: evaluateTimeExpression(modifiers, base), message };
}

function parseSetInterval(args: Args): Command {
  const space = args.text.indexOf(' ');
  if (space === -1) {
    throw new ParseError('Expected an interval after the reminder ID', args.start + args.text.length, '');
  }

  const id = parseId(args.text.slice(0, space), args.start);
  const modifiers: TimeModifier[] = [];
  for (const modifier of parseTimeExpression(args.text.slice(space + 1), args.start + space + 1)) {
    if (modifier.type === 'permutation') {
      throw new ParseError('Branches are not allowed in an interval', modifier.position, '(');
    }
    modifiers.push(modifier.modifier);
  }

  return { type: 'setInterval', id, modifiers };
}

/**
 * Parses `<prefix><keyword> <arguments>` into a command. Schedule commands
 * are evaluated against `options.now` in `options.timeZone`, so a bad date
 * can also surface here as a CalendarError.
 */
export function parseCommand(text: string, options: ParseOptions): Command {
  const prefix = options.prefix ?? DEFAULT_COMMAND_PREFIX;
  if (!text.startsWith(prefix)) {
    throw new ParseError(`Commands start with "${prefix}"`, 0, text.charAt(0));
  }

  const space = text.indexOf(' ', prefix.length);
  const keyword = text.slice(prefix.length, space === -1 ? text.length : space);
  const args: Args | null = space === -1 ? null : { text: text.slice(space + 1), start: space + 1 };

  const type = KEYWORDS.get(keyword);
  if (!type) {
    throw new ParseError(`Unknown command "${keyword}"`, prefix.length, keyword);
  }

  switch (type) {
    case 'scheduleReminder':
      return parseSchedule(requireArgs(args, keyword, text.length), options);

    case 'cancelReminder':
    case 'clearInterval': {
      const { text: idText, start } = requireArgs(args, keyword, text.length);
      return { type, id: parseId(idText, start) };
    }

    case 'setInterval':
      return parseSetInterval(requireArgs(args, keyword, text.length));

    case 'setTimezone': {
      const { text: zone, start } = requireArgs(args, keyword, text.length);
      const timezone = zone.trim();
      if (timezone === '') throw new ParseError('Expected a timezone name', start, zone);
      return { type, timezone };
    }

    case 'setTimeFormat': {
      const { text: format, start } = requireArgs(args, keyword, text.length);
      if (!isDisplayFormat(format)) {
        throw new ParseError(`Expected "12h" or "24h", got "${format}"`, start, format);
      }
      return { type, format };
    }

    case 'listReminders':
    case 'help':
      if (args) {
        throw new ParseError(`"${keyword}" takes no arguments`, args.start, args.text);
      }
      return { type };
  }
}
