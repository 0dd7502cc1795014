/**
 * Time expressions: space-separated modifiers such as `1w2d`, `3:30pm`,
 * `2001-03-06`, `--15`, `tuesday`, `1mo`, or a branch `(1d, 2d)` that
 * offers alternatives at one position.
 */

import type { DateTime } from 'luxon';
import { applyModifiers, WEEKDAY_NAMES, type TimeModifier } from '../time';
import { ParseError } from './errors';
import type { Modifier } from './types';

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;
const WEEK_MS = 7 * DAY_MS;

function unitMs(unit: string): number | undefined {
  switch (unit) {
    case 'w':
      return WEEK_MS;
    case 'd':
      return DAY_MS;
    case 'h':
      return HOUR_MS;
    case 'm':
      return MINUTE_MS;
    case 's':
      return SECOND_MS;
    default:
      return undefined;
  }
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

class Cursor {
  pos = 0;

  constructor(
    readonly text: string,
    readonly offset: number
  ) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  eat(literal: string): boolean {
    if (!this.text.startsWith(literal, this.pos)) return false;
    this.pos += literal.length;
    return true;
  }

  number(): number | undefined {
    const start = this.pos;
    while (!this.done && isDigit(this.peek())) this.pos++;
    if (start === this.pos) return undefined;

    const digits = this.text.slice(start, this.pos);
    const value = Number(digits);
    if (!Number.isSafeInteger(value)) {
      throw new ParseError(`Number "${digits}" is too large`, this.offset + start, digits);
    }
    return value;
  }
}

// Each alternative either consumes the whole token or returns undefined.
type Alternative = (c: Cursor) => TimeModifier | undefined;

const months: Alternative = (c) => {
  const count = c.number();
  if (count === undefined || !c.eat('mo') || !c.done) return undefined;
  return { type: 'months', count };
};

const delays: Alternative = (c) => {
  let total = 0;
  while (!c.done) {
    const n = c.number();
    if (n === undefined) return undefined;
    const ms = unitMs(c.peek());
    if (ms === undefined) return undefined;
    c.pos++;
    total += n * ms;
  }
  if (c.pos === 0) return undefined;
  if (!Number.isSafeInteger(total)) {
    throw new ParseError(`Delay "${c.text}" is too long`, c.offset, c.text);
  }
  return { type: 'delay', ms: total };
};

const timeOfDay: Alternative = (c) => {
  const hour = c.number();
  if (hour === undefined) return undefined;

  let minute = 0;
  let minuteAt = c.pos;
  if (c.eat(':')) {
    minuteAt = c.pos;
    const m = c.number();
    if (m === undefined) return undefined;
    minute = m;
  }

  const meridiem = c.eat('am') ? 'am' : c.eat('pm') ? 'pm' : undefined;
  if (!c.done) return undefined;

  if (minute > 59) {
    throw new ParseError(`Invalid minute "${minute}"`, c.offset + minuteAt, String(minute));
  }

  if (meridiem === undefined) return { type: 'timeOfDay', hour: hour % 24, minute };
  return { type: 'timeOfDay', hour: (hour % 12) + (meridiem === 'pm' ? 12 : 0), minute };
};

const date: Alternative = (c) => {
  const year = c.number();
  if (!c.eat('-')) return undefined;
  const month = c.number();
  if (!c.eat('-')) return undefined;
  const day = c.number();
  if (day === undefined || !c.done) return undefined;

  return {
    type: 'date',
    ...(year !== undefined ? { year } : {}),
    ...(month !== undefined ? { month } : {}),
    day,
  };
};

// Only the leading letter may be capitalized: `tuesday` and `Tuesday`, not `TUESDAY`.
const weekday: Alternative = (c) => {
  for (const [index, name] of WEEKDAY_NAMES.entries()) {
    const capitalized = name.charAt(0).toUpperCase() + name.slice(1);
    if (c.text === name || c.text === capitalized) {
      c.pos = c.text.length;
      return { type: 'weekday', weekday: index };
    }
  }
  return undefined;
};

const ALTERNATIVES: Alternative[] = [months, delays, timeOfDay, date, weekday];

export function parsePlainModifier(token: string, offset = 0): TimeModifier {
  if (token === '') throw new ParseError('Expected a time modifier', offset, token);

  for (const alternative of ALTERNATIVES) {
    const result = alternative(new Cursor(token, offset));
    if (result) return result;
  }

  if (/^[A-Za-z]+$/.test(token)) throw new ParseError(`Unknown weekday "${token}"`, offset, token);
  throw new ParseError(`Invalid time modifier "${token}"`, offset, token);
}

function parseBranch(token: string, position: number): Modifier {
  const inner = token.slice(1, -1);
  const alternatives: TimeModifier[] = [];

  let consumed = 0;
  for (const part of inner.split(',')) {
    const item = part.trim();
    const itemAt = position + 1 + consumed + (part.length - part.trimStart().length);
    if (item === '') throw new ParseError('Empty alternative in branch', itemAt, token);
    alternatives.push(parsePlainModifier(item, itemAt));
    consumed += part.length + 1;
  }

  return { type: 'permutation', alternatives, position };
}

/**
 * Splits a time expression into modifiers. `offset` is where `text` starts in
 * the full command, so error positions point into the original message.
 */
export function parseTimeExpression(text: string, offset = 0): Modifier[] {
  if (text === '') throw new ParseError('Expected a time expression', offset, '');

  const modifiers: Modifier[] = [];
  let pos = 0;

  while (pos < text.length) {
    const start = pos;
    let token: string;

    if (text.charAt(pos) === '(') {
      const close = text.indexOf(')', pos);
      if (close === -1) throw new ParseError('Unclosed "("', offset + pos, text.slice(pos));
      token = text.slice(pos, close + 1);
      modifiers.push(parseBranch(token, offset + start));
    } else {
      const space = text.indexOf(' ', pos);
      token = text.slice(pos, space === -1 ? text.length : space);
      modifiers.push({ type: 'single', modifier: parsePlainModifier(token, offset + start), position: offset + start });
    }

    pos = start + token.length;
    if (pos === text.length) break;

    if (text.charAt(pos) !== ' ') {
      throw new ParseError(`Expected a space after "${token}"`, offset + pos, text.charAt(pos));
    }
    pos++;
    if (pos === text.length) throw new ParseError('Expected a time modifier', offset + pos, '');
  }

  return modifiers;
}

/** Upper bound on the candidate times one expression may produce. */
export const MAX_CANDIDATES = 50;

/**
 * Cross product of the branch alternatives, built left to right: a plain
 * modifier extends every candidate, a branch with k alternatives turns n
 * candidates into n*k (each prior candidate followed by each alternative).
 * Throws ParseError at the first branch that pushes the count past
 * MAX_CANDIDATES, before anything is built.
 */
export function expandPermutations(modifiers: readonly Modifier[]): TimeModifier[][] {
  let total = 1;
  for (const modifier of modifiers) {
    if (modifier.type !== 'permutation') continue;
    total *= modifier.alternatives.length;
    if (total > MAX_CANDIDATES) {
      throw new ParseError(
        `Too many alternatives: at most ${MAX_CANDIDATES} times per reminder`,
        modifier.position,
        '('
      );
    }
  }

  let candidates: TimeModifier[][] = [[]];

  for (const modifier of modifiers) {
    if (modifier.type === 'single') {
      candidates = candidates.map((sequence) => [...sequence, modifier.modifier]);
      continue;
    }

    const next: TimeModifier[][] = [];
    for (const sequence of candidates) {
      for (const alternative of modifier.alternatives) {
        next.push([...sequence, alternative]);
      }
    }
    candidates = next;
  }

  return candidates;
}

/** One timestamp per candidate sequence, in expansion order. */
export function evaluateTimeExpression(modifiers: readonly Modifier[], base: DateTime): DateTime[] {
  return expandPermutations(modifiers).map((sequence) => applyModifiers(sequence, base));
}
