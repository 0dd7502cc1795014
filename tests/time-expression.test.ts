import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';
import {
  evaluateTimeExpression,
  expandPermutations,
  MAX_CANDIDATES,
  ParseError,
  parsePlainModifier,
  parseTimeExpression,
} from '../src/commands';

function parseFailure(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('expected a ParseError');
}

describe('parsePlainModifier', () => {
  it('sums a run of durations into one delay', () => {
    expect(parsePlainModifier('1w1h5m3s')).toEqual({ type: 'delay', ms: 604_800_000 + 3_600_000 + 300_000 + 3_000 });
    expect(parsePlainModifier('2d')).toEqual({ type: 'delay', ms: 172_800_000 });
  });

  it('reads months before minutes', () => {
    expect(parsePlainModifier('1mo')).toEqual({ type: 'months', count: 1 });
    expect(parsePlainModifier('1m')).toEqual({ type: 'delay', ms: 60_000 });
  });

  it('reads 12-hour clock times', () => {
    expect(parsePlainModifier('3pm')).toEqual({ type: 'timeOfDay', hour: 15, minute: 0 });
    expect(parsePlainModifier('3:30am')).toEqual({ type: 'timeOfDay', hour: 3, minute: 30 });
    expect(parsePlainModifier('12am')).toEqual({ type: 'timeOfDay', hour: 0, minute: 0 });
    expect(parsePlainModifier('12pm')).toEqual({ type: 'timeOfDay', hour: 12, minute: 0 });
  });

  it('reads 24-hour clock times when there is no suffix', () => {
    expect(parsePlainModifier('15:45')).toEqual({ type: 'timeOfDay', hour: 15, minute: 45 });
    expect(parsePlainModifier('27')).toEqual({ type: 'timeOfDay', hour: 3, minute: 0 });
  });

  it('reads full and partial dates', () => {
    expect(parsePlainModifier('2001-03-06')).toEqual({ type: 'date', year: 2001, month: 3, day: 6 });
    expect(parsePlainModifier('-04-15')).toEqual({ type: 'date', month: 4, day: 15 });
    expect(parsePlainModifier('--9')).toEqual({ type: 'date', day: 9 });
  });

  it('accepts lowercase and capitalized weekdays only', () => {
    expect(parsePlainModifier('tuesday')).toEqual({ type: 'weekday', weekday: 1 });
    expect(parsePlainModifier('Sunday')).toEqual({ type: 'weekday', weekday: 6 });

    const err = parseFailure(() => parsePlainModifier('TUESDAY', 7));
    expect(err.reason).toBe('Unknown weekday "TUESDAY"');
    expect(err.position).toBe(7);
  });

  it('rejects minutes past 59', () => {
    const err = parseFailure(() => parsePlainModifier('3:75pm'));
    expect(err.reason).toBe('Invalid minute "75"');
    expect(err.position).toBe(2);
  });

  it('rejects numbers that do not fit', () => {
    const err = parseFailure(() => parsePlainModifier('99999999999999999999d'));
    expect(err.reason).toBe('Number "99999999999999999999" is too large');
  });

  it('rejects unknown units', () => {
    expect(parseFailure(() => parsePlainModifier('1x')).reason).toBe('Invalid time modifier "1x"');
    expect(parseFailure(() => parsePlainModifier('2001-03')).reason).toBe('Invalid time modifier "2001-03"');
  });
});

describe('parseTimeExpression', () => {
  it('splits plain modifiers and branches with their positions', () => {
    expect(parseTimeExpression('(1d,2d) 3pm')).toEqual([
      {
        type: 'permutation',
        alternatives: [
          { type: 'delay', ms: 86_400_000 },
          { type: 'delay', ms: 172_800_000 },
        ],
        position: 0,
      },
      { type: 'single', modifier: { type: 'timeOfDay', hour: 15, minute: 0 }, position: 8 },
    ]);
  });

  it('allows spaces around branch alternatives', () => {
    const [branch] = parseTimeExpression('( 1d , tuesday )');
    expect(branch).toEqual({
      type: 'permutation',
      alternatives: [
        { type: 'delay', ms: 86_400_000 },
        { type: 'weekday', weekday: 1 },
      ],
      position: 0,
    });
  });

  it('offsets positions into the surrounding command', () => {
    const err = parseFailure(() => parseTimeExpression('1d tusday', 3));
    expect(err.reason).toBe('Unknown weekday "tusday"');
    expect(err.position).toBe(6);
    expect(err.token).toBe('tusday');
  });

  it('requires single spaces between modifiers', () => {
    const err = parseFailure(() => parseTimeExpression('1d  3pm'));
    expect(err.reason).toBe('Expected a time modifier');
    expect(err.position).toBe(3);
  });

  it('rejects a trailing space', () => {
    expect(parseFailure(() => parseTimeExpression('1d ')).position).toBe(3);
  });

  it('rejects unclosed and empty branches', () => {
    expect(parseFailure(() => parseTimeExpression('(1d,2d')).reason).toBe('Unclosed "("');

    const empty = parseFailure(() => parseTimeExpression('(1d,,2d)'));
    expect(empty.reason).toBe('Empty alternative in branch');
    expect(empty.position).toBe(4);
  });

  it('requires a space after a branch', () => {
    expect(parseFailure(() => parseTimeExpression('(1d,2d)3pm')).reason).toBe('Expected a space after "(1d,2d)"');
  });

  it('rejects an empty expression', () => {
    expect(parseFailure(() => parseTimeExpression('')).reason).toBe('Expected a time expression');
  });
});

describe('expandPermutations', () => {
  it('returns a single sequence when there are no branches', () => {
    expect(expandPermutations(parseTimeExpression('1d 3pm'))).toEqual([
      [
        { type: 'delay', ms: 86_400_000 },
        { type: 'timeOfDay', hour: 15, minute: 0 },
      ],
    ]);
  });

  it('builds the cross product in discovery order', () => {
    const sequences = expandPermutations(parseTimeExpression('(1d,2d) (3pm,4pm)'));
    expect(sequences.map((seq) => seq.map((m) => (m.type === 'delay' ? `${m.ms / 86_400_000}d` : `${m.type}`)))).toEqual(
      [
        ['1d', 'timeOfDay'],
        ['1d', 'timeOfDay'],
        ['2d', 'timeOfDay'],
        ['2d', 'timeOfDay'],
      ]
    );
    expect(sequences.map(([, time]) => (time.type === 'timeOfDay' ? time.hour : -1))).toEqual([15, 16, 15, 16]);
  });

  it('multiplies candidate counts across branches', () => {
    expect(expandPermutations(parseTimeExpression('(1d,2d,3d) 9am (1h,2h)'))).toHaveLength(6);
  });

  it('allows exactly the maximum number of candidates', () => {
    const expression = '(1s,2s,3s,4s,5s) (1m,2m,3m,4m,5m,6m,7m,8m,9m,10m)';
    expect(expandPermutations(parseTimeExpression(expression))).toHaveLength(MAX_CANDIDATES);
  });

  it('stops at the branch that exceeds the maximum', () => {
    // Six two-way branches make 64 candidates; the sixth one starts at 40.
    const expression = Array.from({ length: 6 }, () => '(1s,2s)').join(' ');
    const err = parseFailure(() => expandPermutations(parseTimeExpression(expression)));
    expect(err.reason).toBe('Too many alternatives: at most 50 times per reminder');
    expect(err.position).toBe(40);
  });
});

describe('evaluateTimeExpression', () => {
  it('gives one timestamp per alternative for (1d,2d) 3pm', () => {
    const now = DateTime.fromISO('2024-05-10T09:00:00', { zone: 'America/New_York' });
    const times = evaluateTimeExpression(parseTimeExpression('(1d,2d) 3pm'), now);

    expect(times).toHaveLength(2);
    expect(times.map((t) => [t.hour, t.minute])).toEqual([
      [15, 0],
      [15, 0],
    ]);
    expect(times.map((t) => t.toISO())).toEqual(['2024-05-11T15:00:00.000-04:00', '2024-05-12T15:00:00.000-04:00']);
  });
});
