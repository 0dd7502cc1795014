/**
 * Snapshot files
 *
 * Two JSON files in the state directory, each rewritten whole on every save:
 * - reminders.json:   [{ user, reminder: { triggerTime, message, interval? } }]
 * - preferences.json: { [user]: { timezone, displayFormat } }
 *
 * `timezones.json` is the older preference format (user -> timezone name);
 * see migrate.ts.
 */

import { existsSync, readFileSync } from 'fs';
import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { z } from 'zod';
import type { PreferenceStore } from '../reminders/preferences';
import type { ReminderStore } from '../reminders/store';
import type { Preferences, UserReminder } from '../reminders/types';
import { fromZonedString, toZonedString, type TimeModifier } from '../time';

export interface SnapshotPaths {
  remindersFile: string;
  preferencesFile: string;
  legacyTimezonesFile: string;
}

export function snapshotPaths(stateDir: string): SnapshotPaths {
  return {
    remindersFile: join(stateDir, 'reminders.json'),
    preferencesFile: join(stateDir, 'preferences.json'),
    legacyTimezonesFile: join(stateDir, 'timezones.json'),
  };
}

export class SnapshotError extends Error {
  constructor(
    message: string,
    readonly file: string,
    options?: { cause?: unknown }
  ) {
    super(`${file}: ${message}`, options);
    this.name = 'SnapshotError';
  }
}

const count = z.number().int().nonnegative();
const weekday = z.number().int().min(0).max(6);
const hour = z.number().int().min(0).max(23);
const minute = z.number().int().min(0).max(59);

const TimeModifierSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('delay'), ms: count }),
  z.object({ type: z.literal('weekday'), weekday }),
  z.object({ type: z.literal('timeOfDay'), hour, minute }),
  z.object({ type: z.literal('date'), year: count.optional(), month: count.optional(), day: count }),
  z.object({ type: z.literal('months'), count }),
]);

// First-release files wrote each modifier as a single-key object named after
// its variant, e.g. { "Delay": 86400000 } or { "TimeOfDay": { "hour": 9, "minute": 0 } }.
const LegacyTimeModifierSchema = z.union([
  z.object({ Delay: count }).strict().transform((m): TimeModifier => ({ type: 'delay', ms: m.Delay })),
  z.object({ Weekday: weekday }).strict().transform((m): TimeModifier => ({ type: 'weekday', weekday: m.Weekday })),
  z
    .object({ TimeOfDay: z.object({ hour, minute }) })
    .strict()
    .transform((m): TimeModifier => ({ type: 'timeOfDay', ...m.TimeOfDay })),
  z
    .object({ Date: z.object({ year: count, month: count, day: count }) })
    .strict()
    .transform((m): TimeModifier => ({ type: 'date', ...m.Date })),
  z.object({ Months: count }).strict().transform((m): TimeModifier => ({ type: 'months', count: m.Months })),
]);

// `time` is the key used by the first release of the reminders file.
const ReminderSchema = z
  .object({
    triggerTime: z.string().optional(),
    time: z.string().optional(),
    message: z.string(),
    interval: z.array(z.union([TimeModifierSchema, LegacyTimeModifierSchema])).nullish(),
  })
  .refine((r) => r.triggerTime !== undefined || r.time !== undefined, {
    message: 'reminder has no triggerTime',
  });

// Snowflakes exceed 2^53, so a numeric id may already have been rounded by JSON.parse.
const UserIdSchema = z.union([
  z.string().min(1),
  z
    .number()
    .int()
    .nonnegative()
    .refine((n) => Number.isSafeInteger(n), { message: 'numeric user id is not exact; store it as a string' })
    .transform(String),
]);

const RemindersFileSchema = z.array(
  z.object({
    user: UserIdSchema,
    reminder: ReminderSchema,
  })
);

const PreferencesFileSchema = z.record(
  z.object({
    timezone: z.string(),
    displayFormat: z.enum(['12h', '24h']).default('12h'),
  })
);

const LegacyTimezonesSchema = z.record(z.string());

function parseJson<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, file: string): T {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new SnapshotError('not valid JSON', file, { cause: err });
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SnapshotError(`${issue.path.join('.') || '(root)'}: ${issue.message}`, file, { cause: result.error });
  }
  return result.data;
}

interface ReminderJson {
  triggerTime: string;
  message: string;
  interval?: TimeModifier[];
}

export function encodeReminders(entries: UserReminder[]): string {
  const records = entries.map(({ user, reminder }) => {
    const json: ReminderJson = { triggerTime: toZonedString(reminder.triggerTime), message: reminder.message };
    if (reminder.interval) json.interval = reminder.interval;
    return { user, reminder: json };
  });
  return JSON.stringify(records, null, 2) + '\n';
}

export function decodeReminders(raw: string, file: string): UserReminder[] {
  return parseJson(raw, RemindersFileSchema, file).map(({ user, reminder }, index) => {
    const text = reminder.triggerTime ?? reminder.time ?? '';
    const triggerTime = fromZonedString(text);
    if (!triggerTime) {
      throw new SnapshotError(`${index}.reminder.triggerTime: invalid timestamp "${text}"`, file);
    }
    return {
      user,
      reminder: {
        triggerTime,
        message: reminder.message,
        ...(reminder.interval && reminder.interval.length > 0 ? { interval: reminder.interval } : {}),
      },
    };
  });
}

export function encodePreferences(records: Record<string, Preferences>): string {
  return JSON.stringify(records, null, 2) + '\n';
}

export function decodePreferences(raw: string, file: string): Record<string, Preferences> {
  return parseJson(raw, PreferencesFileSchema, file);
}

export function decodeLegacyTimezones(raw: string, file: string): Record<string, string> {
  return parseJson(raw, LegacyTimezonesSchema, file);
}

/** Missing file -> null. Any other read error propagates. */
export function readSnapshotFile(file: string): string | null {
  if (!existsSync(file)) return null;
  return readFileSync(file, 'utf-8');
}

export async function writeFileAtomic(file: string, content: string): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  const tmp = `${file}.tmp-${process.pid}-${Date.now()}`;
  await writeFile(tmp, content, 'utf-8');
  await rename(tmp, file);
}

export interface Stores {
  reminders: ReminderStore;
  preferences: PreferenceStore;
}

/**
 * Restores both stores. A missing file starts that store empty; a malformed
 * one throws SnapshotError, which is meant to abort startup.
 */
export async function loadSnapshot(
  paths: SnapshotPaths,
  stores: Stores
): Promise<{ reminders: number; preferences: number }> {
  const remindersRaw = readSnapshotFile(paths.remindersFile);
  const reminders = remindersRaw === null ? [] : decodeReminders(remindersRaw, paths.remindersFile);

  const preferencesRaw = readSnapshotFile(paths.preferencesFile);
  const preferences = preferencesRaw === null ? {} : decodePreferences(preferencesRaw, paths.preferencesFile);

  await stores.reminders.replaceAll(reminders);
  await stores.preferences.replaceAll(preferences);

  return { reminders: reminders.length, preferences: Object.keys(preferences).length };
}
