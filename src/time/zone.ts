import { DateTime, IANAZone, SystemZone } from 'luxon';

export const DEFAULT_TIME_ZONE = 'America/New_York';

export function isValidTimeZone(name: string): boolean {
  return IANAZone.isValidZone(name);
}

/**
 * Zone names come from user input and old snapshots, so an unknown name
 * falls back to the host zone instead of failing the command.
 */
export function resolveTimeZone(name: string | undefined): string {
  if (name && isValidTimeZone(name)) return name;
  return SystemZone.instance.name;
}

export function nowInTimeZone(timeZone: string, now: DateTime = DateTime.now()): DateTime {
  return now.setZone(timeZone);
}

const ZONED_RE = /^(.+)\[([^\]]+)\]$/;

/**
 * RFC 9557 form: ISO-8601 with offset plus the zone name in brackets,
 * e.g. `2001-03-06T15:00:00.000-05:00[America/New_York]`.
 */
export function toZonedString(time: DateTime): string {
  const iso = time.toISO();
  if (!time.isValid || iso === null) {
    throw new Error(`Cannot serialize invalid time: ${time.invalidExplanation ?? 'unknown reason'}`);
  }
  return `${iso}[${time.zoneName}]`;
}

export function fromZonedString(text: string): DateTime | null {
  const match = ZONED_RE.exec(text);
  const parsed = match
    ? DateTime.fromISO(match[1], { zone: match[2] })
    : DateTime.fromISO(text, { setZone: true });
  return parsed.isValid ? parsed : null;
}
