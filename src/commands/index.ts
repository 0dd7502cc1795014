import { CalendarError } from '../time';
import { InvalidReminderIdError, ParseError, UnknownTimezoneError } from './errors';
import { handleCommand, type CommandContext } from './handler';
import { parseCommand } from './parser';

export * from './errors';
export * from './handler';
export * from './parser';
export * from './time-expression';
export type * from './types';

/** User-facing text for an expected command failure, or null for anything else. */
export function describeCommandError(err: unknown): string | null {
  if (err instanceof ParseError) return `Invalid command: ${err.message}`;
  if (err instanceof InvalidReminderIdError || err instanceof UnknownTimezoneError) return err.message;
  if (err instanceof CalendarError) return `Time computation error: ${err.message}`;
  return null;
}

/**
 * Parses and runs one inbound message. Returns the reply, or null when the
 * text is not addressed to the bot (no command prefix).
 */
export async function respondToMessage(ctx: CommandContext, user: string, text: string): Promise<string | null> {
  if (!text.startsWith(ctx.prefix)) return null;

  try {
    const timeZone = await ctx.preferences.resolveTimeZone(user);
    const command = parseCommand(text, { timeZone, prefix: ctx.prefix });
    return await handleCommand(ctx, user, command);
  } catch (err) {
    const description = describeCommandError(err);
    if (description === null) throw err;
    return description;
  }
}
