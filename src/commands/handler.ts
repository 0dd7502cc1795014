import type { SnapshotRequester } from '../persistence/writer';
import type { PreferenceStore } from '../reminders/preferences';
import type { ReminderStore } from '../reminders/store';
import type { Reminder } from '../reminders/types';
import { applyModifiers, formatReminderTime, isValidTimeZone, type DisplayFormat } from '../time';
import { InvalidReminderIdError, UnknownTimezoneError } from './errors';
import type { Command } from './types';

export interface CommandContext {
  reminders: ReminderStore;
  preferences: PreferenceStore;
  snapshots: SnapshotRequester;
  prefix: string;
}

export function helpText(prefix: string): string {
  return [
    'Time modifier examples:',
    '1d - 1 day from now',
    '1w1h5m3s - 1 week, 1 hour, 5 minutes, 3 seconds from now',
    '3pm - 3:00 PM',
    '3:30pm - 3:30 PM',
    '15:30 - 3:30 PM (24-hour clock)',
    '2001-03-06 - March 6th, 2001',
    '-04-15 - April 15th this year',
    '1mo - 1 month',
    'tuesday - Next Tuesday',
    '1w tuesday - The next Tuesday in 1 week',
    '(1d, 2d) 3pm - Both tomorrow and the day after at 3:00 PM',
    '',
    'Commands:',
    `\`${prefix}r|remindme|reminder <modifiers>; <message>\` - Schedule a reminder`,
    `\`${prefix}cr|cancelreminder <id>\` - Cancel a reminder`,
    `\`${prefix}rs|reminders\` - List reminders`,
    `\`${prefix}si|setinterval <id> <modifiers>\` - Repeat a reminder on an interval`,
    `\`${prefix}ci|clearinterval <id>\` - Clear the interval of a reminder`,
    `\`${prefix}tz|timezone <timezone>\` - Set your timezone (e.g. America/Chicago)`,
    `\`${prefix}tf|timeformat 12h|24h\` - Set how times are shown`,
    `\`${prefix}h|help\` - Show help`,
  ].join('\n');
}

function describeReminder(id: number, reminder: Reminder, format: DisplayFormat): string {
  let line = `${id}: ${formatReminderTime(reminder.triggerTime, format)} - ${reminder.message}`;
  if (reminder.interval) {
    const next = applyModifiers(reminder.interval, reminder.triggerTime);
    line += ` (Repeats at ${formatReminderTime(next, format)})`;
  }
  return line;
}

/**
 * Executes a parsed command for `user` and returns the reply text.
 *
 * Throws InvalidReminderIdError, UnknownTimezoneError or CalendarError for
 * failures the user should see; see `describeCommandError`.
 */
export async function handleCommand(ctx: CommandContext, user: string, command: Command): Promise<string> {
  switch (command.type) {
    case 'scheduleReminder': {
      const { displayFormat } = await ctx.preferences.get(user);
      const reminders = command.times.map((triggerTime) => ({ triggerTime, message: command.message }));
      const ids = await ctx.reminders.addAll(user, reminders);
      ctx.snapshots.request();
      return reminders
        .map((r, i) => `Scheduled reminder for ${formatReminderTime(r.triggerTime, displayFormat)} (#${ids[i]})`)
        .join('\n');
    }

    case 'cancelReminder': {
      const removed = await ctx.reminders.removeAt(user, command.id);
      if (!removed) throw new InvalidReminderIdError(command.id);
      ctx.snapshots.request();
      return `Removed reminder '${removed.message}'`;
    }

    case 'setInterval': {
      const updated = await ctx.reminders.setInterval(user, command.id, command.modifiers);
      if (!updated) throw new InvalidReminderIdError(command.id);
      ctx.snapshots.request();
      return `Set interval for reminder '${updated.message}' (#${command.id})`;
    }

    case 'clearInterval': {
      const updated = await ctx.reminders.clearInterval(user, command.id);
      if (!updated) throw new InvalidReminderIdError(command.id);
      ctx.snapshots.request();
      return `Cleared interval for reminder '${updated.message}' (#${command.id})`;
    }

    case 'listReminders': {
      const [list, { displayFormat }] = await Promise.all([
        ctx.reminders.list(user),
        ctx.preferences.get(user),
      ]);
      if (list.length === 0) return 'No reminders';
      return list.map((reminder, id) => describeReminder(id, reminder, displayFormat)).join('\n');
    }

    case 'setTimezone': {
      if (!isValidTimeZone(command.timezone)) throw new UnknownTimezoneError(command.timezone);
      await ctx.preferences.update(user, () => ({ timezone: command.timezone }));
      ctx.snapshots.request();
      return `Timezone set to ${command.timezone}`;
    }

    case 'setTimeFormat': {
      await ctx.preferences.update(user, () => ({ displayFormat: command.format }));
      ctx.snapshots.request();
      return `Time format set to ${command.format}`;
    }

    case 'help':
      return helpText(ctx.prefix);
  }
}
