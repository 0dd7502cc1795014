/**
 * Reminder Store
 *
 * Per-user reminder lists, each kept sorted by trigger time. A reminder's ID
 * is its index in that list, so IDs shift whenever an earlier reminder is
 * added or removed.
 *
 * Every operation runs inside one mutex section and does no I/O there;
 * persistence reads `entries()` afterwards.
 */

import type { DateTime } from 'luxon';
import type { TimeModifier } from '../time';
import { Mutex } from '../utils/lock';
import { nextTriggerTime } from './recurrence';
import type { FiredReminder, Reminder, UserReminder } from './types';

function copy(reminder: Reminder): Reminder {
  return {
    triggerTime: reminder.triggerTime,
    message: reminder.message,
    ...(reminder.interval ? { interval: [...reminder.interval] } : {}),
  };
}

// Array.prototype.sort is stable, so equal trigger times keep insertion order.
export function sortReminders(list: Reminder[]): Reminder[] {
  return list.sort((a, b) => a.triggerTime.toMillis() - b.triggerTime.toMillis());
}

export class ReminderStore {
  private lists = new Map<string, Reminder[]>();
  private mutex = new Mutex();

  /** Inserts a reminder and returns its position after re-sorting. */
  async add(user: string, reminder: Reminder): Promise<number> {
    const [position] = await this.addAll(user, [reminder]);
    return position;
  }

  /**
   * Inserts several reminders at once. Positions are reported after all of
   * them are in, so none is stale by the time the caller sees it.
   */
  addAll(user: string, reminders: Reminder[]): Promise<number[]> {
    return this.mutex.run(() => {
      const list = this.listFor(user);
      const inserted = reminders.map(copy);
      list.push(...inserted);
      sortReminders(list);
      return inserted.map((reminder) => list.indexOf(reminder));
    });
  }

  list(user: string): Promise<Reminder[]> {
    return this.mutex.run(() => (this.lists.get(user) ?? []).map(copy));
  }

  removeAt(user: string, index: number): Promise<Reminder | undefined> {
    return this.mutex.run(() => {
      const list = this.lists.get(user);
      if (!list || !isIndex(list, index)) return undefined;

      const [removed] = list.splice(index, 1);
      if (list.length === 0) this.lists.delete(user);
      return copy(removed);
    });
  }

  /**
   * Makes the reminder at `index` repeat. Throws CalendarError, leaving the
   * reminder unchanged, if the interval cannot produce a later trigger time.
   */
  setInterval(user: string, index: number, interval: TimeModifier[]): Promise<Reminder | undefined> {
    return this.mutex.run(() => {
      const list = this.lists.get(user);
      if (!list || !isIndex(list, index)) return undefined;

      const reminder = list[index];
      nextTriggerTime(reminder.triggerTime, interval);
      reminder.interval = [...interval];
      return copy(reminder);
    });
  }

  clearInterval(user: string, index: number): Promise<Reminder | undefined> {
    return this.mutex.run(() => {
      const list = this.lists.get(user);
      if (!list || !isIndex(list, index)) return undefined;

      const reminder = list[index];
      delete reminder.interval;
      return copy(reminder);
    });
  }

  /**
   * Pops every reminder due at `now`, earliest first per user. Repeating
   * reminders are replaced by their successor; if the interval fails, the
   * recurrence ends and the error is reported on the fired entry.
   */
  takeDue(now: DateTime): Promise<FiredReminder[]> {
    const nowMs = now.toMillis();

    return this.mutex.run(() => {
      const fired: FiredReminder[] = [];

      for (const [user, list] of this.lists) {
        while (list.length > 0 && list[0].triggerTime.toMillis() <= nowMs) {
          const reminder = list[0];
          list.shift();

          const entry: FiredReminder = { user, reminder: copy(reminder) };
          if (reminder.interval) {
            try {
              const next: Reminder = {
                triggerTime: nextTriggerTime(reminder.triggerTime, reminder.interval),
                message: reminder.message,
                interval: reminder.interval,
              };
              list.push(next);
              sortReminders(list);
              entry.next = copy(next);
            } catch (err) {
              entry.recurrenceError = err instanceof Error ? err : new Error(String(err));
            }
          }
          fired.push(entry);
        }

        if (list.length === 0) this.lists.delete(user);
      }

      return fired;
    });
  }

  /** Flat copy of every user's reminders, for snapshots. */
  entries(): Promise<UserReminder[]> {
    return this.mutex.run(() => {
      const out: UserReminder[] = [];
      for (const [user, list] of this.lists) {
        for (const reminder of list) out.push({ user, reminder: copy(reminder) });
      }
      return out;
    });
  }

  /** Replaces all state, re-sorting each user's list regardless of input order. */
  replaceAll(records: UserReminder[]): Promise<void> {
    return this.mutex.run(() => {
      this.lists.clear();
      for (const { user, reminder } of records) {
        this.listFor(user).push(copy(reminder));
      }
      for (const list of this.lists.values()) sortReminders(list);
    });
  }

  private listFor(user: string): Reminder[] {
    let list = this.lists.get(user);
    if (!list) {
      list = [];
      this.lists.set(user, list);
    }
    return list;
  }
}

function isIndex(list: Reminder[], index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < list.length;
}
