/**
 * Background Scheduler Loop
 *
 * Runs in the main bot process, checking every second for reminders that
 * are due. Repeating reminders are rescheduled by the store before delivery.
 */

import { DateTime } from 'luxon';
import { logJson } from '../log';
import type { FiredReminder } from '../reminders/types';
import { toZonedString } from '../time';
import type { SchedulerContext, SchedulerHandle } from './types';

const DEFAULT_TICK_MS = 1000;

export function reminderText(message: string): string {
  return `Reminder: ${message}`;
}

/**
 * Start the background scheduler loop.
 * Call this after the Discord client is ready.
 */
export function startSchedulerLoop(ctx: SchedulerContext): SchedulerHandle {
  const tickMs = ctx.tickMs ?? DEFAULT_TICK_MS;
  console.log(`[Scheduler] Starting reminder loop (every ${tickMs}ms)`);

  let ticking = false;
  const tick = () => {
    // A slow delivery can outlast the period; skip instead of stacking ticks.
    if (ticking) return;
    ticking = true;
    runSchedulerTick(ctx)
      .catch((err) => {
        console.error('[Scheduler] Error on tick:', err);
        logJson({ event: 'scheduler_error', error: String(err) });
      })
      .finally(() => {
        ticking = false;
      });
  };

  // Run immediately on startup so reminders that came due while offline fire now
  tick();
  const timer = setInterval(tick, tickMs);

  return {
    stop: () => {
      clearInterval(timer);
      console.log('[Scheduler] Stopped');
    },
  };
}

async function deliver(ctx: SchedulerContext, fired: FiredReminder): Promise<void> {
  try {
    await ctx.notifier.sendDirectMessage(fired.user, reminderText(fired.reminder.message));
    logJson({ event: 'reminder_sent', user: fired.user, triggerTime: toZonedString(fired.reminder.triggerTime) });
  } catch (err) {
    console.error(`[Scheduler] Failed to send reminder to ${fired.user}:`, err);
    logJson({ event: 'reminder_send_error', user: fired.user, error: String(err) });
  }
}

/**
 * Single tick: fire everything due at `now`, then save if anything changed.
 */
export async function runSchedulerTick(
  ctx: SchedulerContext,
  now: DateTime = DateTime.now()
): Promise<FiredReminder[]> {
  const fired = await ctx.reminders.takeDue(now);
  if (fired.length === 0) return fired;

  for (const entry of fired) {
    if (entry.recurrenceError) {
      console.error(
        `[Scheduler] Failed to reschedule reminder '${entry.reminder.message}' for ${entry.user}:`,
        entry.recurrenceError.message
      );
      logJson({ event: 'reschedule_error', user: entry.user, error: entry.recurrenceError.message });
    }
    await deliver(ctx, entry);
  }

  ctx.snapshots.request();
  return fired;
}
