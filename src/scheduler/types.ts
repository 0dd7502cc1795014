import type { SnapshotRequester } from '../persistence/writer';
import type { ReminderStore } from '../reminders/store';

/** Delivers a fired reminder. Implementations may reject; the loop logs and moves on. */
export interface Notifier {
  sendDirectMessage: (userId: string, text: string) => Promise<void>;
}

export interface SchedulerContext {
  reminders: ReminderStore;
  notifier: Notifier;
  snapshots: SnapshotRequester;
  /** Defaults to one second. */
  tickMs?: number;
}

export interface SchedulerHandle {
  stop: () => void;
}
