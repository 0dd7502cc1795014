/**
 * Background snapshot writer.
 *
 * At most one write runs at a time, with at most one more queued behind it.
 * Requests that arrive while a write is queued collapse into it; the queued
 * write reads the stores when it starts, so it still stores the latest state.
 */

import { logJson } from '../log';
import { encodePreferences, encodeReminders, writeFileAtomic, type SnapshotPaths, type Stores } from './snapshot';

export interface SnapshotRequester {
  request(): { started: boolean; queued: boolean };
}

export class SnapshotWriter implements SnapshotRequester {
  private running: Promise<void> | null = null;
  private pending = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly stores: Stores,
    private readonly paths: SnapshotPaths
  ) {}

  request(): { started: boolean; queued: boolean } {
    if (this.running) {
      this.pending = true;
      return { started: false, queued: true };
    }

    this.start();
    return { started: true, queued: false };
  }

  /** Resolves once no write is running or queued. */
  idle(): Promise<void> {
    if (!this.running) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private start(): void {
    this.running = this.write()
      .catch((err) => {
        console.error('[Snapshot] Write failed:', err);
        logJson({ event: 'snapshot_error', error: String(err) });
      })
      .finally(() => {
        this.running = null;
        if (this.pending) {
          this.pending = false;
          this.start();
          return;
        }
        for (const resolve of this.idleWaiters.splice(0)) resolve();
      });
  }

  private async write(): Promise<void> {
    const reminders = await this.stores.reminders.entries();
    const preferences = await this.stores.preferences.entries();

    await writeFileAtomic(this.paths.remindersFile, encodeReminders(reminders));
    await writeFileAtomic(this.paths.preferencesFile, encodePreferences(preferences));
  }
}
