import { DEFAULT_TIME_ZONE, resolveTimeZone, type DisplayFormat } from '../time';
import { RwLock } from '../utils/lock';
import type { Preferences } from './types';

export const DEFAULT_DISPLAY_FORMAT: DisplayFormat = '12h';

/**
 * Per-user timezone and clock format. Reads share the lock, writes take it
 * exclusively. Records are created on first write and never deleted.
 */
export class PreferenceStore {
  private records = new Map<string, Preferences>();
  private lock = new RwLock();

  constructor(private readonly defaultTimeZone: string = DEFAULT_TIME_ZONE) {}

  defaults(): Preferences {
    return { timezone: this.defaultTimeZone, displayFormat: DEFAULT_DISPLAY_FORMAT };
  }

  get(user: string): Promise<Preferences> {
    return this.lock.read(() => ({ ...(this.records.get(user) ?? this.defaults()) }));
  }

  has(user: string): Promise<boolean> {
    return this.lock.read(() => this.records.has(user));
  }

  /** Applies a field-level change on top of the current (or default) record. */
  update(user: string, mutator: (current: Preferences) => Partial<Preferences>): Promise<Preferences> {
    return this.lock.write(() => {
      const current = this.records.get(user) ?? this.defaults();
      const updated = { ...current, ...mutator({ ...current }) };
      this.records.set(user, updated);
      return { ...updated };
    });
  }

  /** The user's zone if it is a known IANA name, otherwise the host zone. */
  async resolveTimeZone(user: string): Promise<string> {
    const { timezone } = await this.get(user);
    return resolveTimeZone(timezone);
  }

  entries(): Promise<Record<string, Preferences>> {
    return this.lock.read(() => {
      const out: Record<string, Preferences> = {};
      for (const [user, prefs] of this.records) out[user] = { ...prefs };
      return out;
    });
  }

  replaceAll(records: Record<string, Preferences>): Promise<void> {
    return this.lock.write(() => {
      this.records.clear();
      for (const [user, prefs] of Object.entries(records)) {
        this.records.set(user, { ...prefs });
      }
    });
  }
}
