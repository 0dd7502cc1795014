/**
 * One-time import of the legacy `timezones.json` (user -> timezone name)
 * into the merged preferences file.
 */

import { unlink } from 'fs/promises';
import { logJson } from '../log';
import type { PreferenceStore } from '../reminders/preferences';
import {
  decodeLegacyTimezones,
  encodePreferences,
  readSnapshotFile,
  writeFileAtomic,
  type SnapshotPaths,
} from './snapshot';

/**
 * Folds legacy timezones into the preference store, saves the merged file,
 * then deletes the legacy one. Users that already have a merged record keep
 * it. Returns the number of imported users, or null if there was nothing to
 * migrate.
 */
export async function migrateLegacyTimezones(
  paths: SnapshotPaths,
  preferences: PreferenceStore
): Promise<number | null> {
  const raw = readSnapshotFile(paths.legacyTimezonesFile);
  if (raw === null) return null;

  const legacy = decodeLegacyTimezones(raw, paths.legacyTimezonesFile);

  let imported = 0;
  for (const [user, timezone] of Object.entries(legacy)) {
    if (await preferences.has(user)) continue;
    await preferences.update(user, () => ({ timezone }));
    imported++;
  }

  await writeFileAtomic(paths.preferencesFile, encodePreferences(await preferences.entries()));
  await unlink(paths.legacyTimezonesFile);

  console.log(`[Migrate] Imported ${imported} legacy timezone(s) from ${paths.legacyTimezonesFile}`);
  logJson({ event: 'legacy_timezones_migrated', imported });
  return imported;
}
