import 'dotenv/config';
import { Events } from 'discord.js';
import { loadConfig } from './config';
import { logJson } from './log';
import { createDiscordClient } from './discord/client';
import { createDiscordTransport } from './discord/transport';
import { registerEventHandlers } from './discord/events';
import { ReminderStore } from './reminders/store';
import { PreferenceStore } from './reminders/preferences';
import { loadSnapshot, snapshotPaths } from './persistence/snapshot';
import { migrateLegacyTimezones } from './persistence/migrate';
import { SnapshotWriter } from './persistence/writer';
import { startSchedulerLoop, type SchedulerHandle } from './scheduler';
import { isValidTimeZone } from './time';

async function main() {
  const cfg = loadConfig();

  if (!cfg.discordToken) {
    throw new Error('DISCORD_BOT_TOKEN not set. Add it to your .env file.');
  }
  if (!isValidTimeZone(cfg.defaultTimeZone)) {
    throw new Error(`DEFAULT_TIME_ZONE "${cfg.defaultTimeZone}" is not a known IANA timezone.`);
  }

  console.log('Starting reminder bot...');
  console.log(`  State: ${cfg.stateDir}`);
  console.log(`  Default timezone: ${cfg.defaultTimeZone}`);

  const paths = snapshotPaths(cfg.stateDir);
  const reminders = new ReminderStore();
  const preferences = new PreferenceStore(cfg.defaultTimeZone);

  // A malformed snapshot throws here and aborts startup.
  const loaded = await loadSnapshot(paths, { reminders, preferences });
  console.log(`  Loaded ${loaded.reminders} reminder(s), ${loaded.preferences} preference record(s)`);
  await migrateLegacyTimezones(paths, preferences);

  const snapshots = new SnapshotWriter({ reminders, preferences }, paths);

  const client = createDiscordClient();
  const transport = createDiscordTransport(client);

  registerEventHandlers(client, {
    commands: { reminders, preferences, snapshots, prefix: cfg.commandPrefix },
    transport,
  });

  let scheduler: SchedulerHandle | null = null;

  client.once(Events.ClientReady, (c) => {
    console.log(`\nDiscord bot ready as ${c.user.tag}`);
    console.log('\nListening for commands...');
    logJson({ event: 'ready', user: c.user.tag, guilds: c.guilds.cache.size });

    scheduler = startSchedulerLoop({
      reminders,
      notifier: transport,
      snapshots,
      tickMs: cfg.tickIntervalMs,
    });
  });

  client.on('error', (error) => {
    console.error('Discord client error:', error);
    logJson({ event: 'error', error: String(error) });
  });

  client.on('warn', (message) => {
    console.warn('Discord warning:', message);
  });

  const shutdown = async (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down...`);
    scheduler?.stop();
    await snapshots.idle();
    await client.destroy();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err) => {
          console.error('Shutdown failed:', err);
          process.exit(1);
        }
      );
    });
  }

  await client.login(cfg.discordToken);
}

main().catch((e) => {
  console.error('Fatal error:', e);
  process.exitCode = 1;
});
