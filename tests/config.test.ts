import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({})).toEqual({
      discordToken: undefined,
      stateDir: 'state',
      defaultTimeZone: 'America/New_York',
      tickIntervalMs: 1000,
      commandPrefix: '$',
    });
  });

  it('reads and trims overrides', () => {
    expect(
      loadConfig({
        DISCORD_BOT_TOKEN: ' test-token ',
        REMINDER_STATE_DIR: '/var/lib/reminders',
        DEFAULT_TIME_ZONE: 'Europe/Berlin',
        REMINDER_TICK_MS: '250',
        COMMAND_PREFIX: '!',
      })
    ).toEqual({
      discordToken: 'test-token',
      stateDir: '/var/lib/reminders',
      defaultTimeZone: 'Europe/Berlin',
      tickIntervalMs: 250,
      commandPrefix: '!',
    });
  });

  it('ignores a tick period that is not a positive integer', () => {
    expect(loadConfig({ REMINDER_TICK_MS: '0' }).tickIntervalMs).toBe(1000);
    expect(loadConfig({ REMINDER_TICK_MS: 'fast' }).tickIntervalMs).toBe(1000);
    expect(loadConfig({ REMINDER_TICK_MS: '1.5' }).tickIntervalMs).toBe(1000);
  });
});
