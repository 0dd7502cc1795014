import { DEFAULT_COMMAND_PREFIX } from './commands/parser';
import { DEFAULT_TIME_ZONE } from './time';

export interface AppConfig {
  discordToken?: string;
  stateDir: string;
  defaultTimeZone: string;
  tickIntervalMs: number;
  commandPrefix: string;
}

const DEFAULT_TICK_MS = 1000;

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    discordToken: env.DISCORD_BOT_TOKEN?.trim(),
    stateDir: env.REMINDER_STATE_DIR?.trim() || 'state',
    defaultTimeZone: env.DEFAULT_TIME_ZONE?.trim() || DEFAULT_TIME_ZONE,
    tickIntervalMs: positiveInt(env.REMINDER_TICK_MS?.trim(), DEFAULT_TICK_MS),
    commandPrefix: env.COMMAND_PREFIX?.trim() || DEFAULT_COMMAND_PREFIX,
  };
}
