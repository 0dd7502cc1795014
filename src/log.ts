import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

const DEFAULT_LOG_FILE = 'logs/reminders.log';

// Token patterns to redact from logs (Discord bot tokens, API keys, etc.)
const DISCORD_TOKEN_RE = /\b[MNO][A-Za-z\d_-]{23,27}\.[A-Za-z\d_-]{6}\.[A-Za-z\d_-]{27,40}\b/g;
const BOT_AUTH_RE = /\bBot\s+[A-Za-z\d._-]{20,}/g;
// API keys: sk-xxx, sk_live_xxx, key-xxx, xoxb-xxx, xoxp-xxx, etc.
const API_KEY_RE = /\b(sk[-_][A-Za-z0-9_-]{20,}|key[-_][A-Za-z0-9_-]{20,}|xox[a-z]-[A-Za-z0-9_-]{10,})\b/gi;

export function redactSecrets(text: string): string {
  return text
    .replace(DISCORD_TOKEN_RE, '[REDACTED_TOKEN]')
    .replace(BOT_AUTH_RE, 'Bot [REDACTED]')
    .replace(API_KEY_RE, '[REDACTED_KEY]');
}

export function redactObject(obj: unknown): unknown {
  if (typeof obj === 'string') return redactSecrets(obj);
  if (Array.isArray(obj)) return obj.map(redactObject);
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = redactObject(v);
    }
    return out;
  }
  return obj;
}

/** `REMINDER_LOG_FILE=off` disables the file log (tests set this). */
function logFile(): string | null {
  const configured = process.env.REMINDER_LOG_FILE?.trim();
  if (configured === 'off') return null;
  return configured || DEFAULT_LOG_FILE;
}

export function logLine(line: string): void {
  const file = logFile();
  if (!file) return;
  try {
    mkdirSync(dirname(file), { recursive: true });
    appendFileSync(file, redactSecrets(line) + '\n', 'utf-8');
  } catch (err) {
    console.error('[Log] Failed to append to log file:', err);
  }
}

export function logJson(obj: Record<string, unknown>): void {
  const ts = new Date().toISOString();
  try {
    logLine(`${ts} ${JSON.stringify(redactObject(obj))}`);
  } catch {
    logLine(`${ts} ${String(obj)}`);
  }
}
