import fs from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const SECRET_ENV_NAME = /(KEY|TOKEN|SECRET|PASSWORD|AUTH)/i;
const MIN_SECRET_LENGTH = 8;
const INLINE_SECRET =
  /\b(api[_-]?key|token|secret|password|authorization|auth_token)\b(\s*[:=]\s*)("?)([^\s"',;]+)\3/gi;

/**
 * Redact secret material before it reaches a log line: raw values of
 * secret-named environment variables, and `key=value` style credentials.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text;
  for (const [name, value] of Object.entries(process.env)) {
    if (!value || value.length < MIN_SECRET_LENGTH || !SECRET_ENV_NAME.test(name)) continue;
    scrubbed = scrubbed.split(value).join(REDACTED);
  }
  return scrubbed.replace(
    INLINE_SECRET,
    (_match, key: string, separator: string, quote: string) => `${key}${separator}${quote}${REDACTED}${quote}`,
  );
}

export function getLogDirectory(): string {
  return path.resolve(process.env.ASSISTANT_LOG_DIR ?? 'memory');
}

function dailyLogPath(now: Date): string {
  return path.join(getLogDirectory(), `${now.toISOString().slice(0, 10)}.md`);
}

/**
 * Append a line to today's markdown log (`<log dir>/YYYY-MM-DD.md`).
 * Write failures go to stderr; logging never throws into the caller.
 */
export async function logThought(message: string): Promise<void> {
  const now = new Date();
  const line = `- **${now.toISOString().slice(11, 19)}** ${scrubSensitiveText(message)}\n`;
  try {
    await fs.mkdir(getLogDirectory(), { recursive: true });
    await fs.appendFile(dailyLogPath(now), line, 'utf8');
  } catch (err) {
    console.error('[Logger] Failed to write daily log:', err instanceof Error ? err.message : String(err));
  }
}

/** Record a dropped or rejected inbound event with its reason. */
export async function logDrop(conversationId: string, reason: string): Promise<void> {
  await logThought(`[Drop] ${conversationId}: ${reason}`);
}
