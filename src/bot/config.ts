import path from 'path';
import { DEFAULT_SHEET_TIMEOUT_MS } from '../api/sheet-client';
import { ConfigError } from '../core/errors';

export interface AppConfig {
  discordToken: string;
  sheetApiUrl: string;
  guildIds: string[];
  port: number;
  charterFile: string;
  notifyFile: string;
  sheetTimeoutMs: number;
}

export type Env = Readonly<Record<string, string | undefined>>;

const SNOWFLAKE = /^\d{1,20}$/;

export const parseGuildIds = (value?: string): string[] => {
  if (!value) return [];
  const ids = value
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  const invalid = ids.filter((id) => !SNOWFLAKE.test(id));
  if (invalid.length > 0) {
    throw new ConfigError(`GUILD_IDS contains invalid ids: ${invalid.join(', ')}`, 'CONFIG_INVALID', { invalid });
  }
  return [...new Set(ids)];
};

const parsePositiveInt = (name: string, value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`, 'CONFIG_INVALID', { name, value });
  }
  return n;
};

/**
 * Build the runtime configuration from environment variables. Throws a
 * ConfigError when the bot token or the sheet endpoint is missing.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const discordToken = env.DISCORD_TOKEN?.trim();
  const sheetApiUrl = env.SHEET_API_URL?.trim();
  const missing = [!discordToken && 'DISCORD_TOKEN', !sheetApiUrl && 'SHEET_API_URL'].filter(
    (name): name is string => typeof name === 'string'
  );
  if (!discordToken || !sheetApiUrl) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, 'CONFIG_MISSING', { missing });
  }
  try {
    new URL(sheetApiUrl);
  } catch {
    throw new ConfigError(`SHEET_API_URL is not a valid URL: ${sheetApiUrl}`, 'CONFIG_INVALID');
  }

  const dataDir = path.resolve(env.DATA_DIR || '.');

  return {
    discordToken,
    sheetApiUrl,
    guildIds: parseGuildIds(env.GUILD_IDS),
    port: parsePositiveInt('PORT', env.PORT, 8080),
    charterFile: path.join(dataDir, env.CHARTER_FILE || 'charter_users.json'),
    notifyFile: path.join(dataDir, env.NOTIFY_FILE || 'sent_notifications.json'),
    sheetTimeoutMs: parsePositiveInt('SHEET_TIMEOUT_MS', env.SHEET_TIMEOUT_MS, DEFAULT_SHEET_TIMEOUT_MS),
  };
}
