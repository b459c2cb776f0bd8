// MARK: - Configuration
// Environment-driven settings, validated once at startup

import { isValidCron } from 'cron-validator';
import { ConfigInvalidError } from './errors';
import { isValidTimezone, parseResetTime } from './services/journal/JournalCalendar';
import type { ResetTime } from './services/journal/JournalCalendar';

export interface BotConfig {
  discordToken: string;
  discordClientId: string;
  guildId: string;
  sharedChannelId: string;
  mongodbUri: string;
  dailyWordRequirement: number;
  timezone: string;
  resetTime: ResetTime;
  reconcileCron: string;
  accessRetry: {
    attempts: number;
    baseDelayMs: number;
    timeoutMs: number;
  };
  operatorChannelId: string | null;
  journalChannelPrefix: string;
  openai: {
    apiKey: string | null;
    model: string;
  };
  ownerIds: string[];
  port: number;
}

type Env = Record<string, string | undefined>;

const DEFAULTS = {
  dailyWordRequirement: 500,
  timezone: 'America/New_York',
  resetTime: '00:00',
  reconcileCron: '*/15 * * * *',
  accessRetryAttempts: 3,
  accessRetryDelayMs: 1000,
  accessTimeoutMs: 10_000,
  journalChannelPrefix: 'journal-',
  openaiModel: 'gpt-4o-mini',
  port: 3000,
} as const;

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readInteger(
  env: Env,
  key: string,
  fallback: number,
  problems: string[],
  range: { min: number; max?: number },
): number {
  const raw = readString(env, key);
  if (raw === null) {
    return fallback;
  }

  const value = Number(raw);
  const tooLarge = range.max !== undefined && value > range.max;
  if (!Number.isInteger(value) || value < range.min || tooLarge) {
    const bounds = range.max !== undefined ? `between ${range.min} and ${range.max}` : `>= ${range.min}`;
    problems.push(`${key} must be an integer ${bounds} (got "${raw}")`);
    return fallback;
  }

  return value;
}

/**
 * Builds the bot configuration, collecting every problem before failing
 */
export function loadConfig(env: Env = process.env): BotConfig {
  const problems: string[] = [];

  const required = (key: string): string => {
    const value = readString(env, key);
    if (value === null) {
      problems.push(`${key} is required`);
      return '';
    }
    return value;
  };

  const discordToken = required('DISCORD_TOKEN');
  const discordClientId = required('DISCORD_CLIENT_ID');
  const guildId = required('DISCORD_GUILD_ID');
  const sharedChannelId = required('SHARED_CHANNEL_ID');
  const mongodbUri = required('MONGODB_URI');

  const dailyWordRequirement = readInteger(env, 'DAILY_WORD_REQUIREMENT', DEFAULTS.dailyWordRequirement, problems, { min: 1 });

  const timezone = readString(env, 'TIMEZONE') ?? DEFAULTS.timezone;
  if (!isValidTimezone(timezone)) {
    problems.push(`TIMEZONE must be an IANA time zone (got "${timezone}")`);
  }

  const resetTimeRaw = readString(env, 'RESET_TIME') ?? DEFAULTS.resetTime;
  const resetTime = parseResetTime(resetTimeRaw);
  if (!resetTime) {
    problems.push(`RESET_TIME must be HH:MM (got "${resetTimeRaw}")`);
  }

  const reconcileCron = readString(env, 'RECONCILE_CRON') ?? DEFAULTS.reconcileCron;
  if (!isValidCron(reconcileCron)) {
    problems.push(`RECONCILE_CRON must be a valid cron expression (got "${reconcileCron}")`);
  }

  const accessRetry = {
    attempts: readInteger(env, 'ACCESS_RETRY_ATTEMPTS', DEFAULTS.accessRetryAttempts, problems, { min: 1, max: 10 }),
    baseDelayMs: readInteger(env, 'ACCESS_RETRY_DELAY_MS', DEFAULTS.accessRetryDelayMs, problems, { min: 0 }),
    timeoutMs: readInteger(env, 'ACCESS_TIMEOUT_MS', DEFAULTS.accessTimeoutMs, problems, { min: 1 }),
  };

  const port = readInteger(env, 'PORT', DEFAULTS.port, problems, { min: 0, max: 65535 });

  if (problems.length > 0 || !resetTime) {
    throw new ConfigInvalidError(problems);
  }

  return {
    discordToken,
    discordClientId,
    guildId,
    sharedChannelId,
    mongodbUri,
    dailyWordRequirement,
    timezone,
    resetTime,
    reconcileCron,
    accessRetry,
    operatorChannelId: readString(env, 'OPERATOR_CHANNEL_ID'),
    journalChannelPrefix: readString(env, 'JOURNAL_CHANNEL_PREFIX') ?? DEFAULTS.journalChannelPrefix,
    openai: {
      apiKey: readString(env, 'OPENAI_API_KEY'),
      model: readString(env, 'OPENAI_MODEL') ?? DEFAULTS.openaiModel,
    },
    ownerIds: (readString(env, 'DISCORD_OWNER_IDS') ?? '')
      .split(',')
      .map(id => id.trim())
      .filter(id => id.length > 0),
    port,
  };
}
