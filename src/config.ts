import dotenv from 'dotenv';
import { ConfigError } from './errors';
import { LogLevel } from './logging/logger';
dotenv.config();

export interface AppConfig {
  slack: {
    botToken: string;
    appToken: string;
    signingSecret?: string;
    commandPrefix: string;
  };
  fillerWords: string[];
  access: {
    allowedHandles: string[];
    adminHandles: string[];
  };
  database: {
    path: string;
  };
  logLevel: LogLevel;
}

const LOG_LEVELS: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

function parseList(value: string | undefined): string[] {
  return (value || '').split(',').map(item => item.trim()).filter(Boolean);
}

/**
 * Build the bot configuration from environment variables.
 * Throws a ConfigError listing every missing or invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const problems: string[] = [];

  for (const key of ['SLACK_BOT_TOKEN', 'SLACK_APP_TOKEN']) {
    if (!env[key]) {
      problems.push(`Missing required environment variable: ${key}`);
    }
  }

  const rawLevel = (env.LOG_LEVEL || 'info').trim().toLowerCase();
  const logLevel = LOG_LEVELS[rawLevel];
  if (!logLevel) {
    problems.push(`LOG_LEVEL must be one of ${Object.keys(LOG_LEVELS).join(', ')} (got '${env.LOG_LEVEL}')`);
  }

  if (problems.length > 0 || !logLevel) {
    throw new ConfigError(problems);
  }

  return {
    slack: {
      botToken: env.SLACK_BOT_TOKEN || '',
      appToken: env.SLACK_APP_TOKEN || '',
      signingSecret: env.SLACK_SIGNING_SECRET || undefined,
      commandPrefix: env.COMMAND_PREFIX ?? 'filler_',
    },
    fillerWords: parseList(env.FILLER_WORDS),
    access: {
      allowedHandles: parseList(env.ALLOWED_HANDLES),
      adminHandles: parseList(env.ADMIN_HANDLES),
    },
    database: {
      path: env.DATABASE_PATH || './data/filler_words.db',
    },
    logLevel,
  };
}
