import { ConsoleLogger, LogLevel } from '@slack/logger';
import type { Logger } from '@slack/logger';

export type { Logger };
export { LogLevel };

/**
 * Named console logger. The same type is handed to Bolt so the framework
 * and the bot write through one sink.
 */
export function createLogger(name: string, level: LogLevel = LogLevel.INFO): Logger {
  const logger = new ConsoleLogger();
  logger.setName(name);
  logger.setLevel(level);
  return logger;
}
