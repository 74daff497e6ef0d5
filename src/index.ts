import { App } from '@slack/bolt';
import { AccessControl } from './access/accessControl';
import { FillerBot } from './bot/fillerBot';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { FillerDetector } from './detector/fillerDetector';
import { ConfigError } from './errors';
import { createLogger, LogLevel } from './logging/logger';
import { registerHandlers } from './slack/slackTransport';
import { ChatStateManager } from './state/chatState';
import { FillerEventStore } from './store/eventStore';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    const logger = createLogger('filler-bot', LogLevel.ERROR);
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error('Failed to load configuration:', error);
    }
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = createLogger('filler-bot', config.logLevel);

  if (config.fillerWords.length === 0) {
    logger.warn('No filler words configured! Set the FILLER_WORDS environment variable.');
  }

  const store = FillerEventStore.open(config.database.path, createLogger('sqlite', config.logLevel));
  const chatState = new ChatStateManager();
  const bot = new FillerBot({
    detector: new FillerDetector(config.fillerWords),
    store,
    chatState,
    access: new AccessControl(config.access.allowedHandles, config.access.adminHandles),
    logger,
    commandPrefix: config.slack.commandPrefix,
  });

  // Initialize Slack app with Socket Mode
  const app = new App({
    token: config.slack.botToken,
    appToken: config.slack.appToken,
    signingSecret: config.slack.signingSecret,
    socketMode: true,
    logger: createLogger('slack', config.logLevel),
  });

  registerHandlers(app, bot, { commandPrefix: config.slack.commandPrefix, logger });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down (active chats: ${chatState.activeChats().length})`);
    try {
      await app.stop();
    } catch (error) {
      logger.error('Error stopping Slack app:', error);
    }
    store.close();
    chatState.clear();
    process.exit(0);
  };
  process.on('SIGINT', signal => void shutdown(signal));
  process.on('SIGTERM', signal => void shutdown(signal));

  await app.start();
  logger.info('⚡️ Filler Words Bot is running!');
  logger.info(`👀 Tracking filler words: ${config.fillerWords.join(', ') || '(none)'}`);
}

main().catch(error => {
  createLogger('filler-bot', LogLevel.ERROR).error('Fatal error starting Filler Words Bot:', error);
  process.exit(1);
});
