import type { App } from '@slack/bolt';
import type { FillerBot } from '../bot/fillerBot';
import type { Logger } from '../logging/logger';
import type { CommandContext } from '../types';

export type HandleLookup = (userId: string) => Promise<string | undefined>;

/**
 * The parts of a Bolt `App` the handlers are registered on.
 */
export interface SlackApp extends Pick<App, 'message' | 'command' | 'error'> {
  client: { users: Pick<App['client']['users'], 'info'> };
}

export type CommandName = 'start' | 'stop' | 'stats' | 'reset' | 'group_reset';

export interface TransportOptions {
  commandPrefix: string;
  logger: Logger;
}

/**
 * Cache user ID -> handle lookups for the process lifetime. A failed lookup
 * resolves to undefined and is retried on the next call.
 */
export function createHandleResolver(lookup: HandleLookup, logger: Logger): HandleLookup {
  const userCache: Map<string, string> = new Map();

  return async (userId: string) => {
    const cached = userCache.get(userId);
    if (cached !== undefined) {
      return cached;
    }

    try {
      const handle = await lookup(userId);
      if (handle) {
        userCache.set(userId, handle);
      }
      return handle;
    } catch (error) {
      logger.warn(`Error fetching user info for ${userId}:`, error);
      return undefined;
    }
  };
}

export function commandName(prefix: string, command: CommandName): string {
  return `/${prefix}${command}`;
}

/**
 * Wire channel messages and slash commands onto the bot.
 */
export function registerHandlers(app: SlackApp, bot: FillerBot, options: TransportOptions): void {
  const { commandPrefix, logger } = options;
  const resolveHandle = createHandleResolver(
    async userId => {
      const result = await app.client.users.info({ user: userId });
      return result.user?.name;
    },
    logger
  );

  app.message(async ({ message, say }) => {
    // Skip edits, joins, bot posts and file shares without text
    if (message.subtype !== undefined || message.bot_id || !message.text) {
      return;
    }

    const threadTs = message.thread_ts;
    await bot.handleMessage({
      userId: message.user,
      chatId: message.channel,
      handle: await resolveHandle(message.user),
      text: message.text,
      timestamp: new Date(parseFloat(message.ts) * 1000),
      reply: text => say(threadTs ? { text, thread_ts: threadTs } : { text }),
    });
  });

  const handlers: Array<[CommandName, (ctx: CommandContext) => Promise<void>]> = [
    ['start', ctx => bot.handleStart(ctx)],
    ['stop', ctx => bot.handleStop(ctx)],
    ['stats', ctx => bot.handleStats(ctx)],
    ['reset', ctx => bot.handleReset(ctx)],
    ['group_reset', ctx => bot.handleGroupReset(ctx)],
  ];

  for (const [command, handler] of handlers) {
    app.command(commandName(commandPrefix, command), async ({ command: slash, ack, respond }) => {
      await ack();
      await handler({
        userId: slash.user_id,
        chatId: slash.channel_id,
        handle: slash.user_name || (await resolveHandle(slash.user_id)),
        reply: text => respond({ response_type: 'in_channel', text }),
      });
    });
  }

  app.error(async error => {
    logger.error('Unhandled Slack app error:', error);
  });
}
