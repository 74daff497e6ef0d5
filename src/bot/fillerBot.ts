import type { AccessControl } from '../access/accessControl';
import type { FillerDetector } from '../detector/fillerDetector';
import {
  formatDetection,
  formatStats,
  MESSAGES,
  notActiveMessage,
  startMessage,
  stopMessage,
} from '../delivery/messages';
import { deliver } from '../delivery/slackDelivery';
import type { Logger } from '../logging/logger';
import type { ChatStateManager } from '../state/chatState';
import type { FillerEventStore } from '../store/eventStore';
import type { CommandContext, IncomingMessage, SenderIdentity } from '../types';

export interface FillerBotDeps {
  detector: FillerDetector;
  store: FillerEventStore;
  chatState: ChatStateManager;
  access: AccessControl;
  logger: Logger;
  commandPrefix?: string;
}

function senderLabel(sender: SenderIdentity): string {
  return `${sender.handle || 'Unknown'} (ID: ${sender.userId})`;
}

/**
 * Command and message handlers, independent of the chat transport.
 */
export class FillerBot {
  private readonly detector: FillerDetector;
  private readonly store: FillerEventStore;
  private readonly chatState: ChatStateManager;
  private readonly access: AccessControl;
  private readonly logger: Logger;
  private readonly prefix: string;

  constructor(deps: FillerBotDeps) {
    this.detector = deps.detector;
    this.store = deps.store;
    this.chatState = deps.chatState;
    this.access = deps.access;
    this.logger = deps.logger;
    this.prefix = deps.commandPrefix ?? '';
  }

  async handleStart(ctx: CommandContext): Promise<void> {
    if (!(await this.requireAdmin(ctx, 'start'))) return;

    this.chatState.setActive(ctx.chatId, true);
    this.logger.info(`Bot activated in chat ${ctx.chatId}`);
    await this.send(ctx, startMessage(this.prefix), 'start');
  }

  async handleStop(ctx: CommandContext): Promise<void> {
    if (!(await this.requireAdmin(ctx, 'stop'))) return;

    this.chatState.setActive(ctx.chatId, false);
    this.logger.info(`Bot deactivated in chat ${ctx.chatId}`);
    await this.send(ctx, stopMessage(this.prefix), 'stop');
  }

  async handleStats(ctx: CommandContext): Promise<void> {
    if (!(await this.requireActive(ctx)) || !(await this.requireUser(ctx))) return;

    let text: string;
    try {
      text = formatStats(this.store.snapshot(ctx.userId, ctx.chatId));
    } catch (error) {
      this.logger.error(`Error loading stats for user ${ctx.userId} in chat ${ctx.chatId}:`, error);
      await this.send(ctx, MESSAGES.statsError, 'stats error');
      return;
    }

    if (await this.send(ctx, text, 'stats')) {
      this.logger.info(`Stats requested by user ${ctx.userId} in chat ${ctx.chatId}`);
    }
  }

  async handleReset(ctx: CommandContext): Promise<void> {
    if (!(await this.requireActive(ctx)) || !(await this.requireUser(ctx))) return;

    if (!this.store.resetUser(ctx.userId, ctx.chatId)) {
      await this.send(ctx, MESSAGES.resetError, 'reset error');
      return;
    }
    this.logger.info(`Stats reset by user ${senderLabel(ctx)} in chat ${ctx.chatId}`);
    await this.send(ctx, MESSAGES.resetSuccess, 'reset success');
  }

  async handleGroupReset(ctx: CommandContext): Promise<void> {
    if (!(await this.requireActive(ctx)) || !(await this.requireAdmin(ctx, 'group_reset'))) return;

    if (!this.store.resetChat(ctx.chatId)) {
      await this.send(ctx, MESSAGES.groupResetError, 'group reset error');
      return;
    }
    this.logger.info(`Group stats reset by admin ${senderLabel(ctx)} in chat ${ctx.chatId}`);
    await this.send(ctx, MESSAGES.groupResetSuccess, 'group reset success');
  }

  async handleMessage(message: IncomingMessage): Promise<void> {
    if (!this.chatState.isActive(message.chatId)) {
      this.logger.debug(`Bot is not active in chat ${message.chatId}, ignoring message`);
      return;
    }
    if (!this.access.canUse(message)) {
      this.logger.debug(`Message from unauthorized user ${senderLabel(message)} ignored`);
      return;
    }

    const detected = this.detector.detect(message.text);
    if (detected.length === 0) return;

    for (const word of detected) {
      this.store.record(message.userId, message.chatId, word, message.timestamp);
    }

    this.logger.info(
      `Filler words detected from user ${senderLabel(message)} in chat ${message.chatId}: ${detected.join(', ')}`
    );
    await this.send(message, formatDetection(detected), 'filler word notification');
  }

  private async requireAdmin(ctx: CommandContext, command: string): Promise<boolean> {
    if (this.access.canManage(ctx)) return true;

    this.logger.warn(`Unauthorized ${command} attempt by user ${senderLabel(ctx)} in chat ${ctx.chatId}`);
    await this.send(ctx, MESSAGES.unauthorizedAdmin, 'unauthorized admin');
    return false;
  }

  private async requireUser(ctx: CommandContext): Promise<boolean> {
    if (this.access.canUse(ctx)) return true;

    await this.send(ctx, MESSAGES.unauthorizedUser, 'unauthorized user');
    return false;
  }

  private async requireActive(ctx: CommandContext): Promise<boolean> {
    if (this.chatState.isActive(ctx.chatId)) return true;

    await this.send(ctx, notActiveMessage(this.prefix), 'bot not active');
    return false;
  }

  private send(ctx: CommandContext, text: string, label: string): Promise<boolean> {
    return deliver(ctx.reply, text, label, this.logger);
  }
}
