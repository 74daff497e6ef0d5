import type { Logger } from '../logging/logger';
import type { Reply } from '../types';

/**
 * Send a reply and report whether it went out. Failures are logged and
 * never rethrown; nothing is retried.
 */
export async function deliver(reply: Reply, text: string, label: string, logger: Logger): Promise<boolean> {
  try {
    await reply(text);
    return true;
  } catch (error) {
    logger.error(`Error sending ${label} message:`, error);
    return false;
  }
}
