import type { StatsSnapshot, WindowStats } from '../types';

const TOP_WORDS = 5;

export function commandList(prefix: string): string {
  return [
    `• /${prefix}start - Start tracking filler words`,
    `• /${prefix}stop - Stop tracking filler words`,
    `• /${prefix}stats - View your usage statistics`,
    `• /${prefix}reset - Reset your statistics in this channel`,
    `• /${prefix}group_reset - Reset statistics for everyone in this channel (admins)`,
  ].join('\n');
}

export function startMessage(prefix: string): string {
  return (
    "👋 Hello! I'm a Filler Words Detector Bot!\n\n" +
    'I track filler words in your messages and provide statistics.\n\n' +
    `*Commands:*\n${commandList(prefix)}\n\n` +
    '*How it works:*\n' +
    "I'll monitor all messages and notify you when filler words are detected. " +
    'You can view stats for today, the last 30 days, or all time!'
  );
}

export function stopMessage(prefix: string): string {
  return `🛑 Filler words tracking stopped. Use /${prefix}start to resume tracking.`;
}

export function notActiveMessage(prefix: string): string {
  return `Bot is not tracking in this channel. Use /${prefix}start to activate.`;
}

export const MESSAGES = {
  noStats: 'No filler words detected yet. Keep chatting!',
  unauthorizedUser: 'Sorry, you are not authorized to use this bot.',
  unauthorizedAdmin: 'Sorry, only administrators can manage this bot.',
  resetSuccess: '🧹 Your filler words statistics for this channel have been reset.',
  resetError: '⚠️ Could not reset your statistics. Please try again later.',
  groupResetSuccess: '🧹 Filler words statistics for everyone in this channel have been reset.',
  groupResetError: '⚠️ Could not reset the channel statistics. Please try again later.',
  statsError: '⚠️ Could not load statistics right now. Please try again later.',
} as const;

function formatWindow(title: string, stats: WindowStats): string {
  if (stats.total === 0) {
    return `${title}\n${MESSAGES.noStats}\n`;
  }
  const lines = stats.breakdown
    .slice(0, TOP_WORDS)
    .map(({ word, count }) => `  • ${word}: ${count}\n`)
    .join('');
  return `${title}\nTotal: *${stats.total}*\n${lines}`;
}

/**
 * Render the three stats windows as Slack mrkdwn
 */
export function formatStats(snapshot: StatsSnapshot): string {
  return [
    '📊 *Filler Words Statistics*\n',
    formatWindow("📅 *Today's Stats:*", snapshot.daily),
    formatWindow('📆 *Last 30 Days:*', snapshot.monthly),
    formatWindow('🕐 *All-Time Stats:*', snapshot.allTime),
  ].join('\n');
}

/**
 * Notification for one message; each distinct word once, in the order first seen
 */
export function formatDetection(words: string[]): string {
  const unique = Array.from(new Set(words));
  return `🔔 Filler word detected: ${unique.map(word => `*${word}*`).join(', ')}`;
}
