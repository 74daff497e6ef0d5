export type UserId = string;
export type ChatId = string;

export type StatsWindow = 'daily' | 'monthly' | 'allTime';

export interface WordCount {
  word: string;
  count: number;
}

export interface WindowStats {
  total: number;
  breakdown: WordCount[];
}

export interface StatsSnapshot {
  daily: WindowStats;
  monthly: WindowStats;
  allTime: WindowStats;
}

/**
 * Who sent a command or message. `handle` is the platform username when
 * it could be resolved.
 */
export interface SenderIdentity {
  userId: UserId;
  handle?: string;
}

export type Reply = (text: string) => Promise<unknown>;

export interface CommandContext extends SenderIdentity {
  chatId: ChatId;
  reply: Reply;
}

export interface IncomingMessage extends CommandContext {
  text: string;
  timestamp: Date;
}
