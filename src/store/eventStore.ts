import fs from 'fs';
import path from 'path';
import DatabaseConstructor from 'better-sqlite3';
import type { Logger } from '../logging/logger';
import type { ChatId, StatsSnapshot, StatsWindow, UserId, WindowStats, WordCount } from '../types';
import { windowStart } from './windows';

type Migration = {
  id: string;
  statements: string[];
};

// Timestamps are UTC ISO-8601 with milliseconds, the same shape as Date#toISOString,
// so they compare correctly as text.
const MIGRATIONS: Migration[] = [
  {
    id: '0001_filler_words_usage',
    statements: [
      `CREATE TABLE IF NOT EXISTS filler_words_usage (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id TEXT NOT NULL,
        chat_id TEXT NOT NULL,
        word TEXT NOT NULL,
        timestamp TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );`,
      'CREATE INDEX IF NOT EXISTS idx_user_chat ON filler_words_usage(user_id, chat_id);',
      'CREATE INDEX IF NOT EXISTS idx_timestamp ON filler_words_usage(timestamp);',
    ],
  },
];

function runMigrations(db: DatabaseConstructor.Database, logger: Logger): void {
  db.exec(`CREATE TABLE IF NOT EXISTS migrations (
    id TEXT PRIMARY KEY,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  );`);

  const applied = new Set(
    db.prepare('SELECT id FROM migrations').pluck().all().filter((id): id is string => typeof id === 'string')
  );
  const insertStmt = db.prepare('INSERT INTO migrations (id) VALUES (?)');

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.id)) continue;
    const applyMigration = db.transaction(() => {
      for (const statement of migration.statements) {
        db.exec(statement);
      }
      insertStmt.run(migration.id);
    });
    applyMigration();
    logger.info(`Applied sqlite migration ${migration.id}`);
  }
}

function isConstraintError(error: unknown): boolean {
  return error instanceof DatabaseConstructor.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT');
}

interface BreakdownRow {
  word: string;
  count: number;
}

function isBreakdownRow(row: unknown): row is BreakdownRow {
  if (typeof row !== 'object' || row === null) return false;
  return 'word' in row && typeof row.word === 'string' && 'count' in row && typeof row.count === 'number';
}

/**
 * Append-only log of filler word occurrences, one row per detected word.
 */
export class FillerEventStore {
  private readonly insertStmt: DatabaseConstructor.Statement;
  private readonly breakdownAllStmt: DatabaseConstructor.Statement;
  private readonly breakdownSinceStmt: DatabaseConstructor.Statement;
  private readonly deleteUserStmt: DatabaseConstructor.Statement;
  private readonly deleteChatStmt: DatabaseConstructor.Statement;

  constructor(
    private readonly db: DatabaseConstructor.Database,
    private readonly logger: Logger
  ) {
    runMigrations(db, logger);

    this.insertStmt = db.prepare(
      'INSERT INTO filler_words_usage (user_id, chat_id, word, timestamp) VALUES (?, ?, ?, ?)'
    );
    // MIN(id) keeps equal counts in first-recorded order.
    this.breakdownAllStmt = db.prepare(
      `SELECT word, COUNT(*) AS count FROM filler_words_usage
       WHERE user_id = ? AND chat_id = ?
       GROUP BY word
       ORDER BY count DESC, MIN(id) ASC`
    );
    this.breakdownSinceStmt = db.prepare(
      `SELECT word, COUNT(*) AS count FROM filler_words_usage
       WHERE user_id = ? AND chat_id = ? AND timestamp >= ?
       GROUP BY word
       ORDER BY count DESC, MIN(id) ASC`
    );
    this.deleteUserStmt = db.prepare('DELETE FROM filler_words_usage WHERE user_id = ? AND chat_id = ?');
    this.deleteChatStmt = db.prepare('DELETE FROM filler_words_usage WHERE chat_id = ?');
  }

  /**
   * Open (or create) the database file and bring its schema up to date.
   * Pass ':memory:' for a throwaway store.
   */
  static open(dbPath: string, logger: Logger): FillerEventStore {
    if (dbPath !== ':memory:') {
      const dir = path.dirname(path.resolve(dbPath));
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    const db = new DatabaseConstructor(dbPath);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');

    const store = new FillerEventStore(db, logger);
    logger.info(`Database initialized at ${dbPath}`);
    return store;
  }

  /**
   * Record one occurrence. Never throws: failures are logged and reported as false.
   */
  record(userId: UserId, chatId: ChatId, word: string, timestamp: Date = new Date()): boolean {
    try {
      this.insertStmt.run(userId, chatId, word.toLowerCase(), timestamp.toISOString());
      return true;
    } catch (error) {
      if (isConstraintError(error)) {
        this.logger.warn(`Database constraint error for user ${userId} in chat ${chatId}: ${word}`, error);
      } else {
        this.logger.error('Error recording filler word:', error);
      }
      return false;
    }
  }

  stats(userId: UserId, chatId: ChatId, window: StatsWindow, now: Date = new Date()): WindowStats {
    const since = windowStart(window, now);
    const rows = since
      ? this.breakdownSinceStmt.all(userId, chatId, since.toISOString())
      : this.breakdownAllStmt.all(userId, chatId);

    const breakdown: WordCount[] = rows.filter(isBreakdownRow).map(row => ({ word: row.word, count: row.count }));
    const total = breakdown.reduce((sum, entry) => sum + entry.count, 0);
    return { total, breakdown };
  }

  /**
   * Today, last 30 days and all-time stats, all measured from the same instant.
   */
  snapshot(userId: UserId, chatId: ChatId, now: Date = new Date()): StatsSnapshot {
    return {
      daily: this.stats(userId, chatId, 'daily', now),
      monthly: this.stats(userId, chatId, 'monthly', now),
      allTime: this.stats(userId, chatId, 'allTime', now),
    };
  }

  resetUser(userId: UserId, chatId: ChatId): boolean {
    try {
      const result = this.deleteUserStmt.run(userId, chatId);
      this.logger.info(`Deleted ${result.changes} events for user ${userId} in chat ${chatId}`);
      return true;
    } catch (error) {
      this.logger.error(`Error resetting stats for user ${userId} in chat ${chatId}:`, error);
      return false;
    }
  }

  resetChat(chatId: ChatId): boolean {
    try {
      const result = this.deleteChatStmt.run(chatId);
      this.logger.info(`Deleted ${result.changes} events in chat ${chatId}`);
      return true;
    } catch (error) {
      this.logger.error(`Error resetting stats for chat ${chatId}:`, error);
      return false;
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      this.logger.info('Closed sqlite connection');
    }
  }
}
