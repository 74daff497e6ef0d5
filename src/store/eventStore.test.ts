import fs from 'fs';
import os from 'os';
import path from 'path';
import DatabaseConstructor from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fakeLogger } from '../testing/fakeLogger';
import type { FakeLogger } from '../testing/fakeLogger';
import { FillerEventStore } from './eventStore';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('FillerEventStore', () => {
  let logger: FakeLogger;
  let store: FillerEventStore;

  beforeEach(() => {
    logger = fakeLogger();
    store = FillerEventStore.open(':memory:', logger);
  });

  afterEach(() => {
    store.close();
  });

  it('aggregates recorded words, most frequent first', () => {
    expect(store.record('U1', 'C100', 'like')).toBe(true);
    expect(store.record('U1', 'C100', 'um')).toBe(true);
    expect(store.record('U1', 'C100', 'like')).toBe(true);

    expect(store.stats('U1', 'C100', 'allTime')).toEqual({
      total: 3,
      breakdown: [
        { word: 'like', count: 2 },
        { word: 'um', count: 1 },
      ],
    });
  });

  it('stores words lowercase', () => {
    store.record('U1', 'C100', 'LIKE');
    store.record('U1', 'C100', 'Like');

    expect(store.stats('U1', 'C100', 'allTime').breakdown).toEqual([{ word: 'like', count: 2 }]);
  });

  it('breaks count ties by first recorded word', () => {
    store.record('U1', 'C100', 'um');
    store.record('U1', 'C100', 'like');
    store.record('U1', 'C100', 'basically');

    expect(store.stats('U1', 'C100', 'allTime').breakdown.map(entry => entry.word)).toEqual([
      'um',
      'like',
      'basically',
    ]);
  });

  it('keeps users and chats separate', () => {
    store.record('U1', 'C100', 'um');
    store.record('U2', 'C100', 'um');
    store.record('U1', 'C200', 'um');

    expect(store.stats('U1', 'C100', 'allTime').total).toBe(1);
    expect(store.stats('U2', 'C100', 'allTime').total).toBe(1);
    expect(store.stats('U3', 'C100', 'allTime')).toEqual({ total: 0, breakdown: [] });
  });

  it('counts only events since local midnight in the daily window', () => {
    const now = new Date(2026, 9, 18, 12, 0, 0);
    store.record('U1', 'C100', 'um', new Date(2026, 9, 17, 23, 59, 0));
    store.record('U1', 'C100', 'like', new Date(2026, 9, 18, 0, 0, 0));

    expect(store.stats('U1', 'C100', 'daily', now)).toEqual({
      total: 1,
      breakdown: [{ word: 'like', count: 1 }],
    });
    expect(store.stats('U1', 'C100', 'allTime', now).total).toBe(2);
  });

  it('returns an empty daily window when nothing was recorded today', () => {
    const now = new Date(2026, 9, 18, 12, 0, 0);
    store.record('U1', 'C100', 'um', new Date(2026, 9, 10, 9, 0, 0));

    expect(store.stats('U1', 'C100', 'daily', now)).toEqual({ total: 0, breakdown: [] });
    expect(store.stats('U1', 'C100', 'allTime', now).total).toBe(1);
  });

  it('includes the last 30 days in the monthly window, boundary inclusive', () => {
    const now = new Date(2026, 9, 18, 12, 0, 0);
    store.record('U1', 'C100', 'um', new Date(now.getTime() - 31 * DAY_MS));
    store.record('U1', 'C100', 'like', new Date(now.getTime() - 30 * DAY_MS));
    store.record('U1', 'C100', 'like', new Date(now.getTime() - DAY_MS));

    expect(store.stats('U1', 'C100', 'monthly', now)).toEqual({
      total: 2,
      breakdown: [{ word: 'like', count: 2 }],
    });
    expect(store.stats('U1', 'C100', 'allTime', now).total).toBe(3);
  });

  it('builds all three windows from one instant', () => {
    const now = new Date(2026, 9, 18, 12, 0, 0);
    store.record('U1', 'C100', 'um', new Date(now.getTime() - 40 * DAY_MS));
    store.record('U1', 'C100', 'um', new Date(now.getTime() - 10 * DAY_MS));
    store.record('U1', 'C100', 'like', new Date(now.getTime() - 60 * 1000));

    expect(store.snapshot('U1', 'C100', now)).toEqual({
      daily: { total: 1, breakdown: [{ word: 'like', count: 1 }] },
      monthly: {
        total: 2,
        breakdown: [
          { word: 'um', count: 1 },
          { word: 'like', count: 1 },
        ],
      },
      allTime: {
        total: 3,
        breakdown: [
          { word: 'um', count: 2 },
          { word: 'like', count: 1 },
        ],
      },
    });
  });

  it('timestamps events at insertion time by default', () => {
    store.record('U1', 'C100', 'um');
    expect(store.stats('U1', 'C100', 'daily').total).toBe(1);
  });

  it('resets one user in one chat', () => {
    store.record('U1', 'C100', 'basically');
    store.record('U1', 'C200', 'basically');
    store.record('U2', 'C100', 'basically');

    expect(store.resetUser('U1', 'C100')).toBe(true);
    expect(store.stats('U1', 'C100', 'allTime').total).toBe(0);
    expect(store.stats('U1', 'C200', 'allTime').total).toBe(1);
    expect(store.stats('U2', 'C100', 'allTime').total).toBe(1);
  });

  it('resets a whole chat and stays successful when repeated', () => {
    store.record('U1', 'C100', 'um');
    store.record('U2', 'C100', 'like');
    store.record('U1', 'C200', 'um');

    expect(store.resetChat('C100')).toBe(true);
    expect(store.resetChat('C100')).toBe(true);
    expect(store.stats('U1', 'C100', 'allTime').total).toBe(0);
    expect(store.stats('U2', 'C100', 'allTime').total).toBe(0);
    expect(store.stats('U1', 'C200', 'allTime').total).toBe(1);
  });

  it('reports write failures as false and lets read failures throw', () => {
    store.close();

    expect(store.record('U1', 'C100', 'um')).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(store.resetUser('U1', 'C100')).toBe(false);
    expect(store.resetChat('C100')).toBe(false);
    expect(() => store.stats('U1', 'C100', 'allTime')).toThrow();
  });
});

describe('FillerEventStore constraint failures', () => {
  it('logs a constraint violation as a warning and returns false', () => {
    const logger = fakeLogger();
    const db = new DatabaseConstructor(':memory:');
    const store = new FillerEventStore(db, logger);
    db.exec(`CREATE TRIGGER reject_usage BEFORE INSERT ON filler_words_usage
      BEGIN SELECT RAISE(ABORT, 'rejected'); END;`);

    expect(store.record('U1', 'C100', 'um')).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.error).not.toHaveBeenCalled();
    db.close();
  });

  it('applies each migration once', () => {
    const logger = fakeLogger();
    const db = new DatabaseConstructor(':memory:');
    const first = new FillerEventStore(db, logger);
    first.record('U1', 'C100', 'um');

    const second = new FillerEventStore(db, logger);
    expect(second.stats('U1', 'C100', 'allTime').total).toBe(1);
    expect(db.prepare('SELECT COUNT(*) FROM migrations').pluck().get()).toBe(1);
    db.close();
  });
});

describe('FillerEventStore on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'filler-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the parent directory and keeps events across reopen', () => {
    const dbPath = path.join(dir, 'nested', 'filler_words.db');
    const first = FillerEventStore.open(dbPath, fakeLogger());
    first.record('U1', 'C100', 'um');
    first.close();

    const second = FillerEventStore.open(dbPath, fakeLogger());
    expect(second.stats('U1', 'C100', 'allTime').total).toBe(1);
    second.close();
  });
});
