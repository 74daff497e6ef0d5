import type { StatsWindow } from '../types';

const MONTHLY_LOOKBACK_MS = 30 * 24 * 60 * 60 * 1000;

/**
 * Inclusive lower bound of a stats window, computed from the query time.
 * `daily` starts at local midnight; `monthly` is a rolling 30-day lookback.
 * Returns null for `allTime`.
 */
export function windowStart(window: StatsWindow, now: Date = new Date()): Date | null {
  switch (window) {
    case 'daily':
      return new Date(now.getFullYear(), now.getMonth(), now.getDate());
    case 'monthly':
      return new Date(now.getTime() - MONTHLY_LOOKBACK_MS);
    case 'allTime':
      return null;
  }
}
