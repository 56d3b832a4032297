// Watchlist loading: the ordered set of tickers processed by a run.

import * as fs from 'fs/promises';
import { WATCHLIST_OVERRIDE, WATCHLIST_PATH } from '../config.js';
import { WatchlistFileSchema, validateApiResponse } from '../lib/apiSchemas.js';
import { describeError } from '../lib/errors.js';

const TICKER_SYMBOL_RE = /^[A-Z0-9^][A-Z0-9.\-=^]{0,19}$/;

export function normalizeTickerSymbol(rawSymbol: unknown): string {
  return String(rawSymbol || '')
    .trim()
    .toUpperCase();
}

export function isValidTickerSymbol(symbol: string): boolean {
  return TICKER_SYMBOL_RE.test(symbol);
}

/** Normalizes, drops invalid symbols and dedupes, keeping first-seen order. */
export function normalizeWatchlist(rawSymbols: readonly unknown[]): string[] {
  const tickers: string[] = [];
  for (const raw of rawSymbols) {
    const symbol = normalizeTickerSymbol(raw);
    if (!symbol) continue;
    if (!isValidTickerSymbol(symbol)) {
      console.warn(`[watchlist] ignoring invalid symbol "${symbol}"`);
      continue;
    }
    if (!tickers.includes(symbol)) tickers.push(symbol);
  }
  return tickers;
}

/**
 * Comma-separated `override` (the WATCHLIST env var) wins over the file.
 * A missing or invalid file yields an empty list.
 */
export async function loadWatchlist(
  filePath: string = WATCHLIST_PATH,
  override: string = WATCHLIST_OVERRIDE,
): Promise<string[]> {
  if (override.trim()) {
    return normalizeWatchlist(override.split(','));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (err: unknown) {
    console.error(`[watchlist] failed to load ${filePath}: ${describeError(err)}`);
    return [];
  }
  const parsed = validateApiResponse(WatchlistFileSchema, raw, 'watchlist');
  if (!parsed) {
    console.error(`[watchlist] ${filePath} must contain {"watchlist": [...]}`);
    return [];
  }
  return normalizeWatchlist(parsed.watchlist);
}
