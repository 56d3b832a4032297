/**
 * Market synchronizer: brings one ticker's stored history up to the latest
 * trading day, fetching only the dates the store is missing.
 *
 *   store current      → no network call, stored series returned
 *   store behind       → fetch (max_date, latest], upsert, re-read
 *   no store / reads failing → one direct fetch of the whole window, nothing persisted
 */

import type { DateRange, Series } from '../../shared/api-types.js';
import { MARKET_TIME_ZONE, SYNC_HISTORY_YEARS } from '../config.js';
import type { MarketStore } from '../data/marketStore.js';
import { addDaysToDateKey, maxDateKey, subtractYearsFromDateKey } from '../lib/dateUtils.js';
import { NoDataError, describeError } from '../lib/errors.js';
import { barsInsertedTotal, syncDurationSeconds } from '../metrics.js';
import { normalizeProviderRows } from './historyNormalizer.js';
import type { MarketDataProvider } from './marketDataProvider.js';
import { latestTradingDay } from './tradingCalendar.js';

export type SyncSource = 'store' | 'provider' | 'direct';

export interface SyncResult {
  ticker: string;
  series: Series;
  source: SyncSource;
  /** Inclusive range requested from the provider, or null when nothing was fetched. */
  fetchedRange: DateRange | null;
  insertedRows: number;
}

export interface SyncWindow {
  latest: string;
  windowStart: string;
}

export interface MarketSynchronizerOptions {
  store: MarketStore | null;
  provider: MarketDataProvider;
  historyYears?: number;
  clock?: () => Date;
  timeZone?: string;
}

export function computeSyncWindow(now: Date, historyYears: number, timeZone: string = MARKET_TIME_ZONE): SyncWindow {
  const latest = latestTradingDay(now, timeZone);
  return { latest, windowStart: subtractYearsFromDateKey(latest, historyYears) };
}

/**
 * Dates the store is missing, inclusive on both ends, or null when it is
 * already current. History older than the window is never requested.
 */
export function computeMissingRange(maxDate: string | null, window: SyncWindow): DateRange | null {
  if (maxDate && maxDate >= window.latest) return null;
  const start = maxDate ? maxDateKey(addDaysToDateKey(maxDate, 1), window.windowStart) : window.windowStart;
  if (start > window.latest) return null;
  return { start, end: window.latest };
}

function withinWindow(series: Series, window: SyncWindow): Series {
  return series.filter((bar) => bar.date >= window.windowStart && bar.date <= window.latest);
}

export class MarketSynchronizer {
  private readonly store: MarketStore | null;
  private readonly provider: MarketDataProvider;
  private readonly historyYears: number;
  private readonly clock: () => Date;
  private readonly timeZone: string;

  constructor(options: MarketSynchronizerOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.historyYears = Math.max(1, Math.floor(options.historyYears ?? SYNC_HISTORY_YEARS));
    this.clock = options.clock ?? (() => new Date());
    this.timeZone = options.timeZone ?? MARKET_TIME_ZONE;
  }

  currentWindow(): SyncWindow {
    return computeSyncWindow(this.clock(), this.historyYears, this.timeZone);
  }

  async syncAndLoad(ticker: string): Promise<SyncResult> {
    const window = this.currentWindow();
    const endTimer = syncDurationSeconds.startTimer();
    let result: SyncResult;
    if (this.store) {
      result = await this.syncWithStore(this.store, ticker, window);
    } else {
      result = await this.fetchDirect(ticker, window);
    }
    endTimer({ source: result.source });

    if (result.series.length === 0) {
      throw new NoDataError(ticker);
    }
    return result;
  }

  private async syncWithStore(store: MarketStore, ticker: string, window: SyncWindow): Promise<SyncResult> {
    let stored: Series;
    let maxDate: string | null;
    try {
      stored = await store.historySince(ticker, window.windowStart);
      maxDate = await store.maxDate(ticker);
    } catch (err: unknown) {
      console.error(`[market-sync] ${ticker}: store read failed (${describeError(err)}); fetching directly`);
      return this.fetchDirect(ticker, window);
    }

    const range = computeMissingRange(maxDate, window);
    if (!range) {
      console.log(`[market-sync] ${ticker}: up to date (latest ${window.latest}), skipping download`);
      return { ticker, series: withinWindow(stored, window), source: 'store', fetchedRange: null, insertedRows: 0 };
    }

    console.log(
      `[market-sync] ${ticker}: ${maxDate ? `stored through ${maxDate}` : 'no stored rows'}; fetching ${range.start} → ${range.end}`,
    );
    // Provider end bound is exclusive.
    const rows = await this.provider.downloadHistory(ticker, range.start, addDaysToDateKey(range.end, 1));
    const bars = normalizeProviderRows(ticker, rows, range, this.timeZone);
    if (bars.length === 0) {
      console.warn(`[market-sync] ${ticker}: provider returned no rows for ${range.start} → ${range.end}`);
      return { ticker, series: withinWindow(stored, window), source: 'store', fetchedRange: range, insertedRows: 0 };
    }

    const insertedRows = await store.upsert(ticker, bars);
    barsInsertedTotal.inc(insertedRows);
    const series = await store.historySince(ticker, window.windowStart);
    console.log(`[market-sync] ${ticker}: inserted ${insertedRows} of ${bars.length} rows, ${series.length} in window`);
    return { ticker, series: withinWindow(series, window), source: 'provider', fetchedRange: range, insertedRows };
  }

  private async fetchDirect(ticker: string, window: SyncWindow): Promise<SyncResult> {
    const range: DateRange = { start: window.windowStart, end: window.latest };
    const rows = await this.provider.downloadHistory(ticker, range.start, addDaysToDateKey(range.end, 1));
    const series = normalizeProviderRows(ticker, rows, range, this.timeZone);
    return { ticker, series, source: 'direct', fetchedRange: range, insertedRows: 0 };
  }
}
