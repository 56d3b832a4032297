// Shared fixtures: an in-memory store, a scripted provider and bar builders.

import type { IndicatorRow, OhlcvBar } from '../shared/api-types.js';
import { IN_MEMORY_DATABASE, LocalMarketStore } from '../server/data/marketStore.js';
import { runMigrations } from '../server/db/migrate.js';
import { addDaysToDateKey } from '../server/lib/dateUtils.js';
import { ProviderFetchError } from '../server/lib/errors.js';
import type { MarketDataProvider, ProviderFundamentals, RawProviderRow } from '../server/services/marketDataProvider.js';
import { isWeekday } from '../server/services/tradingCalendar.js';

/** Wednesday 2026-03-11, 11:00 in New York. */
export const WEDNESDAY = new Date('2026-03-11T15:00:00Z');

export async function openMemoryStore(batchSize?: number): Promise<LocalMarketStore> {
  const store = await LocalMarketStore.open(IN_MEMORY_DATABASE, { batchSize });
  await runMigrations(store.db);
  return store;
}

/** `count` weekday keys ending at (and including) `end`, ascending. */
export function weekdaysEndingAt(end: string, count: number): string[] {
  const keys: string[] = [];
  let cursor = end;
  while (keys.length < count) {
    if (isWeekday(cursor)) keys.unshift(cursor);
    cursor = addDaysToDateKey(cursor, -1);
  }
  return keys;
}

export function makeBar(ticker: string, date: string, close: number, volume = 1_000): OhlcvBar {
  return { ticker, date, open: close, high: close + 1, low: close - 1, close, volume };
}

export function makeBars(ticker: string, dates: readonly string[], closeAt: (i: number) => number): OhlcvBar[] {
  return dates.map((date, i) => makeBar(ticker, date, closeAt(i)));
}

export function makeIndicatorRow(overrides: Partial<IndicatorRow> = {}): IndicatorRow {
  return {
    ...makeBar('TEST', '2026-03-11', 100),
    sma20: null,
    sma50: null,
    sma200: null,
    rsi: null,
    macd: null,
    macdSignal: null,
    macdHist: null,
    bbUpper: null,
    bbLower: null,
    bbBandwidth: null,
    atr: null,
    ...overrides,
  };
}

export interface HistoryCall {
  ticker: string;
  start: string;
  endExclusive: string;
}

/** Serves canned bars; tickers listed in `failing` reject every call. */
export class FakeProvider implements MarketDataProvider {
  readonly historyCalls: HistoryCall[] = [];
  readonly fundamentalsCalls: string[] = [];
  readonly history = new Map<string, OhlcvBar[]>();
  readonly prices = new Map<string, number>();
  readonly fundamentalsByTicker = new Map<string, ProviderFundamentals>();
  readonly failing = new Set<string>();

  async downloadHistory(ticker: string, start: string, endExclusive: string): Promise<RawProviderRow[]> {
    this.historyCalls.push({ ticker, start, endExclusive });
    if (this.failing.has(ticker)) throw new ProviderFetchError(ticker, 'upstream unavailable');
    return (this.history.get(ticker) ?? [])
      .filter((bar) => bar.date >= start && bar.date < endExclusive)
      .map((bar) => ({
        date: bar.date,
        open: bar.open,
        high: bar.high,
        low: bar.low,
        close: bar.close,
        volume: bar.volume,
        adjclose: bar.close,
      }));
  }

  async lastPrice(ticker: string): Promise<number | null> {
    if (this.failing.has(ticker)) throw new ProviderFetchError(ticker, 'upstream unavailable');
    return this.prices.get(ticker) ?? null;
  }

  async fundamentals(ticker: string): Promise<ProviderFundamentals> {
    this.fundamentalsCalls.push(ticker);
    if (this.failing.has(ticker)) throw new ProviderFetchError(ticker, 'upstream unavailable');
    const known = this.fundamentalsByTicker.get(ticker);
    if (known) return known;
    return {
      marketCap: 1_000_000,
      trailingPE: 20,
      forwardPE: 18,
      dividendYield: null,
      profitMargins: 0.25,
      revenueGrowth: 0.1,
      shortName: `${ticker} Inc.`,
      sector: 'Technology',
      industry: 'Software',
    };
  }
}
