// Shared types: the contract between the sync engine and its downstream consumers
// (narrative generation, email rendering).

import type {
  MARKET_SNAPSHOT_SYMBOLS,
  MOMENTUM_LABELS,
  TREND_LABELS,
  VOLATILITY_LABELS,
} from './constants.js';

// --- Price series ---

/** One trading day for one ticker. `date` is a YYYY-MM-DD key in the market time zone. */
export interface OhlcvBar {
  ticker: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Bars for a single ticker, ascending by date. */
export type Series = readonly OhlcvBar[];

export interface DateRange {
  start: string;
  end: string;
}

// --- Indicators ---

/** `null` marks a value whose rolling window is not yet full. */
export interface IndicatorRow extends OhlcvBar {
  sma20: number | null;
  sma50: number | null;
  sma200: number | null;
  rsi: number | null;
  macd: number | null;
  macdSignal: number | null;
  macdHist: number | null;
  bbUpper: number | null;
  bbLower: number | null;
  bbBandwidth: number | null;
  atr: number | null;
}

export type IndicatorSeries = readonly IndicatorRow[];

// --- Signals ---

export type TrendLabel = (typeof TREND_LABELS)[number];
export type MomentumLabel = (typeof MOMENTUM_LABELS)[number];
export type VolatilityLabel = (typeof VOLATILITY_LABELS)[number];

export interface SignalLabels {
  trend: TrendLabel;
  momentum: MomentumLabel;
  volatility: VolatilityLabel;
}

// --- Fundamentals ---

export interface FundamentalsSnapshot {
  marketCap: number | null;
  trailingPE: number | null;
  forwardPE: number | null;
  dividendYield: number | null;
  profitMargins: number | null;
  revenueGrowth: number | null;
  shortName: string;
  sector: string;
  industry: string;
  /** Epoch seconds of the provider fetch; null for a default snapshot. */
  last_fetched: number | null;
}

// --- News ---

export interface NewsItem {
  title: string;
  publisher: string | null;
  link: string | null;
  /** Epoch seconds. */
  providerPublishTime: number;
}

// --- Market snapshot ---

export type MarketSnapshotSymbol = (typeof MARKET_SNAPSHOT_SYMBOLS)[number];

export interface MarketSnapshotEntry {
  symbol: MarketSnapshotSymbol;
  name: string;
  price: number;
  changePct: number;
  label: string;
}

// --- Run output ---

export interface TickerAnalysis {
  ticker: string;
  indicatorSeries: IndicatorSeries;
  signals: SignalLabels;
  fundamentals: FundamentalsSnapshot;
  latest: {
    date: string;
    close: number;
    changePct: number;
    rsi: number | null;
  };
}

export type SkipReason = 'provider-fetch-failed' | 'store-write-failed' | 'no-data' | 'unexpected-error';

export interface SkippedTicker {
  ticker: string;
  reason: SkipReason;
  message: string;
}

export type StoreBackend = 'remote' | 'local' | 'none';

export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  storeBackend: StoreBackend;
  targetDate: string;
  succeeded: string[];
  skipped: SkippedTicker[];
  removedTickers: string[];
  prunedRows: number;
}
