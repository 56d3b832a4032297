/**
 * One briefing run: store maintenance, market snapshot, then each ticker in
 * turn through sync → indicators → signals → fundamentals.
 *
 * A failing ticker is recorded in the run summary with a skip reason and the
 * run moves on; nothing a single ticker does can abort the batch.
 */

import type {
  FundamentalsSnapshot,
  MarketSnapshotEntry,
  RunSummary,
  SkipReason,
  SkippedTicker,
  TickerAnalysis,
} from '../../shared/api-types.js';
import { MARKET_TIME_ZONE, RETENTION_YEARS } from '../config.js';
import type { MarketStore } from '../data/marketStore.js';
import { subtractYearsFromDateKey } from '../lib/dateUtils.js';
import { NoDataError, ProviderFetchError, StoreWriteError, describeError } from '../lib/errors.js';
import { tickerRunsTotal } from '../metrics.js';
import { addIndicators } from '../services/indicators.js';
import type { MarketDataProvider } from '../services/marketDataProvider.js';
import { getMarketSnapshot } from '../services/marketSnapshot.js';
import type { MarketSynchronizer } from '../services/marketSync.js';
import { classifySignals } from '../services/signals.js';
import { latestTradingDay } from '../services/tradingCalendar.js';

export interface FundamentalsSource {
  get(ticker: string): Promise<FundamentalsSnapshot>;
}

export interface BriefingOptions {
  tickers: readonly string[];
  store: MarketStore | null;
  synchronizer: Pick<MarketSynchronizer, 'syncAndLoad'>;
  fundamentals: FundamentalsSource;
  provider: MarketDataProvider;
  clock?: () => Date;
  retentionYears?: number;
  timeZone?: string;
  /** Skip the index snapshot (tests that only care about tickers). */
  includeSnapshot?: boolean;
}

export interface BriefingResult {
  analyses: TickerAnalysis[];
  snapshot: MarketSnapshotEntry[];
  summary: RunSummary;
}

export function classifySkipReason(err: unknown): SkipReason {
  if (err instanceof ProviderFetchError) return 'provider-fetch-failed';
  if (err instanceof StoreWriteError) return 'store-write-failed';
  if (err instanceof NoDataError) return 'no-data';
  return 'unexpected-error';
}

async function runStoreMaintenance(
  store: MarketStore,
  tickers: readonly string[],
  retentionCutoff: string,
): Promise<{ removedTickers: string[]; prunedRows: number }> {
  const removedTickers: string[] = [];
  let prunedRows = 0;

  try {
    const tracked = new Set(tickers);
    for (const stored of await store.listTickers()) {
      if (tracked.has(stored)) continue;
      const removed = await store.deleteTicker(stored);
      removedTickers.push(stored);
      console.log(`[briefing] removed ${removed} rows for untracked ticker ${stored}`);
    }
  } catch (err: unknown) {
    console.error(`[briefing] ticker cleanup failed: ${describeError(err)}`);
  }

  try {
    prunedRows = await store.deleteBefore(retentionCutoff);
    if (prunedRows > 0) {
      console.log(`[briefing] retention sweep removed ${prunedRows} rows before ${retentionCutoff}`);
    }
  } catch (err: unknown) {
    console.error(`[briefing] retention sweep failed: ${describeError(err)}`);
  }

  return { removedTickers, prunedRows };
}

async function analyzeTicker(ticker: string, options: BriefingOptions): Promise<TickerAnalysis> {
  const { series } = await options.synchronizer.syncAndLoad(ticker);
  const indicatorSeries = addIndicators(series);
  const signals = classifySignals(indicatorSeries);
  const fundamentals = await options.fundamentals.get(ticker);

  const last = indicatorSeries[indicatorSeries.length - 1];
  const prev = indicatorSeries.length > 1 ? indicatorSeries[indicatorSeries.length - 2] : last;
  const changePct = prev.close !== 0 ? ((last.close - prev.close) / prev.close) * 100 : 0;

  return {
    ticker,
    indicatorSeries,
    signals,
    fundamentals,
    latest: { date: last.date, close: last.close, changePct, rsi: last.rsi },
  };
}

export async function runBriefing(options: BriefingOptions): Promise<BriefingResult> {
  const clock = options.clock ?? (() => new Date());
  const startedAt = clock().toISOString();
  const targetDate = latestTradingDay(clock(), options.timeZone ?? MARKET_TIME_ZONE);

  let removedTickers: string[] = [];
  let prunedRows = 0;
  if (options.store) {
    const cutoff = subtractYearsFromDateKey(targetDate, options.retentionYears ?? RETENTION_YEARS);
    ({ removedTickers, prunedRows } = await runStoreMaintenance(options.store, options.tickers, cutoff));
  }

  const snapshot =
    options.includeSnapshot === false ? [] : await getMarketSnapshot(options.provider, clock, options.timeZone);

  const analyses: TickerAnalysis[] = [];
  const succeeded: string[] = [];
  const skipped: SkippedTicker[] = [];

  for (const ticker of options.tickers) {
    try {
      console.log(`[briefing] analyzing ${ticker}`);
      const analysis = await analyzeTicker(ticker, options);
      analyses.push(analysis);
      succeeded.push(ticker);
      tickerRunsTotal.inc({ status: 'succeeded' });
    } catch (err: unknown) {
      const reason = classifySkipReason(err);
      const message = describeError(err);
      skipped.push({ ticker, reason, message });
      tickerRunsTotal.inc({ status: 'skipped' });
      if (reason === 'unexpected-error') {
        console.error(`[briefing] ${ticker} skipped (${reason}):`, err);
      } else {
        console.warn(`[briefing] ${ticker} skipped (${reason}): ${message}`);
      }
    }
  }

  const summary: RunSummary = {
    startedAt,
    finishedAt: clock().toISOString(),
    storeBackend: options.store ? options.store.backend : 'none',
    targetDate,
    succeeded,
    skipped,
    removedTickers,
    prunedRows,
  };
  console.log(
    `[briefing] run complete for ${targetDate}: ${succeeded.length} succeeded, ${skipped.length} skipped` +
      (skipped.length > 0 ? ` (${skipped.map((s) => `${s.ticker}: ${s.reason}`).join(', ')})` : ''),
  );
  return { analyses, snapshot, summary };
}
