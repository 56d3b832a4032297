// Market snapshot: headline moves for the broad indexes at the top of the briefing.

import type { MarketSnapshotEntry, MarketSnapshotSymbol } from '../../shared/api-types.js';
import { MARKET_SNAPSHOT_SYMBOLS } from '../../shared/constants.js';
import { MARKET_TIME_ZONE } from '../config.js';
import { addDaysToDateKey } from '../lib/dateUtils.js';
import { describeError } from '../lib/errors.js';
import { normalizeProviderRows } from './historyNormalizer.js';
import type { MarketDataProvider } from './marketDataProvider.js';
import { latestTradingDay } from './tradingCalendar.js';

const SNAPSHOT_NAMES: Record<MarketSnapshotSymbol, string> = {
  SPY: 'S&P 500',
  QQQ: 'Nasdaq-100',
  '^VIX': 'VIX',
  '^IXIC': 'Nasdaq Composite',
};

/** Calendar days of history fetched to find the previous close. */
const LOOKBACK_DAYS = 7;

export function formatChangePct(changePct: number): string {
  return `${changePct >= 0 ? '+' : ''}${changePct.toFixed(1)}%`;
}

export function snapshotLabel(symbol: MarketSnapshotSymbol, price: number, changePct: number): string {
  return symbol === '^VIX' ? `${price.toFixed(2)} (${formatChangePct(changePct)})` : formatChangePct(changePct);
}

async function snapshotFor(
  provider: MarketDataProvider,
  symbol: MarketSnapshotSymbol,
  latest: string,
  timeZone: string,
): Promise<MarketSnapshotEntry> {
  const name = SNAPSHOT_NAMES[symbol];
  try {
    const start = addDaysToDateKey(latest, -LOOKBACK_DAYS);
    const rows = await provider.downloadHistory(symbol, start, addDaysToDateKey(latest, 1));
    const bars = normalizeProviderRows(symbol, rows, null, timeZone);
    if (bars.length === 0) {
      return { symbol, name, price: 0, changePct: 0, label: 'N/A' };
    }

    const lastClose = bars[bars.length - 1].close;
    const prevClose = bars.length > 1 ? bars[bars.length - 2].close : lastClose;
    const livePrice = await provider.lastPrice(symbol);
    const price = livePrice ? livePrice : lastClose;
    const changePct = prevClose !== 0 ? ((price - prevClose) / prevClose) * 100 : 0;
    return { symbol, name, price, changePct, label: snapshotLabel(symbol, price, changePct) };
  } catch (err: unknown) {
    console.error(`[market-snapshot] ${symbol}: ${describeError(err)}`);
    return { symbol, name, price: 0, changePct: 0, label: 'Error' };
  }
}

export async function getMarketSnapshot(
  provider: MarketDataProvider,
  clock: () => Date = () => new Date(),
  timeZone: string = MARKET_TIME_ZONE,
): Promise<MarketSnapshotEntry[]> {
  const latest = latestTradingDay(clock(), timeZone);
  const entries: MarketSnapshotEntry[] = [];
  for (const symbol of MARKET_SNAPSHOT_SYMBOLS) {
    entries.push(await snapshotFor(provider, symbol, latest, timeZone));
  }
  return entries;
}
