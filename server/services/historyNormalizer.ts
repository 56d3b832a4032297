/**
 * Turns provider rows into store-ready bars.
 *
 * - adjusted close is dropped (only raw OHLCV is persisted)
 * - rows with a missing or non-finite OHLC value are dropped
 * - timestamps become market-time-zone date keys
 * - weekend rows and rows outside the requested range are dropped
 * - duplicate dates keep the last row the provider sent
 */

import type { DateRange, OhlcvBar } from '../../shared/api-types.js';
import { MARKET_TIME_ZONE } from '../config.js';
import { dateKeyInTimeZone, isDateKey } from '../lib/dateUtils.js';
import type { RawProviderRow } from './marketDataProvider.js';
import { isWeekday } from './tradingCalendar.js';

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/** Plain YYYY-MM-DD strings are taken as-is; anything else is an instant read in the market time zone. */
export function providerDateKey(value: RawProviderRow['date'], timeZone: string = MARKET_TIME_ZONE): string {
  if (typeof value === 'string' && isDateKey(value.trim())) return value.trim();
  const instant = value instanceof Date ? value : new Date(value);
  return dateKeyInTimeZone(instant, timeZone);
}

export function normalizeProviderRows(
  ticker: string,
  rows: readonly RawProviderRow[],
  range: DateRange | null = null,
  timeZone: string = MARKET_TIME_ZONE,
): OhlcvBar[] {
  const byDate = new Map<string, OhlcvBar>();
  for (const row of rows) {
    const open = finiteOrNull(row.open);
    const high = finiteOrNull(row.high);
    const low = finiteOrNull(row.low);
    const close = finiteOrNull(row.close);
    if (open === null || high === null || low === null || close === null) continue;

    const date = providerDateKey(row.date, timeZone);
    if (!date || !isWeekday(date)) continue;
    if (range && (date < range.start || date > range.end)) continue;

    byDate.set(date, {
      ticker,
      date,
      open,
      high,
      low,
      close,
      volume: Math.max(0, Math.round(finiteOrNull(row.volume) ?? 0)),
    });
  }
  return Array.from(byDate.values()).sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}
