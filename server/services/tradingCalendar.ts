/**
 * Trading Calendar: weekday-only approximation of the US equity calendar.
 *
 * Exchange holidays are not modelled: a holiday counts as a trading day and
 * simply yields no provider rows.
 */

import { MARKET_TIME_ZONE } from '../config.js';
import { addDaysToDateKey, dateKeyInTimeZone, weekdayOfDateKey } from '../lib/dateUtils.js';

// ---------------------------------------------------------------------------
// Weekday helpers
// ---------------------------------------------------------------------------

function isWeekday(dateKey: string): boolean {
  const dow = weekdayOfDateKey(dateKey);
  return dow >= 1 && dow <= 5;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * The most recent weekday on or before `now`, read in the market time zone.
 * Saturday maps to the Friday before (−1 day), Sunday to the Friday two days
 * earlier.
 */
function latestTradingDay(now: Date = new Date(), timeZone: string = MARKET_TIME_ZONE): string {
  const today = dateKeyInTimeZone(now, timeZone);
  const dow = weekdayOfDateKey(today);
  if (dow === 6) return addDaysToDateKey(today, -1);
  if (dow === 0) return addDaysToDateKey(today, -2);
  return today;
}

export { isWeekday, latestTradingDay };
