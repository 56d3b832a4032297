/**
 * Shared date utility functions used across backend modules.
 * Dates travel as YYYY-MM-DD keys; all functions are pure.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function dateKeyFromYmdParts(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const value = String(dateKey || '').trim();
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day, 0, 0, 0, 0);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return NaN;
  return ms;
}

function isDateKey(value: unknown): value is string {
  return typeof value === 'string' && Number.isFinite(parseDateKeyToUtcMs(value));
}

function dateKeyFromUtcMs(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

function addDaysToDateKey(dateKey: string, days: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) return '';
  return dateKeyFromUtcMs(baseMs + Math.trunc(days) * DAY_MS);
}

/** Calendar-year shift; Feb 29 lands on Feb 28 in non-leap years. */
function subtractYearsFromDateKey(dateKey: string, years: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) return '';
  const base = new Date(baseMs);
  const year = base.getUTCFullYear() - Math.trunc(years);
  const month = base.getUTCMonth();
  const lastDayOfMonth = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
  return dateKeyFromYmdParts(year, month + 1, Math.min(base.getUTCDate(), lastDayOfMonth));
}

/** 0 = Sunday … 6 = Saturday, or NaN for an invalid key. */
function weekdayOfDateKey(dateKey: string): number {
  const ms = parseDateKeyToUtcMs(dateKey);
  return Number.isFinite(ms) ? new Date(ms).getUTCDay() : NaN;
}

function dateKeyInTimeZone(instant: Date, timeZone: string): string {
  if (Number.isNaN(instant.getTime())) return '';
  return instant.toLocaleDateString('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
}

function maxDateKey(a: string, b: string): string {
  const aVal = String(a || '').trim();
  const bVal = String(b || '').trim();
  if (!aVal) return bVal || '';
  if (!bVal) return aVal;
  return aVal >= bVal ? aVal : bVal;
}

/**
 * Coerce a driver value into a date key. Strings may carry a time part
 * (`2024-01-05T00:00:00.000Z`, `2024-01-05 00:00:00`); Date objects are read
 * in local time, which is how node-postgres materializes DATE columns.
 */
function toDateKey(value: unknown): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return '';
    return dateKeyFromYmdParts(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }
  const head = String(value ?? '').trim().slice(0, 10);
  return isDateKey(head) ? head : '';
}

export {
  dateKeyFromYmdParts,
  parseDateKeyToUtcMs,
  isDateKey,
  dateKeyFromUtcMs,
  addDaysToDateKey,
  subtractYearsFromDateKey,
  weekdayOfDateKey,
  dateKeyInTimeZone,
  maxDateKey,
  toDateKey,
};
