import 'dotenv/config';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Repository root, whether running from sources or from dist/. */
const parentDir = path.resolve(__dirname, '..');
export const PROJECT_ROOT = path.basename(parentDir) === 'dist' ? path.dirname(parentDir) : parentDir;

function resolveFromRoot(value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(PROJECT_ROOT, value);
}

// --- Store ---
export const DATABASE_URL = String(process.env.DATABASE_URL || '').trim();
export const DB_SSL_REJECT_UNAUTHORIZED =
  String(process.env.DB_SSL_REJECT_UNAUTHORIZED || 'true').toLowerCase() !== 'false';
export const LOCAL_DB_PATH = resolveFromRoot(String(process.env.LOCAL_DB_PATH || 'data/market-pgdata'));
/** Refuse to fall back to the local store when the remote connection fails. */
export const STORE_STRICT = String(process.env.STORE_STRICT || 'false').toLowerCase() === 'true';
export const STORE_UPSERT_BATCH_SIZE = Math.max(50, Number(process.env.STORE_UPSERT_BATCH_SIZE) || 500);

// --- Sync ---
export const MARKET_TIME_ZONE = 'America/New_York';
export const SYNC_HISTORY_YEARS = Math.max(1, Math.floor(Number(process.env.SYNC_HISTORY_YEARS) || 5));
export const RETENTION_YEARS = Math.max(1, Math.floor(Number(process.env.RETENTION_YEARS) || 5));

// --- Provider ---
export type RetryStrategy = 'exponential' | 'fixed';
export const PROVIDER_MAX_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.PROVIDER_MAX_ATTEMPTS) || 3));
export const PROVIDER_RETRY_BASE_MS = Math.max(0, Number(process.env.PROVIDER_RETRY_BASE_MS) || 1_000);
export const PROVIDER_RETRY_STRATEGY: RetryStrategy =
  String(process.env.PROVIDER_RETRY_STRATEGY || 'exponential').toLowerCase() === 'fixed' ? 'fixed' : 'exponential';
export const PROVIDER_CIRCUIT_FAILURE_THRESHOLD = Math.max(
  1,
  Number(process.env.PROVIDER_CIRCUIT_FAILURE_THRESHOLD) || 5,
);
export const PROVIDER_CIRCUIT_COOLDOWN_MS = Math.max(
  1_000,
  Number(process.env.PROVIDER_CIRCUIT_COOLDOWN_MS) || 30_000,
);

// --- Fundamentals cache ---
export const FUNDAMENTALS_CACHE_PATH = resolveFromRoot(
  String(process.env.FUNDAMENTALS_CACHE_PATH || 'data/fundamentals_cache.json'),
);
export const FUNDAMENTALS_TTL_DAYS = Math.max(1, Number(process.env.FUNDAMENTALS_TTL_DAYS) || 7);
export const FUNDAMENTALS_REQUEST_DELAY_MS = Math.max(0, Number(process.env.FUNDAMENTALS_REQUEST_DELAY_MS) || 1_000);

// --- Watchlist / output ---
export const WATCHLIST_PATH = resolveFromRoot(String(process.env.WATCHLIST_PATH || 'watchlist.json'));
export const WATCHLIST_OVERRIDE = String(process.env.WATCHLIST || '').trim();
export const BRIEFING_OUTPUT_PATH = String(process.env.BRIEFING_OUTPUT_PATH || '').trim()
  ? resolveFromRoot(String(process.env.BRIEFING_OUTPUT_PATH).trim())
  : '';

// --- Startup validation ---
export function validateStartupEnvironment() {
  const errors: string[] = [];
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === null || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidNonNegativeNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === null || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < 0) {
      warnings.push(`${name} should be a non-negative number (received: ${String(raw)})`);
    }
  };

  if (!DATABASE_URL) {
    if (STORE_STRICT) {
      errors.push('STORE_STRICT is enabled but DATABASE_URL is not set');
    } else {
      warnings.push(`DATABASE_URL is not set; using local store at ${LOCAL_DB_PATH}`);
    }
  }
  const rawStrategy = String(process.env.PROVIDER_RETRY_STRATEGY || '').trim().toLowerCase();
  if (rawStrategy && rawStrategy !== 'fixed' && rawStrategy !== 'exponential') {
    warnings.push(`PROVIDER_RETRY_STRATEGY should be "fixed" or "exponential" (received: ${rawStrategy})`);
  }

  const positiveNumericEnvNames = [
    'STORE_UPSERT_BATCH_SIZE',
    'SYNC_HISTORY_YEARS',
    'RETENTION_YEARS',
    'PROVIDER_MAX_ATTEMPTS',
    'PROVIDER_CIRCUIT_FAILURE_THRESHOLD',
    'PROVIDER_CIRCUIT_COOLDOWN_MS',
    'FUNDAMENTALS_TTL_DAYS',
  ];
  positiveNumericEnvNames.forEach(warnIfInvalidPositiveNumber);
  const nonNegativeNumericEnvNames = ['PROVIDER_RETRY_BASE_MS', 'FUNDAMENTALS_REQUEST_DELAY_MS', 'SLOW_QUERY_THRESHOLD_MS'];
  nonNegativeNumericEnvNames.forEach(warnIfInvalidNonNegativeNumber);

  if (warnings.length > 0) {
    for (const warning of warnings) {
      console.warn(`[startup-env] ${warning}`);
    }
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
}
