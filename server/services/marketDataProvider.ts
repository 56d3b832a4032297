/**
 * Upstream market-data provider: contract plus the Yahoo Finance adapter.
 *
 * Every outbound call goes through the same path: circuit breaker, retry
 * with configurable backoff, payload validation, and ProviderFetchError on
 * final failure.
 */

import yahooFinance from 'yahoo-finance2';
import type { FundamentalsSnapshot } from '../../shared/api-types.js';
import {
  PROVIDER_CIRCUIT_COOLDOWN_MS,
  PROVIDER_CIRCUIT_FAILURE_THRESHOLD,
  PROVIDER_MAX_ATTEMPTS,
  PROVIDER_RETRY_BASE_MS,
  PROVIDER_RETRY_STRATEGY,
  type RetryStrategy,
} from '../config.js';
import {
  ChartResponseSchema,
  QuoteResponseSchema,
  QuoteSummaryResponseSchema,
  validateApiResponse,
  type QuoteSummaryResponse,
} from '../lib/apiSchemas.js';
import { CircuitBreaker, CircuitOpenError } from '../lib/circuitBreaker.js';
import { delay } from '../lib/delay.js';
import { ProviderFetchError, describeError, isInfrastructureError } from '../lib/errors.js';
import { providerRequestsTotal } from '../metrics.js';

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

/** A row exactly as the provider returned it, before normalization. */
export interface RawProviderRow {
  date: Date | string | number;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
  adjclose?: number | null;
}

export type ProviderFundamentals = Omit<FundamentalsSnapshot, 'last_fetched'>;

export interface MarketDataProvider {
  /** Daily rows for `[start, endExclusive)`. */
  downloadHistory(ticker: string, start: string, endExclusive: string): Promise<RawProviderRow[]>;
  /** Near-real-time last traded price, or null when the provider has none. */
  lastPrice(ticker: string): Promise<number | null>;
  fundamentals(ticker: string): Promise<ProviderFundamentals>;
}

// ---------------------------------------------------------------------------
// Retry policy
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  strategy: RetryStrategy;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: PROVIDER_MAX_ATTEMPTS,
  baseDelayMs: PROVIDER_RETRY_BASE_MS,
  strategy: PROVIDER_RETRY_STRATEGY,
};

/** Delay before retry number `retryAttempt` (1-based), capped at one minute. */
export function getRetryBackoffMs(retryAttempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  const attempt = Math.max(1, Math.floor(Number(retryAttempt) || 1));
  const base = Math.max(0, policy.baseDelayMs);
  const ms = policy.strategy === 'fixed' ? base : base * 2 ** (attempt - 1);
  return Math.min(60_000, ms);
}

// ---------------------------------------------------------------------------
// Yahoo client seam
// ---------------------------------------------------------------------------

export type QuoteSummaryModule = 'price' | 'summaryDetail' | 'defaultKeyStatistics' | 'financialData' | 'assetProfile';

export interface ChartQuery {
  period1: string;
  period2: string;
  interval: '1d';
}

/** The subset of yahoo-finance2 the adapter uses; tests substitute their own. */
export interface YahooClient {
  chart(symbol: string, query: ChartQuery): Promise<unknown>;
  quote(symbol: string): Promise<unknown>;
  quoteSummary(symbol: string, modules: QuoteSummaryModule[]): Promise<unknown>;
}

export function createYahooClient(): YahooClient {
  yahooFinance.suppressNotices(['yahooSurvey']);
  return {
    chart: (symbol, query) => yahooFinance.chart(symbol, query),
    quote: (symbol) => yahooFinance.quote(symbol),
    quoteSummary: (symbol, modules) => yahooFinance.quoteSummary(symbol, { modules }),
  };
}

const FUNDAMENTALS_MODULES: QuoteSummaryModule[] = [
  'price',
  'summaryDetail',
  'defaultKeyStatistics',
  'financialData',
  'assetProfile',
];

function firstNumber(...values: Array<number | null | undefined>): number | null {
  for (const value of values) {
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return null;
}

function nonEmptyString(value: string | null | undefined, fallback: string): string {
  const trimmed = String(value ?? '').trim();
  return trimmed || fallback;
}

export function toProviderFundamentals(ticker: string, summary: QuoteSummaryResponse): ProviderFundamentals {
  return {
    marketCap: firstNumber(summary.price?.marketCap, summary.summaryDetail?.marketCap),
    trailingPE: firstNumber(summary.summaryDetail?.trailingPE),
    forwardPE: firstNumber(summary.summaryDetail?.forwardPE, summary.defaultKeyStatistics?.forwardPE),
    dividendYield: firstNumber(summary.summaryDetail?.dividendYield),
    profitMargins: firstNumber(summary.financialData?.profitMargins, summary.defaultKeyStatistics?.profitMargins),
    revenueGrowth: firstNumber(summary.financialData?.revenueGrowth),
    shortName: nonEmptyString(summary.price?.shortName, ticker),
    sector: nonEmptyString(summary.assetProfile?.sector, 'Unknown'),
    industry: nonEmptyString(summary.assetProfile?.industry, 'Unknown'),
  };
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export interface YahooMarketDataProviderOptions {
  client?: YahooClient;
  retry?: Partial<RetryPolicy>;
  breaker?: CircuitBreaker;
  sleep?: (ms: number) => Promise<void>;
}

/** Payload problems are not worth retrying. */
class InvalidPayloadError extends Error {
  constructor(label: string) {
    super(`${label}: unexpected payload shape`);
    this.name = 'InvalidPayloadError';
  }
}

export class YahooMarketDataProvider implements MarketDataProvider {
  private readonly client: YahooClient;
  private readonly retry: RetryPolicy;
  private readonly breaker: CircuitBreaker;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: YahooMarketDataProviderOptions = {}) {
    this.client = options.client ?? createYahooClient();
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? delay;
    this.breaker =
      options.breaker ??
      new CircuitBreaker({
        name: 'market-data',
        failureThreshold: PROVIDER_CIRCUIT_FAILURE_THRESHOLD,
        cooldownMs: PROVIDER_CIRCUIT_COOLDOWN_MS,
        isInfraError: isInfrastructureError,
        onStateChange: (from, to) => {
          if (to === 'OPEN') {
            console.error(`[circuit-breaker] market-data: ${from} → OPEN; provider calls blocked`);
          } else if (to === 'HALF_OPEN') {
            console.warn('[circuit-breaker] market-data: OPEN → HALF_OPEN; probing recovery');
          } else {
            console.log(`[circuit-breaker] market-data: ${from} → CLOSED; provider calls resumed`);
          }
        },
      });
  }

  async downloadHistory(ticker: string, start: string, endExclusive: string): Promise<RawProviderRow[]> {
    const payload = await this.request(ticker, 'history', async () => {
      const raw = await this.client.chart(ticker, { period1: start, period2: endExclusive, interval: '1d' });
      const parsed = validateApiResponse(ChartResponseSchema, raw, `chart ${ticker}`);
      if (!parsed) throw new InvalidPayloadError(`chart ${ticker}`);
      return parsed;
    });
    return payload.quotes.map((row) => ({
      date: row.date,
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume,
      adjclose: row.adjclose,
    }));
  }

  async lastPrice(ticker: string): Promise<number | null> {
    const quote = await this.request(ticker, 'quote', async () => {
      const raw = await this.client.quote(ticker);
      const parsed = validateApiResponse(QuoteResponseSchema, raw, `quote ${ticker}`);
      if (!parsed) throw new InvalidPayloadError(`quote ${ticker}`);
      return parsed;
    });
    return firstNumber(quote.regularMarketPrice);
  }

  async fundamentals(ticker: string): Promise<ProviderFundamentals> {
    const summary = await this.request(ticker, 'fundamentals', async () => {
      const raw = await this.client.quoteSummary(ticker, FUNDAMENTALS_MODULES);
      const parsed = validateApiResponse(QuoteSummaryResponseSchema, raw, `quoteSummary ${ticker}`);
      if (!parsed) throw new InvalidPayloadError(`quoteSummary ${ticker}`);
      return parsed;
    });
    return toProviderFundamentals(ticker, summary);
  }

  private async request<T>(ticker: string, operation: string, fn: () => Promise<T>): Promise<T> {
    const maxAttempts = Math.max(1, Math.floor(this.retry.maxAttempts));
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const result = await this.breaker.call(fn);
        providerRequestsTotal.inc({ operation, outcome: 'success' });
        return result;
      } catch (err: unknown) {
        lastError = err;
        const retryable =
          !(err instanceof CircuitOpenError) && !(err instanceof InvalidPayloadError) && isInfrastructureError(err);
        if (!retryable || attempt >= maxAttempts) break;
        const waitMs = getRetryBackoffMs(attempt, this.retry);
        console.warn(
          `[provider] ${operation} ${ticker} attempt ${attempt}/${maxAttempts} failed: ${describeError(err)}; retrying in ${waitMs}ms`,
        );
        await this.sleep(waitMs);
      }
    }
    providerRequestsTotal.inc({ operation, outcome: 'failure' });
    throw new ProviderFetchError(ticker, describeError(lastError), { cause: lastError });
  }
}
