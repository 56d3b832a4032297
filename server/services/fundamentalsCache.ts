/**
 * Fundamentals cache: per-ticker snapshots persisted to a JSON file and
 * reused until they are FUNDAMENTALS_TTL_DAYS old.
 *
 * Lifecycle: open() once, get() per ticker, flush() at the end of the run.
 * Refreshes are spaced by a fixed delay; a failed refresh yields the default
 * snapshot and keeps whatever entry was there before.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { FundamentalsSnapshot } from '../../shared/api-types.js';
import { FUNDAMENTALS_CACHE_PATH, FUNDAMENTALS_REQUEST_DELAY_MS, FUNDAMENTALS_TTL_DAYS } from '../config.js';
import { FundamentalsCacheFileSchema, validateApiResponse } from '../lib/apiSchemas.js';
import { delay } from '../lib/delay.js';
import { describeError } from '../lib/errors.js';
import type { MarketDataProvider } from './marketDataProvider.js';

const SECONDS_PER_DAY = 24 * 60 * 60;

export function defaultFundamentals(ticker: string): FundamentalsSnapshot {
  return {
    marketCap: null,
    trailingPE: null,
    forwardPE: null,
    dividendYield: null,
    profitMargins: null,
    revenueGrowth: null,
    shortName: ticker,
    sector: 'Unknown',
    industry: 'Unknown',
    last_fetched: null,
  };
}

export interface FundamentalsCacheOptions {
  provider: MarketDataProvider;
  path?: string;
  ttlDays?: number;
  requestDelayMs?: number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export class FundamentalsCache {
  private readonly provider: MarketDataProvider;
  private readonly filePath: string;
  private readonly ttlSeconds: number;
  private readonly requestDelayMs: number;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private entries = new Map<string, FundamentalsSnapshot>();
  private dirty = false;
  private providerCalls = 0;

  constructor(options: FundamentalsCacheOptions) {
    this.provider = options.provider;
    this.filePath = options.path ?? FUNDAMENTALS_CACHE_PATH;
    this.ttlSeconds = Math.max(0, options.ttlDays ?? FUNDAMENTALS_TTL_DAYS) * SECONDS_PER_DAY;
    this.requestDelayMs = Math.max(0, options.requestDelayMs ?? FUNDAMENTALS_REQUEST_DELAY_MS);
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep ?? delay;
  }

  get size(): number {
    return this.entries.size;
  }

  async open(): Promise<void> {
    this.entries = new Map();
    this.dirty = false;
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (err: unknown) {
      if (hasErrorCode(err, 'ENOENT')) {
        console.log(`[fundamentals] no cache file at ${this.filePath}, starting empty`);
      } else {
        console.error(`[fundamentals] cannot read ${this.filePath} (${describeError(err)}), starting empty`);
      }
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err: unknown) {
      console.error(`[fundamentals] cache file ${this.filePath} is not valid JSON (${describeError(err)}), starting empty`);
      return;
    }
    const parsed = validateApiResponse(FundamentalsCacheFileSchema, raw, 'fundamentals cache');
    if (!parsed) {
      console.error(`[fundamentals] cache file ${this.filePath} has an unexpected shape, starting empty`);
      return;
    }
    for (const [ticker, snapshot] of Object.entries(parsed)) {
      this.entries.set(ticker, snapshot);
    }
    console.log(`[fundamentals] loaded ${this.entries.size} cached snapshots`);
  }

  isFresh(snapshot: FundamentalsSnapshot): boolean {
    if (snapshot.last_fetched === null) return false;
    const nowSeconds = this.clock().getTime() / 1000;
    return nowSeconds - snapshot.last_fetched < this.ttlSeconds;
  }

  async get(ticker: string): Promise<FundamentalsSnapshot> {
    const cached = this.entries.get(ticker);
    if (cached && this.isFresh(cached)) return cached;

    if (this.providerCalls > 0 && this.requestDelayMs > 0) {
      await this.sleep(this.requestDelayMs);
    }
    this.providerCalls++;

    try {
      const fetched = await this.provider.fundamentals(ticker);
      const snapshot: FundamentalsSnapshot = {
        ...fetched,
        last_fetched: Math.floor(this.clock().getTime() / 1000),
      };
      this.entries.set(ticker, snapshot);
      this.dirty = true;
      return snapshot;
    } catch (err: unknown) {
      console.warn(`[fundamentals] ${ticker}: refresh failed (${describeError(err)}), using defaults`);
      return defaultFundamentals(ticker);
    }
  }

  /**
   * Writes the cache through a temp file and rename. Returns false when nothing
   * changed or the write failed; a failed write leaves the entries dirty.
   */
  async flush(): Promise<boolean> {
    if (!this.dirty) return false;
    const payload: Record<string, FundamentalsSnapshot> = {};
    for (const [ticker, snapshot] of this.entries) payload[ticker] = snapshot;

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (err: unknown) {
      console.error(`[fundamentals] failed to write ${this.filePath}: ${describeError(err)}`);
      await fs.rm(tempPath, { force: true }).catch((rmErr: unknown) => {
        console.warn(`[fundamentals] failed to remove ${tempPath}: ${describeError(rmErr)}`);
      });
      return false;
    }
    this.dirty = false;
    console.log(`[fundamentals] wrote ${this.entries.size} snapshots to ${this.filePath}`);
    return true;
  }
}
