/**
 * Persistent store for daily bars.
 * Table: market_history (primary key ticker, date)
 *
 * One contract, two backends: a PostgreSQL server (remote) and an embedded
 * PGlite data directory (local). Both speak the PostgreSQL dialect and share
 * the Kysely query code below; they differ only in how the connection is made.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PGlite } from '@electric-sql/pglite';
import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool, types } from 'pg';
import type { OhlcvBar } from '../../shared/api-types.js';
import { PgliteDialect } from '../db/pgliteDialect.js';
import type { Database } from '../db/types.js';
import { STORE_UPSERT_BATCH_SIZE } from '../config.js';
import { instrumentPool } from '../lib/dbMonitor.js';
import { toDateKey } from '../lib/dateUtils.js';
import { StoreConnectError, StoreWriteError, describeError } from '../lib/errors.js';

export type MarketStoreBackend = 'remote' | 'local';

export interface MarketStore {
  readonly backend: MarketStoreBackend;
  /** Latest stored date for the ticker, or null when it has no rows. */
  maxDate(ticker: string): Promise<string | null>;
  /** Bars with `date >= startDate`, ascending. */
  historySince(ticker: string, startDate: string): Promise<OhlcvBar[]>;
  /** Insert-or-ignore; returns the number of rows actually inserted. */
  upsert(ticker: string, bars: readonly OhlcvBar[]): Promise<number>;
  /** Retention sweep across all tickers; returns rows removed. */
  deleteBefore(cutoffDate: string): Promise<number>;
  deleteTicker(ticker: string): Promise<number>;
  listTickers(): Promise<string[]>;
  close(): Promise<void>;
}

/** A store whose rows live in a SQL database reachable through Kysely. */
export interface SqlBackedMarketStore extends MarketStore {
  readonly db: Kysely<Database>;
}

export interface SqlMarketStoreOptions {
  batchSize?: number;
}

// ---------------------------------------------------------------------------
// Shared Kysely implementation
// ---------------------------------------------------------------------------

interface MarketHistoryRow {
  ticker: string;
  date: string | Date;
  open: number | string;
  high: number | string;
  low: number | string;
  close: number | string;
  volume: number | string | bigint;
}

function rowToBar(row: MarketHistoryRow): OhlcvBar {
  return {
    ticker: row.ticker,
    date: toDateKey(row.date),
    open: Number(row.open),
    high: Number(row.high),
    low: Number(row.low),
    close: Number(row.close),
    volume: Number(row.volume),
  };
}

abstract class SqlMarketStore implements SqlBackedMarketStore {
  abstract readonly backend: MarketStoreBackend;
  readonly db: Kysely<Database>;
  private readonly batchSize: number;

  protected constructor(db: Kysely<Database>, options: SqlMarketStoreOptions = {}) {
    this.db = db;
    this.batchSize = Math.max(1, Math.floor(options.batchSize ?? STORE_UPSERT_BATCH_SIZE));
  }

  async maxDate(ticker: string): Promise<string | null> {
    const row = await this.db
      .selectFrom('market_history')
      .select((eb) => eb.fn.max('date').as('max_date'))
      .where('ticker', '=', ticker)
      .executeTakeFirst();
    const key = toDateKey(row?.max_date);
    return key || null;
  }

  async historySince(ticker: string, startDate: string): Promise<OhlcvBar[]> {
    const rows = await this.db
      .selectFrom('market_history')
      .select(['ticker', 'date', 'open', 'high', 'low', 'close', 'volume'])
      .where('ticker', '=', ticker)
      .where('date', '>=', startDate)
      .orderBy('date', 'asc')
      .execute();
    return rows.map(rowToBar);
  }

  async upsert(ticker: string, bars: readonly OhlcvBar[]): Promise<number> {
    if (bars.length === 0) return 0;
    const values = bars.map((bar) => ({
      ticker,
      date: bar.date,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: Math.round(bar.volume),
    }));

    try {
      return await this.db.transaction().execute(async (trx) => {
        let inserted = 0;
        for (let i = 0; i < values.length; i += this.batchSize) {
          const chunk = values.slice(i, i + this.batchSize);
          const result = await trx
            .insertInto('market_history')
            .values(chunk)
            .onConflict((oc) => oc.columns(['ticker', 'date']).doNothing())
            .executeTakeFirst();
          inserted += Number(result.numInsertedOrUpdatedRows ?? 0n);
        }
        return inserted;
      });
    } catch (err: unknown) {
      throw new StoreWriteError(ticker, describeError(err), { cause: err });
    }
  }

  async deleteBefore(cutoffDate: string): Promise<number> {
    try {
      const result = await this.db.deleteFrom('market_history').where('date', '<', cutoffDate).executeTakeFirst();
      return Number(result.numDeletedRows);
    } catch (err: unknown) {
      throw new StoreWriteError(null, describeError(err), { cause: err });
    }
  }

  async deleteTicker(ticker: string): Promise<number> {
    try {
      return await this.db.transaction().execute(async (trx) => {
        await trx.deleteFrom('news_items').where('ticker', '=', ticker).execute();
        const result = await trx.deleteFrom('market_history').where('ticker', '=', ticker).executeTakeFirst();
        return Number(result.numDeletedRows);
      });
    } catch (err: unknown) {
      throw new StoreWriteError(ticker, describeError(err), { cause: err });
    }
  }

  async listTickers(): Promise<string[]> {
    const rows = await this.db
      .selectFrom('market_history')
      .select('ticker')
      .distinct()
      .orderBy('ticker', 'asc')
      .execute();
    return rows.map((row) => row.ticker);
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}

// ---------------------------------------------------------------------------
// Remote backend (PostgreSQL)
// ---------------------------------------------------------------------------

const PG_DATE_OID = 1082;

export interface PostgresMarketStoreOptions extends SqlMarketStoreOptions {
  sslRejectUnauthorized?: boolean;
}

export class PostgresMarketStore extends SqlMarketStore {
  readonly backend = 'remote' as const;

  private constructor(db: Kysely<Database>, options: SqlMarketStoreOptions) {
    super(db, options);
  }

  /** Opens a pool and probes it; throws StoreConnectError when the server is unreachable. */
  static async connect(connectionString: string, options: PostgresMarketStoreOptions = {}): Promise<PostgresMarketStore> {
    if (!connectionString) {
      throw new StoreConnectError('remote', 'no connection string configured');
    }
    // Keep DATE values as YYYY-MM-DD text instead of local-midnight Date objects.
    types.setTypeParser(PG_DATE_OID, (value: string) => value);

    const pool = new Pool({
      connectionString,
      ssl: { rejectUnauthorized: options.sslRejectUnauthorized ?? true },
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      statement_timeout: 60000,
    });
    pool.on('error', (err) => {
      console.error('[store] Unexpected idle pool client error:', err instanceof Error ? err.message : String(err));
    });
    instrumentPool(pool, { poolName: 'market' });

    const db = new Kysely<Database>({ dialect: new PostgresDialect({ pool }) });
    try {
      await sql`select 1`.execute(db);
    } catch (err: unknown) {
      await db.destroy().catch((destroyErr: unknown) => {
        console.warn(`[store] Failed to close remote pool after probe failure: ${describeError(destroyErr)}`);
      });
      throw new StoreConnectError('remote', describeError(err), { cause: err });
    }
    return new PostgresMarketStore(db, options);
  }
}

// ---------------------------------------------------------------------------
// Local backend (embedded PGlite)
// ---------------------------------------------------------------------------

/** PGlite data directory that lives only in memory. */
export const IN_MEMORY_DATABASE = 'memory://';

export class LocalMarketStore extends SqlMarketStore {
  readonly backend = 'local' as const;

  private constructor(db: Kysely<Database>, options: SqlMarketStoreOptions) {
    super(db, options);
  }

  static async open(dataDir: string, options: SqlMarketStoreOptions = {}): Promise<LocalMarketStore> {
    let pglite: PGlite;
    try {
      if (dataDir !== IN_MEMORY_DATABASE) {
        fs.mkdirSync(path.dirname(dataDir), { recursive: true });
      }
      pglite = new PGlite({ dataDir, parsers: { [PG_DATE_OID]: (value: string) => value } });
      await pglite.waitReady;
    } catch (err: unknown) {
      throw new StoreConnectError('local', describeError(err), { cause: err });
    }
    const db = new Kysely<Database>({ dialect: new PgliteDialect(pglite) });
    return new LocalMarketStore(db, options);
  }
}
