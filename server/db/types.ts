import type { ColumnType } from 'kysely';

export type Timestamp = ColumnType<Date | string, Date | string | undefined, never>;

/** DATE column: YYYY-MM-DD text once the driver's DATE parser is overridden. */
export type DateColumn = ColumnType<string | Date, string, never>;

/** BIGINT comes back as a string from node-postgres, a number or bigint from PGlite. */
export type BigIntColumn = ColumnType<number | string | bigint, number, never>;

export type NumericColumn = ColumnType<number | string, number, never>;

export interface MarketHistory {
  ticker: string;
  date: DateColumn;
  open: NumericColumn;
  high: NumericColumn;
  low: NumericColumn;
  close: NumericColumn;
  volume: BigIntColumn;
}

export interface NewsItems {
  ticker: string;
  title: string;
  publisher: string | null;
  link: string | null;
  provider_publish_time: BigIntColumn;
  created_at: Timestamp;
}

export interface Database {
  market_history: MarketHistory;
  news_items: NewsItems;
}
