/**
 * Database operations for cached headlines.
 * Table: news_items (unique ticker, title)
 */

import type { Kysely } from 'kysely';
import type { NewsItem } from '../../shared/api-types.js';
import type { Database } from '../db/types.js';
import { StoreWriteError, describeError } from '../lib/errors.js';

export class NewsStore {
  constructor(private readonly db: Kysely<Database>) {}

  /** Inserts headlines, skipping any (ticker, title) pair already stored. */
  async insertNews(ticker: string, items: readonly NewsItem[]): Promise<number> {
    const values = items
      .filter((item) => String(item.title || '').trim())
      .map((item) => ({
        ticker,
        title: item.title.trim(),
        publisher: item.publisher,
        link: item.link,
        provider_publish_time: Math.floor(Number(item.providerPublishTime) || 0),
      }));
    if (values.length === 0) return 0;

    try {
      const result = await this.db
        .insertInto('news_items')
        .values(values)
        .onConflict((oc) => oc.columns(['ticker', 'title']).doNothing())
        .executeTakeFirst();
      return Number(result.numInsertedOrUpdatedRows ?? 0n);
    } catch (err: unknown) {
      throw new StoreWriteError(ticker, describeError(err), { cause: err });
    }
  }

  /** Headlines published within the last `hours`, newest first. */
  async recentNews(ticker: string, hours = 24, now: Date = new Date()): Promise<NewsItem[]> {
    const cutoff = Math.floor(now.getTime() / 1000) - Math.max(0, hours) * 3600;
    const rows = await this.db
      .selectFrom('news_items')
      .select(['title', 'publisher', 'link', 'provider_publish_time'])
      .where('ticker', '=', ticker)
      .where('provider_publish_time', '>', cutoff)
      .orderBy('provider_publish_time', 'desc')
      .execute();
    return rows.map((row) => ({
      title: row.title,
      publisher: row.publisher,
      link: row.link,
      providerPublishTime: Number(row.provider_publish_time),
    }));
  }
}
