import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  // market_history
  await db.schema
    .createTable('market_history')
    .ifNotExists()
    .addColumn('ticker', 'varchar(20)', (col) => col.notNull())
    .addColumn('date', 'date', (col) => col.notNull())
    .addColumn('open', 'double precision', (col) => col.notNull())
    .addColumn('high', 'double precision', (col) => col.notNull())
    .addColumn('low', 'double precision', (col) => col.notNull())
    .addColumn('close', 'double precision', (col) => col.notNull())
    .addColumn('volume', 'bigint', (col) => col.notNull())
    .addPrimaryKeyConstraint('market_history_pkey', ['ticker', 'date'])
    .execute();

  await db.schema
    .createIndex('idx_market_history_date')
    .ifNotExists()
    .on('market_history')
    .column('date')
    .execute();

  // news_items
  await db.schema
    .createTable('news_items')
    .ifNotExists()
    .addColumn('ticker', 'varchar(20)', (col) => col.notNull())
    .addColumn('title', 'text', (col) => col.notNull())
    .addColumn('publisher', 'text')
    .addColumn('link', 'text')
    .addColumn('provider_publish_time', 'bigint', (col) => col.notNull().defaultTo(0))
    .addColumn('created_at', 'timestamp', (col) => col.notNull().defaultTo(sql`CURRENT_TIMESTAMP`))
    .addUniqueConstraint('news_items_ticker_title_key', ['ticker', 'title'])
    .execute();

  await db.schema
    .createIndex('idx_news_items_ticker_time')
    .ifNotExists()
    .on('news_items')
    .columns(['ticker', 'provider_publish_time'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('news_items').ifExists().execute();
  await db.schema.dropTable('market_history').ifExists().execute();
}
