import test from 'node:test';
import assert from 'node:assert/strict';

import type { OhlcvBar } from '../shared/api-types.js';
import type { MarketStore } from '../server/data/marketStore.js';
import { NoDataError, ProviderFetchError, StoreWriteError } from '../server/lib/errors.js';
import { MarketSynchronizer, computeMissingRange, computeSyncWindow } from '../server/services/marketSync.js';
import { FakeProvider, WEDNESDAY, makeBars, openMemoryStore, weekdaysEndingAt } from './helpers.js';

test('computeSyncWindow targets the latest trading day and goes back N years', () => {
  assert.deepEqual(computeSyncWindow(WEDNESDAY, 5), { latest: '2026-03-11', windowStart: '2021-03-11' });
  assert.deepEqual(computeSyncWindow(new Date('2026-03-15T12:00:00Z'), 1), {
    latest: '2026-03-13',
    windowStart: '2025-03-13',
  });
});

test('computeMissingRange starts the day after the stored maximum', () => {
  const window = { latest: '2026-03-11', windowStart: '2021-03-11' };
  assert.deepEqual(computeMissingRange(null, window), { start: '2021-03-11', end: '2026-03-11' });
  assert.deepEqual(computeMissingRange('2026-03-04', window), { start: '2026-03-05', end: '2026-03-11' });
  assert.deepEqual(computeMissingRange('2019-01-02', window), { start: '2021-03-11', end: '2026-03-11' });
  assert.equal(computeMissingRange('2026-03-11', window), null);
  assert.equal(computeMissingRange('2026-03-12', window), null);
});

test('gap fill fetches only the missing (D, D+5] interval', async () => {
  const store = await openMemoryStore();
  try {
    const dates = weekdaysEndingAt('2026-03-11', 40);
    const bars = makeBars('ACME', dates, (i) => 100 + i);
    const provider = new FakeProvider();
    provider.history.set('ACME', bars);

    // Stored through Wednesday 2026-03-04; five weekdays missing.
    await store.upsert('ACME', bars.filter((bar) => bar.date <= '2026-03-04'));
    const sync = new MarketSynchronizer({ store, provider, clock: () => WEDNESDAY });
    const result = await sync.syncAndLoad('ACME');

    assert.deepEqual(provider.historyCalls, [{ ticker: 'ACME', start: '2026-03-05', endExclusive: '2026-03-12' }]);
    assert.deepEqual(result.fetchedRange, { start: '2026-03-05', end: '2026-03-11' });
    assert.equal(result.source, 'provider');
    assert.equal(result.insertedRows, 5);
    assert.equal(result.series.length, 40);
    assert.equal(result.series[39].date, '2026-03-11');
  } finally {
    await store.close();
  }
});

test('a current store is returned without a network call', async () => {
  const store = await openMemoryStore();
  try {
    const bars = makeBars('ACME', weekdaysEndingAt('2026-03-13', 10), (i) => 50 + i);
    await store.upsert('ACME', bars);
    const provider = new FakeProvider();
    // Sunday: the target is Friday 2026-03-13, already stored.
    const sync = new MarketSynchronizer({ store, provider, clock: () => new Date('2026-03-15T12:00:00Z') });
    const result = await sync.syncAndLoad('ACME');

    assert.equal(provider.historyCalls.length, 0);
    assert.equal(result.source, 'store');
    assert.equal(result.fetchedRange, null);
    assert.deepEqual(result.series, bars);
  } finally {
    await store.close();
  }
});

test('syncing twice on the same day inserts nothing the second time', async () => {
  const store = await openMemoryStore();
  try {
    const provider = new FakeProvider();
    provider.history.set('ACME', makeBars('ACME', weekdaysEndingAt('2026-03-11', 30), (i) => 20 + i));
    const sync = new MarketSynchronizer({ store, provider, clock: () => WEDNESDAY });

    const first = await sync.syncAndLoad('ACME');
    const second = await sync.syncAndLoad('ACME');

    assert.equal(first.insertedRows, 30);
    assert.equal(second.insertedRows, 0);
    assert.equal(second.source, 'store');
    assert.equal(provider.historyCalls.length, 1);
    assert.deepEqual(second.series, first.series);
  } finally {
    await store.close();
  }
});

test('an empty store fetches the whole window once', async () => {
  const store = await openMemoryStore();
  try {
    const provider = new FakeProvider();
    provider.history.set('ACME', makeBars('ACME', weekdaysEndingAt('2026-03-11', 5), () => 10));
    const sync = new MarketSynchronizer({ store, provider, clock: () => WEDNESDAY, historyYears: 2 });
    const result = await sync.syncAndLoad('ACME');
    assert.deepEqual(provider.historyCalls, [{ ticker: 'ACME', start: '2024-03-11', endExclusive: '2026-03-12' }]);
    assert.equal(result.series.length, 5);
  } finally {
    await store.close();
  }
});

test('without a store the full window is fetched directly and nothing persists', async () => {
  const provider = new FakeProvider();
  provider.history.set('ACME', makeBars('ACME', weekdaysEndingAt('2026-03-11', 12), (i) => 30 + i));
  const sync = new MarketSynchronizer({ store: null, provider, clock: () => WEDNESDAY });
  const result = await sync.syncAndLoad('ACME');

  assert.equal(result.source, 'direct');
  assert.equal(result.insertedRows, 0);
  assert.deepEqual(provider.historyCalls, [{ ticker: 'ACME', start: '2021-03-11', endExclusive: '2026-03-12' }]);
  assert.equal(result.series.length, 12);
});

test('provider failures propagate as ProviderFetchError', async () => {
  const store = await openMemoryStore();
  try {
    const provider = new FakeProvider();
    provider.failing.add('DOWN');
    const sync = new MarketSynchronizer({ store, provider, clock: () => WEDNESDAY });
    await assert.rejects(sync.syncAndLoad('DOWN'), ProviderFetchError);
  } finally {
    await store.close();
  }
});

test('no rows anywhere raises NoDataError', async () => {
  const store = await openMemoryStore();
  try {
    const sync = new MarketSynchronizer({ store, provider: new FakeProvider(), clock: () => WEDNESDAY });
    await assert.rejects(sync.syncAndLoad('EMPTY'), NoDataError);
  } finally {
    await store.close();
  }
});

test('a stale store is returned when the provider has nothing new', async () => {
  const store = await openMemoryStore();
  try {
    const bars = makeBars('HOLD', weekdaysEndingAt('2026-03-09', 3), () => 7);
    await store.upsert('HOLD', bars);
    const provider = new FakeProvider();
    provider.history.set('HOLD', bars);
    const sync = new MarketSynchronizer({ store, provider, clock: () => WEDNESDAY });
    const result = await sync.syncAndLoad('HOLD');
    assert.equal(result.source, 'store');
    assert.deepEqual(result.fetchedRange, { start: '2026-03-10', end: '2026-03-11' });
    assert.deepEqual(result.series, bars);
  } finally {
    await store.close();
  }
});

/** A store whose reads or writes can be made to fail. */
class FlakyStore implements MarketStore {
  readonly backend = 'local' as const;
  failReads = false;
  failWrites = false;
  rows: OhlcvBar[] = [];

  async maxDate(): Promise<string | null> {
    if (this.failReads) throw new Error('database is locked');
    return this.rows.length ? this.rows[this.rows.length - 1].date : null;
  }
  async historySince(_ticker: string, startDate: string): Promise<OhlcvBar[]> {
    if (this.failReads) throw new Error('database is locked');
    return this.rows.filter((bar) => bar.date >= startDate);
  }
  async upsert(ticker: string): Promise<number> {
    if (this.failWrites) throw new StoreWriteError(ticker, 'disk full');
    return 0;
  }
  async deleteBefore(): Promise<number> {
    return 0;
  }
  async deleteTicker(): Promise<number> {
    return 0;
  }
  async listTickers(): Promise<string[]> {
    return [];
  }
  async close(): Promise<void> {}
}

test('store write failures propagate as StoreWriteError', async () => {
  const store = new FlakyStore();
  store.failWrites = true;
  const provider = new FakeProvider();
  provider.history.set('ACME', makeBars('ACME', weekdaysEndingAt('2026-03-11', 3), () => 1));
  const sync = new MarketSynchronizer({ store, provider, clock: () => WEDNESDAY });
  await assert.rejects(sync.syncAndLoad('ACME'), StoreWriteError);
});

test('store read failures fall back to a direct fetch', async () => {
  const store = new FlakyStore();
  store.failReads = true;
  const provider = new FakeProvider();
  provider.history.set('ACME', makeBars('ACME', weekdaysEndingAt('2026-03-11', 3), () => 1));
  const sync = new MarketSynchronizer({ store, provider, clock: () => WEDNESDAY });
  const result = await sync.syncAndLoad('ACME');
  assert.equal(result.source, 'direct');
  assert.equal(result.series.length, 3);
});
