import test from 'node:test';
import assert from 'node:assert/strict';

import { NewsStore } from '../server/data/newsStore.js';
import { openMemoryStore } from './helpers.js';

const NOW = new Date('2026-03-11T15:00:00Z');
const nowSeconds = Math.floor(NOW.getTime() / 1000);

test('insertNews ignores a headline already stored for the ticker', async () => {
  const store = await openMemoryStore();
  try {
    const news = new NewsStore(store.db);
    const item = { title: 'Acme beats estimates', publisher: 'Wire', link: 'https://example.com/a', providerPublishTime: nowSeconds - 60 };

    assert.equal(await news.insertNews('ACME', [item]), 1);
    assert.equal(await news.insertNews('ACME', [{ ...item, publisher: 'Other wire' }]), 0);
    // Same title under another ticker is a different row.
    assert.equal(await news.insertNews('BETA', [item]), 1);

    const stored = await news.recentNews('ACME', 24, NOW);
    assert.deepEqual(stored, [item]);
  } finally {
    await store.close();
  }
});

test('insertNews skips blank titles', async () => {
  const store = await openMemoryStore();
  try {
    const news = new NewsStore(store.db);
    assert.equal(
      await news.insertNews('ACME', [{ title: '   ', publisher: null, link: null, providerPublishTime: nowSeconds }]),
      0,
    );
  } finally {
    await store.close();
  }
});

test('recentNews returns headlines inside the window, newest first', async () => {
  const store = await openMemoryStore();
  try {
    const news = new NewsStore(store.db);
    await news.insertNews('ACME', [
      { title: 'Old', publisher: null, link: null, providerPublishTime: nowSeconds - 30 * 3600 },
      { title: 'Morning', publisher: null, link: null, providerPublishTime: nowSeconds - 3 * 3600 },
      { title: 'Latest', publisher: 'Wire', link: null, providerPublishTime: nowSeconds - 600 },
    ]);
    const titles = (await news.recentNews('ACME', 24, NOW)).map((item) => item.title);
    assert.deepEqual(titles, ['Latest', 'Morning']);
    assert.deepEqual(
      (await news.recentNews('ACME', 48, NOW)).map((item) => item.title),
      ['Latest', 'Morning', 'Old'],
    );
  } finally {
    await store.close();
  }
});
