import test from 'node:test';
import assert from 'node:assert/strict';

import { formatChangePct, getMarketSnapshot, snapshotLabel } from '../server/services/marketSnapshot.js';
import { FakeProvider, WEDNESDAY, makeBar } from './helpers.js';

test('snapshot labels show the change, and the level for VIX', () => {
  assert.equal(formatChangePct(1.234), '+1.2%');
  assert.equal(formatChangePct(-2.46), '-2.5%');
  assert.equal(formatChangePct(0), '+0.0%');
  assert.equal(snapshotLabel('SPY', 512.3, 0.44), '+0.4%');
  assert.equal(snapshotLabel('^VIX', 18.456, -3.21), '18.46 (-3.2%)');
});

test('getMarketSnapshot prices each index against the previous close', async () => {
  const provider = new FakeProvider();
  provider.history.set('SPY', [makeBar('SPY', '2026-03-10', 500), makeBar('SPY', '2026-03-11', 505)]);
  provider.prices.set('SPY', 510);
  provider.history.set('QQQ', [makeBar('QQQ', '2026-03-10', 410), makeBar('QQQ', '2026-03-11', 400)]);
  provider.history.set('^VIX', [makeBar('^VIX', '2026-03-11', 20)]);
  provider.prices.set('^VIX', 22);
  provider.failing.add('^IXIC');

  const snapshot = await getMarketSnapshot(provider, () => WEDNESDAY);

  assert.deepEqual(
    snapshot.map((entry) => [entry.symbol, entry.name, entry.label]),
    [
      ['SPY', 'S&P 500', '+2.0%'],
      ['QQQ', 'Nasdaq-100', '-2.4%'],
      ['^VIX', 'VIX', '22.00 (+10.0%)'],
      ['^IXIC', 'Nasdaq Composite', 'Error'],
    ],
  );
  assert.equal(snapshot[0].price, 510);
  assert.equal(snapshot[1].price, 400);
  assert.equal(snapshot[3].price, 0);
  assert.equal(snapshot[3].changePct, 0);
  assert.deepEqual(provider.historyCalls[0], { ticker: 'SPY', start: '2026-03-04', endExclusive: '2026-03-12' });
});

test('getMarketSnapshot marks symbols without history as N/A', async () => {
  const snapshot = await getMarketSnapshot(new FakeProvider(), () => WEDNESDAY);
  assert.deepEqual(
    snapshot.map((entry) => [entry.symbol, entry.price, entry.changePct, entry.label]),
    [
      ['SPY', 0, 0, 'N/A'],
      ['QQQ', 0, 0, 'N/A'],
      ['^VIX', 0, 0, 'N/A'],
      ['^IXIC', 0, 0, 'N/A'],
    ],
  );
});
