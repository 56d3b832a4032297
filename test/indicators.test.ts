import test from 'node:test';
import assert from 'node:assert/strict';

import type { OhlcvBar } from '../shared/api-types.js';
import { addIndicators, calculateRsi, ema, rollingMean, rollingSampleStd, trueRange } from '../server/services/indicators.js';
import { makeBars, weekdaysEndingAt } from './helpers.js';

function assertClose(actual: number | null, expected: number, epsilon = 1e-9): void {
  assert.notEqual(actual, null);
  assert.ok(Math.abs(Number(actual) - expected) < epsilon, `expected ${expected}, got ${actual}`);
}

test('rollingMean stays null until the window is full', () => {
  assert.deepEqual(rollingMean([1, 2, 3, 4], 2), [null, 1.5, 2.5, 3.5]);
  assert.deepEqual(rollingMean([1, null, 3, 4], 2), [null, null, null, 3.5]);
});

test('rollingSampleStd uses the n - 1 denominator', () => {
  const std = rollingSampleStd([2, 4, 4, 4, 5, 5, 7, 9], 8);
  // Sum of squared deviations is 32; 32 / 7.
  assertClose(std[7], Math.sqrt(32 / 7));
  assert.equal(std[6], null);
});

test('ema is seeded with the first value', () => {
  assert.deepEqual(ema([1, 2], 3), [1, 1.5]);
  assert.deepEqual(ema([], 3), []);
});

test('10-row series leaves every windowed indicator undefined', () => {
  const bars = makeBars('TEN', weekdaysEndingAt('2026-03-11', 10), (i) => 100 + i);
  const rows = addIndicators(bars);
  assert.equal(rows.length, 10);
  for (const row of rows) {
    assert.equal(row.sma20, null);
    assert.equal(row.sma50, null);
    assert.equal(row.sma200, null);
    assert.equal(row.atr, null);
    assert.equal(row.rsi, null);
    assert.equal(row.bbUpper, null);
    assert.equal(row.bbLower, null);
    assert.equal(row.bbBandwidth, null);
  }
  assert.equal(rows[0].macd, 0);
  assert.equal(rows[0].macdSignal, 0);
  assert.equal(rows[0].macdHist, 0);
});

test('RSI becomes defined on the 14th row', () => {
  const closes = Array.from({ length: 14 }, (_, i) => i + 1);
  const rsi = calculateRsi(closes);
  assert.equal(rsi[12], null);
  assert.equal(rsi[13], 100);
});

test('RSI is 100 for a flat window', () => {
  const rsi = calculateRsi(new Array<number>(14).fill(10));
  assert.equal(rsi[13], 100);
});

test('RSI uses simple means of gains and losses', () => {
  // Seven +2 moves and seven -1 moves: avg gain 1, avg loss 0.5, RS 2.
  const closes = [100, 102, 101, 103, 102, 104, 103, 105, 104, 106, 105, 107, 106, 108, 107];
  const rsi = calculateRsi(closes);
  assertClose(rsi[14], 200 / 3);
});

test('Bollinger bands use the sample deviation of the last 20 closes', () => {
  const bars = makeBars('BB', weekdaysEndingAt('2026-03-11', 20), (i) => i + 1);
  const rows = addIndicators(bars);
  const last = rows[19];
  const std = Math.sqrt(35); // variance of 1..20 with n - 1 is 35
  assertClose(last.sma20, 10.5);
  assertClose(last.bbUpper, 10.5 + 2 * std);
  assertClose(last.bbLower, 10.5 - 2 * std);
  assertClose(last.bbBandwidth, ((4 * std) / 10.5) * 100);
  assert.equal(rows[18].bbUpper, null);
});

test('ATR averages the true range over 14 rows', () => {
  const bars = makeBars('ATR', weekdaysEndingAt('2026-03-11', 15), () => 10);
  assert.deepEqual(trueRange(bars.slice(0, 2)), [2, 2]);
  const rows = addIndicators(bars);
  assert.equal(rows[12].atr, null);
  assert.equal(rows[13].atr, 2);
  assert.equal(rows[14].atr, 2);
});

test('true range includes gaps from the previous close', () => {
  const bars: OhlcvBar[] = [
    { ticker: 'GAP', date: '2026-03-10', open: 10, high: 11, low: 9, close: 10, volume: 1 },
    { ticker: 'GAP', date: '2026-03-11', open: 15, high: 16, low: 14, close: 15, volume: 1 },
  ];
  assert.deepEqual(trueRange(bars), [2, 6]);
});

test('addIndicators keeps bar fields and does not mutate its input', () => {
  const bars = makeBars('KEEP', weekdaysEndingAt('2026-03-11', 30), (i) => 50 + i);
  const before = JSON.stringify(bars);
  const rows = addIndicators(bars);
  assert.equal(JSON.stringify(bars), before);
  assert.deepEqual(
    rows.map((row) => row.date),
    bars.map((bar) => bar.date),
  );
  assert.equal(rows[29].close, 79);
  assert.equal(rows[29].ticker, 'KEEP');
  assertClose(rows[29].sma20, 69.5);
});

test('addIndicators returns an empty array for an empty series', () => {
  assert.deepEqual(addIndicators([]), []);
});
