/**
 * Technical indicators over a daily series:
 * SMA 20/50/200, RSI(14), MACD(12, 26, 9), Bollinger Bands(20, 2σ), ATR(14).
 *
 * Every function is positional: output index i is computed from input rows
 * 0..i only. `null` marks a value whose window is not yet full.
 */

import type { IndicatorRow, Series } from '../../shared/api-types.js';
import {
  ATR_PERIOD,
  BOLLINGER_STD_MULTIPLIER,
  BOLLINGER_WINDOW,
  MACD_FAST_SPAN,
  MACD_SIGNAL_SPAN,
  MACD_SLOW_SPAN,
  RSI_PERIOD,
} from '../../shared/constants.js';

type Column = Array<number | null>;

/** Arithmetic mean of the trailing `window` values; null until all of them are defined. */
export function rollingMean(values: readonly (number | null)[], window: number): Column {
  const period = Math.max(1, Math.floor(window));
  const out: Column = new Array<number | null>(values.length).fill(null);
  for (let i = period - 1; i < values.length; i++) {
    let sum = 0;
    let complete = true;
    for (let j = i - period + 1; j <= i; j++) {
      const v = values[j];
      if (v === null || v === undefined || !Number.isFinite(v)) {
        complete = false;
        break;
      }
      sum += v;
    }
    out[i] = complete ? sum / period : null;
  }
  return out;
}

/** Sample (n − 1) standard deviation of the trailing `window` values. */
export function rollingSampleStd(values: readonly number[], window: number): Column {
  const period = Math.max(2, Math.floor(window));
  const out: Column = new Array<number | null>(values.length).fill(null);
  for (let i = period - 1; i < values.length; i++) {
    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) sum += values[j];
    const mean = sum / period;
    let squares = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const d = values[j] - mean;
      squares += d * d;
    }
    out[i] = Math.sqrt(squares / (period - 1));
  }
  return out;
}

/** Exponential moving average, α = 2 / (span + 1), seeded with the first value. */
export function ema(values: readonly number[], span: number): number[] {
  const alpha = 2 / (Math.max(1, span) + 1);
  const out: number[] = [];
  let prev = 0;
  for (let i = 0; i < values.length; i++) {
    prev = i === 0 ? values[0] : alpha * values[i] + (1 - alpha) * prev;
    out.push(prev);
  }
  return out;
}

/**
 * RSI from simple rolling means of gains and losses. The first row has no
 * previous close and counts as an unchanged day.
 */
export function calculateRsi(closes: readonly number[], period: number = RSI_PERIOD): Column {
  const gains: number[] = [];
  const losses: number[] = [];
  for (let i = 0; i < closes.length; i++) {
    const change = i === 0 ? 0 : closes[i] - closes[i - 1];
    gains.push(change > 0 ? change : 0);
    losses.push(change < 0 ? -change : 0);
  }
  const avgGain = rollingMean(gains, period);
  const avgLoss = rollingMean(losses, period);
  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (gain === null || loss === null) return null;
    if (loss === 0) return 100;
    return 100 - 100 / (1 + gain / loss);
  });
}

export function trueRange(series: Series): number[] {
  return series.map((bar, i) => {
    const range = bar.high - bar.low;
    if (i === 0) return range;
    const prevClose = series[i - 1].close;
    return Math.max(range, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose));
  });
}

export function addIndicators(series: Series): IndicatorRow[] {
  const closes = series.map((bar) => bar.close);

  const sma20 = rollingMean(closes, 20);
  const sma50 = rollingMean(closes, 50);
  const sma200 = rollingMean(closes, 200);
  const rsi = calculateRsi(closes);

  const fast = ema(closes, MACD_FAST_SPAN);
  const slow = ema(closes, MACD_SLOW_SPAN);
  const macd = fast.map((value, i) => value - slow[i]);
  const macdSignal = ema(macd, MACD_SIGNAL_SPAN);

  const bbMid = rollingMean(closes, BOLLINGER_WINDOW);
  const bbStd = rollingSampleStd(closes, BOLLINGER_WINDOW);

  const atr = rollingMean(trueRange(series), ATR_PERIOD);

  return series.map((bar, i) => {
    const mid = bbMid[i];
    const std = bbStd[i];
    const bbUpper = mid !== null && std !== null ? mid + BOLLINGER_STD_MULTIPLIER * std : null;
    const bbLower = mid !== null && std !== null ? mid - BOLLINGER_STD_MULTIPLIER * std : null;
    const bbBandwidth =
      bbUpper !== null && bbLower !== null && mid !== null && mid !== 0 ? ((bbUpper - bbLower) / mid) * 100 : null;

    return {
      ...bar,
      sma20: sma20[i],
      sma50: sma50[i],
      sma200: sma200[i],
      rsi: rsi[i],
      macd: macd[i],
      macdSignal: macdSignal[i],
      macdHist: macd[i] - macdSignal[i],
      bbUpper,
      bbLower,
      bbBandwidth,
      atr: atr[i],
    };
  });
}
