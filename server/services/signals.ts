// Signal classification: latest indicator row (plus a trailing bandwidth
// window) mapped to trend / momentum / volatility labels.

import type {
  IndicatorSeries,
  MomentumLabel,
  SignalLabels,
  TrendLabel,
  VolatilityLabel,
} from '../../shared/api-types.js';
import { BANDWIDTH_AVERAGE_WINDOW } from '../../shared/constants.js';

export function classifyTrend(close: number, sma50: number | null, sma200: number | null): TrendLabel {
  if (sma50 === null || sma200 === null) return 'Unknown';
  if (close > sma50 && sma50 > sma200) return 'Bullish';
  if (close < sma50 && sma50 < sma200) return 'Bearish';
  if (close > sma200) return 'Leaning Bullish';
  if (close < sma200) return 'Leaning Bearish';
  return 'Neutral';
}

export function classifyMomentum(rsi: number | null): MomentumLabel {
  if (rsi === null) return 'Neutral';
  if (rsi > 70) return 'Overbought';
  if (rsi < 30) return 'Oversold';
  if (rsi > 60) return 'Strong';
  if (rsi < 40) return 'Weak';
  return 'Neutral';
}

/** Mean of the last `window` bandwidth values, or null when any of them is undefined. */
export function trailingBandwidthMean(
  rows: IndicatorSeries,
  window: number = BANDWIDTH_AVERAGE_WINDOW,
): number | null {
  if (rows.length < window) return null;
  let sum = 0;
  for (let i = rows.length - window; i < rows.length; i++) {
    const value = rows[i].bbBandwidth;
    if (value === null) return null;
    sum += value;
  }
  return sum / window;
}

export function classifyVolatility(current: number | null, average: number | null): VolatilityLabel {
  if (current === null || average === null) return 'Normal';
  if (current > 1.5 * average) return 'Elevated';
  if (current < 0.7 * average) return 'Compressed';
  return 'Normal';
}

export function classifySignals(rows: IndicatorSeries): SignalLabels {
  if (rows.length === 0) {
    return { trend: 'Unknown', momentum: 'Unknown', volatility: 'Unknown' };
  }
  const last = rows[rows.length - 1];
  return {
    trend: classifyTrend(last.close, last.sma50, last.sma200),
    momentum: classifyMomentum(last.rsi),
    volatility: classifyVolatility(last.bbBandwidth, trailingBandwidthMean(rows)),
  };
}
