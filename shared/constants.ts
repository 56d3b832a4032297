// Shared constants: single source of truth for label sets and indicator windows.

export const TREND_LABELS = ['Bullish', 'Bearish', 'Leaning Bullish', 'Leaning Bearish', 'Neutral', 'Unknown'] as const;

export const MOMENTUM_LABELS = ['Overbought', 'Oversold', 'Strong', 'Weak', 'Neutral', 'Unknown'] as const;

export const VOLATILITY_LABELS = ['Elevated', 'Compressed', 'Normal', 'Unknown'] as const;

export const RSI_PERIOD = 14;
export const MACD_FAST_SPAN = 12;
export const MACD_SLOW_SPAN = 26;
export const MACD_SIGNAL_SPAN = 9;
export const BOLLINGER_WINDOW = 20;
export const BOLLINGER_STD_MULTIPLIER = 2;
export const ATR_PERIOD = 14;

/** Trailing rows averaged when comparing the current Bollinger bandwidth. */
export const BANDWIDTH_AVERAGE_WINDOW = 20;

export const MARKET_SNAPSHOT_SYMBOLS = ['SPY', 'QQQ', '^VIX', '^IXIC'] as const;
