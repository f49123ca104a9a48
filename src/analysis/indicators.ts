import type { GapDirection, MacdSnapshot } from '../types/trading';

export interface MacdParams {
  fast: number;
  slow: number;
  signal: number;
}

export const DEFAULT_MACD: MacdParams = { fast: 12, slow: 26, signal: 9 };

/**
 * EMA series aligned with `values`. Entries before the seed are null; the
 * seed at index `period - 1` is the simple average of the first `period` values.
 */
export const emaSeries = (values: number[], period: number): (number | null)[] => {
  const out = new Array<number | null>(values.length).fill(null);
  if (values.length < period) return out;

  let ema = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
  out[period - 1] = ema;
  const multiplier = 2 / (period + 1);

  for (let i = period; i < values.length; i++) {
    ema = (values[i] - ema) * multiplier + ema;
    out[i] = ema;
  }
  return out;
};

export interface MacdSeries {
  macd: number[];
  signalLine: number[];
  histogram: number[];
}

/**
 * Full MACD history, one entry per bar from the first bar where the signal
 * line exists. Empty when there are fewer than `slow + signal` closes.
 */
export const calculateMACDSeries = (prices: number[], params: MacdParams = DEFAULT_MACD): MacdSeries => {
  const empty: MacdSeries = { macd: [], signalLine: [], histogram: [] };
  if (prices.length < params.slow + params.signal) return empty;

  const fast = emaSeries(prices, params.fast);
  const slow = emaSeries(prices, params.slow);

  const macdLine: number[] = [];
  for (let i = params.slow - 1; i < prices.length; i++) {
    const f = fast[i];
    const s = slow[i];
    if (f === null || s === null) continue;
    macdLine.push(f - s);
  }

  const signal = emaSeries(macdLine, params.signal);
  const series: MacdSeries = { macd: [], signalLine: [], histogram: [] };
  for (let i = params.signal - 1; i < macdLine.length; i++) {
    const sig = signal[i];
    if (sig === null) continue;
    series.macd.push(macdLine[i]);
    series.signalLine.push(sig);
    series.histogram.push(macdLine[i] - sig);
  }
  return series;
};

/** MACD at the latest bar, or null for insufficient history. */
export const calculateMACD = (prices: number[], params: MacdParams = DEFAULT_MACD): MacdSnapshot | null => {
  const series = calculateMACDSeries(prices, params);
  const last = series.histogram.length - 1;
  if (last < 0) return null;
  return {
    macd: series.macd[last],
    signalLine: series.signalLine[last],
    histogram: series.histogram[last],
  };
};

export const macdAgrees = (snapshot: MacdSnapshot, direction: GapDirection): boolean =>
  direction === 'bullish' ? snapshot.histogram > 0 : snapshot.histogram < 0;

/**
 * True when the MACD line crossed its signal line in `direction` within the
 * last `lookback` bars. With too little history to look back that far the
 * filter passes.
 */
export const hasRecentCrossover = (
  prices: number[],
  direction: GapDirection,
  lookback: number,
  params: MacdParams = DEFAULT_MACD,
): boolean => {
  const { histogram } = calculateMACDSeries(prices, params);
  if (histogram.length < lookback + 1) return true;

  const window = histogram.slice(-(lookback + 1));
  for (let i = 1; i < window.length; i++) {
    const prev = Math.sign(window[i - 1]);
    const curr = Math.sign(window[i]);
    if (direction === 'bullish' && prev < 0 && curr > 0) return true;
    if (direction === 'bearish' && prev > 0 && curr < 0) return true;
  }
  return false;
};
