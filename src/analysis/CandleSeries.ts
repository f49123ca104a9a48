import { TIMEFRAME_MS } from '../config/constants';
import type { OHLCV, Timeframe } from '../types/market';

/**
 * Ordered, closed-bar view over raw exchange candles.
 *
 * Bars are sorted by open time, duplicates keep the last copy received, bars
 * with non-finite prices are dropped, and the still-forming bar (one whose
 * close time is after `now`) is cut off. Missing bars are tolerated as-is.
 */
export class CandleSeries {
  private readonly bars: readonly OHLCV[];

  private constructor(bars: OHLCV[]) {
    this.bars = Object.freeze(bars.map((b) => Object.freeze({ ...b })));
  }

  public static from(raw: OHLCV[], timeframe: Timeframe, now: number): CandleSeries {
    const intervalMs = TIMEFRAME_MS[timeframe];
    const unique = new Map<number, OHLCV>();
    for (const candle of raw) {
      if (!isWellFormed(candle)) continue;
      if (candle.timestamp + intervalMs > now) continue;
      unique.set(candle.timestamp, candle);
    }
    const ordered = [...unique.values()].sort((a, b) => a.timestamp - b.timestamp);
    return new CandleSeries(ordered);
  }

  get length(): number {
    return this.bars.length;
  }

  public at(index: number): OHLCV | undefined {
    return index < 0 ? this.bars[this.bars.length + index] : this.bars[index];
  }

  public last(): OHLCV | undefined {
    return this.at(-1);
  }

  public closes(): number[] {
    return this.bars.map((b) => b.close);
  }

  public toArray(): readonly OHLCV[] {
    return this.bars;
  }
}

const isWellFormed = (c: OHLCV): boolean =>
  Number.isFinite(c.timestamp) &&
  [c.open, c.high, c.low, c.close].every((v) => Number.isFinite(v) && v > 0) &&
  c.high >= c.low;
