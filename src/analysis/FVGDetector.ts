import { MAX_ACTIVE_GAPS_PER_SYMBOL } from '../config/constants';
import type { OHLCV } from '../types/market';
import type { FairValueGap, GapBook, GapDirection } from '../types/trading';
import type { CandleSeries } from './CandleSeries';

export interface FVGDetectorConfig {
  maxAgeBars: number;
  retainRetired: number;
}

export interface GapUpdate {
  active: FairValueGap[];
  created: FairValueGap[];
  retired: FairValueGap[];
}

export const gapMidpoint = (gap: Pick<FairValueGap, 'top' | 'bottom'>): number => (gap.top + gap.bottom) / 2;

export const touchesMidpoint = (bar: Pick<OHLCV, 'high' | 'low'>, gap: FairValueGap): boolean => {
  const mid = gapMidpoint(gap);
  return bar.low <= mid && mid <= bar.high;
};

export const emptyGapBook = (): GapBook => ({ active: [], retired: [], lastBarTime: null, barCount: 0 });

/**
 * Three-candle imbalance between `first` and `third`. The middle candle is the
 * displacement candle and plays no part in the boundaries.
 */
export const detectGap = (
  first: OHLCV,
  third: OHLCV,
): { direction: GapDirection; top: number; bottom: number } | null => {
  if (first.high < third.low) {
    return { direction: 'bullish', top: third.low, bottom: first.high };
  }
  if (first.low > third.high) {
    return { direction: 'bearish', top: first.low, bottom: third.high };
  }
  return null;
};

/**
 * Forward-only gap tracker. Each call visits only the bars newer than the
 * book's last processed bar, so the cost per bar is constant.
 *
 * Midpoint touches on the newest bar are left alone: the signal evaluator
 * decides what they mean and consumes them via {@link consumeTouch}. A touch
 * on any older bar (catch-up after a skipped tick or a restart) was never
 * evaluated, so the gap is consumed here without a signal.
 */
export class FVGDetector {
  constructor(private readonly config: FVGDetectorConfig) {}

  public update(book: GapBook, symbol: string, series: CandleSeries): GapUpdate {
    const created: FairValueGap[] = [];
    const retired: FairValueGap[] = [];
    const bars = series.toArray();
    const newest = bars.length - 1;

    for (let i = 0; i < bars.length; i++) {
      const bar = bars[i];
      if (book.lastBarTime !== null && bar.timestamp <= book.lastBarTime) continue;

      const seq = book.barCount;
      book.barCount += 1;

      for (const gap of book.active) {
        if (seq - gap.createdIndex > this.config.maxAgeBars) {
          gap.status = 'expired';
          gap.expiredAt = bar.timestamp;
        } else if (i !== newest && gap.fillCount === 0 && touchesMidpoint(bar, gap)) {
          markFilled(gap, bar.timestamp);
        }
      }
      retired.push(...this.retireInactive(book));

      if (i >= 2) {
        const found = detectGap(bars[i - 2], bar);
        if (found && found.top > found.bottom) {
          const gap: FairValueGap = {
            id: `${symbol}:${found.direction}:${bar.timestamp}`,
            symbol,
            direction: found.direction,
            top: found.top,
            bottom: found.bottom,
            createdAt: bar.timestamp,
            createdIndex: seq,
            status: 'active',
            fillCount: 0,
          };
          book.active.push(gap);
          created.push(gap);
          retired.push(...this.evictOverflow(book, bar.timestamp));
        }
      }

      book.lastBarTime = bar.timestamp;
    }

    return { active: [...book.active], created, retired };
  }

  /**
   * Records the first midpoint touch of a gap and retires it. Returns null if
   * the gap is not in the active set (already consumed, expired or unknown).
   */
  public consumeTouch(book: GapBook, gapId: string, barTime: number): FairValueGap | null {
    const gap = book.active.find((g) => g.id === gapId);
    if (!gap) return null;
    markFilled(gap, barTime);
    this.retireInactive(book);
    return gap;
  }

  private evictOverflow(book: GapBook, at: number): FairValueGap[] {
    const evicted: FairValueGap[] = [];
    while (book.active.length > MAX_ACTIVE_GAPS_PER_SYMBOL) {
      let oldest = 0;
      for (let i = 1; i < book.active.length; i++) {
        if (book.active[i].createdAt < book.active[oldest].createdAt) oldest = i;
      }
      const [gap] = book.active.splice(oldest, 1);
      gap.status = 'expired';
      gap.evictedAt = at;
      evicted.push(gap);
      this.archive(book, gap);
    }
    return evicted;
  }

  private retireInactive(book: GapBook): FairValueGap[] {
    const done = book.active.filter((g) => g.status !== 'active');
    if (done.length === 0) return done;
    book.active = book.active.filter((g) => g.status === 'active');
    done.forEach((g) => this.archive(book, g));
    return done;
  }

  private archive(book: GapBook, gap: FairValueGap): void {
    book.retired.push(gap);
    if (book.retired.length > this.config.retainRetired) {
      book.retired.splice(0, book.retired.length - this.config.retainRetired);
    }
  }
}

const markFilled = (gap: FairValueGap, at: number): void => {
  if (gap.fillCount === 0) {
    gap.fillCount = 1;
    gap.filledAt = at;
  }
  gap.status = 'filled';
};
