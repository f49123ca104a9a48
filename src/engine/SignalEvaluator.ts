import { touchesMidpoint } from '../analysis/FVGDetector';
import { hasRecentCrossover, macdAgrees, type MacdParams } from '../analysis/indicators';
import type { OHLCV } from '../types/market';
import type { FairValueGap, MacdSnapshot, MacdState, Rejection, Signal } from '../types/trading';

export interface SignalEvaluatorConfig {
  rewardRiskRatio: number;
  stopBufferPct: number;
  requireRecentCrossover: boolean;
  crossoverLookback: number;
  macd: MacdParams;
}

export interface EvaluationContext {
  hasOpenPosition: boolean;
  // Close history ending at `latest`; only read by the crossover filter.
  closes: number[];
}

export interface Evaluation {
  signal: Signal | null;
  rejections: Rejection[];
  // Every gap whose midpoint the latest bar traded through. The caller
  // consumes all of them, whatever the outcome.
  touched: FairValueGap[];
}

/**
 * Turns midpoint touches of active gaps into entry decisions.
 *
 * Rejections are checked in a fixed order and the first match wins:
 * open position, MACD disagreement, already filled, invalid stop. Older gaps
 * touched on the same bar as a signal are rejected as superseded. Sizing and
 * portfolio caps are the risk manager's call.
 */
export class SignalEvaluator {
  constructor(private readonly config: SignalEvaluatorConfig) {}

  public evaluate(
    symbol: string,
    gaps: FairValueGap[],
    latest: OHLCV,
    macd: MacdSnapshot,
    context: EvaluationContext,
  ): Evaluation {
    const touched = gaps
      .filter((g) => g.symbol === symbol && touchesMidpoint(latest, g))
      .sort((a, b) => b.createdAt - a.createdAt);

    const rejections: Rejection[] = [];
    let signal: Signal | null = null;

    for (const gap of touched) {
      const reject = (reason: Rejection['reason'], detail?: Record<string, unknown>) =>
        rejections.push({ symbol, gapId: gap.id, reason, detail });

      if (context.hasOpenPosition) {
        reject('open_position');
        continue;
      }
      // A newer gap already produced this bar's signal.
      if (signal !== null) {
        reject('superseded', { by: signal.gapId });
        continue;
      }

      const macdState = this.macdState(gap, macd, context.closes);
      if (macdState !== 'confirmed') {
        reject('macd_disagreement', { macdState, histogram: macd.histogram });
        continue;
      }

      if (gap.fillCount > 0) {
        reject('already_filled', { filledAt: gap.filledAt });
        continue;
      }

      const entryPrice = latest.close;
      const stopLoss = this.stopFor(gap);
      const validStop = gap.direction === 'bullish' ? stopLoss < entryPrice : stopLoss > entryPrice;
      if (!validStop) {
        reject('invalid_stop', { entryPrice, stopLoss });
        continue;
      }

      signal = {
        symbol,
        direction: gap.direction,
        entryPrice,
        stopLoss,
        takeProfit: takeProfitFor(gap.direction, entryPrice, stopLoss, this.config.rewardRiskRatio),
        gapId: gap.id,
        macdState,
        macd,
        timestamp: latest.timestamp,
      };
    }

    return { signal, rejections, touched };
  }

  private macdState(gap: FairValueGap, macd: MacdSnapshot, closes: number[]): MacdState {
    if (!macdAgrees(macd, gap.direction)) return 'rejected';
    if (
      this.config.requireRecentCrossover &&
      !hasRecentCrossover(closes, gap.direction, this.config.crossoverLookback, this.config.macd)
    ) {
      return 'pending';
    }
    return 'confirmed';
  }

  // Structural stop: the far side of the gap, pushed out by the buffer.
  private stopFor(gap: FairValueGap): number {
    const buffer = this.config.stopBufferPct;
    return gap.direction === 'bullish' ? gap.bottom * (1 - buffer) : gap.top * (1 + buffer);
  }
}

export const takeProfitFor = (
  direction: FairValueGap['direction'],
  entryPrice: number,
  stopLoss: number,
  rewardRiskRatio: number,
): number => {
  const risk = Math.abs(entryPrice - stopLoss);
  return direction === 'bullish' ? entryPrice + rewardRiskRatio * risk : entryPrice - rewardRiskRatio * risk;
};

