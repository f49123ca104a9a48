import { DAY_MS, MAX_OPEN_POSITIONS_PER_SYMBOL } from '../config/constants';
import type { SymbolMeta } from '../types/market';
import type { RejectReason, RiskState, Signal, TradingState } from '../types/trading';
import { takeProfitFor } from '../engine/SignalEvaluator';

export interface RiskConfig {
  riskPerTrade: number; // fraction of balance, e.g. 0.01
  dailyLossLimitPct: number; // e.g. 0.05
  maxOpenPositions: number;
  maxLeverage: number;
  rewardRiskRatio: number;
  defaultSizeStep: number;
  defaultMinOrderSize: number;
}

export type SizingResult =
  | {
      ok: true;
      size: number;
      riskAmount: number;
      notional: number;
      leverageCapped: boolean;
      // Order levels on the symbol's price grid.
      stopLoss: number;
      takeProfit: number;
    }
  | { ok: false; reason: RejectReason; detail: Record<string, unknown> };

export const utcDayStart = (time: number): number => Math.floor(time / DAY_MS) * DAY_MS;

export const isNewTradingDay = (lastResetTime: number, now: number): boolean =>
  utcDayStart(now) > utcDayStart(lastResetTime);

export const stepDecimals = (step: number): number => {
  const text = step.toString();
  const exp = text.match(/e-(\d+)$/);
  if (exp) return Number(exp[1]);
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
};

/** Moves a price onto a grid of `precision` decimals, away from `from`. */
export const roundAway = (price: number, from: number, precision: number): number => {
  const factor = Math.pow(10, precision);
  const scaled = price < from ? Math.floor(price * factor + 1e-9) : Math.ceil(price * factor - 1e-9);
  return Number((scaled / factor).toFixed(precision));
};

/** Rounds down to a whole number of steps, tolerating float noise just under a step. */
export const floorToStep = (value: number, step: number): number => {
  const units = Math.floor(value / step + 1e-9);
  return Number((units * step).toFixed(stepDecimals(step)));
};

export class RiskManager {
  private config: RiskConfig;

  constructor(config: Partial<RiskConfig> = {}) {
    this.config = {
      riskPerTrade: 0.01,
      dailyLossLimitPct: 0.05,
      maxOpenPositions: 5,
      maxLeverage: 2.0,
      rewardRiskRatio: 2,
      defaultSizeStep: 0.001,
      defaultMinOrderSize: 0.001,
      ...config,
    };
  }

  public static initialRiskState(balance: number, now: number): RiskState {
    return {
      dayStartBalance: balance,
      dayStartedAt: utcDayStart(now),
      currentBalance: balance,
      dailyLossGuardTriggered: false,
      portfolioPositionCount: 0,
      symbolsWithPosition: [],
    };
  }

  /** Re-anchors the daily baseline on the first call of a new UTC day. */
  public rollDay(risk: RiskState, now: number): boolean {
    if (!isNewTradingDay(risk.dayStartedAt, now)) return false;
    risk.dayStartBalance = risk.currentBalance;
    risk.dayStartedAt = utcDayStart(now);
    risk.dailyLossGuardTriggered = false;
    return true;
  }

  public dailyLossFloor(risk: RiskState): number {
    return risk.dayStartBalance - risk.dayStartBalance * this.config.dailyLossLimitPct;
  }

  /**
   * Once breached the guard holds for the rest of the UTC day even if the
   * balance recovers. Sitting exactly on the floor is not a breach.
   */
  public isDailyLossGuardActive(risk: RiskState): boolean {
    if (!risk.dailyLossGuardTriggered && risk.currentBalance < this.dailyLossFloor(risk)) {
      risk.dailyLossGuardTriggered = true;
    }
    return risk.dailyLossGuardTriggered;
  }

  public size(signal: Signal, state: TradingState, meta: SymbolMeta | null): SizingResult {
    const risk = state.risk;
    const openOnSymbol = Object.values(state.positions).filter(
      (p) => p.symbol === signal.symbol && p.status === 'open',
    ).length;

    // 1. Caps
    if (openOnSymbol >= MAX_OPEN_POSITIONS_PER_SYMBOL) {
      return reject('open_position', { symbol: signal.symbol });
    }
    const openTotal = Object.values(state.positions).filter((p) => p.status === 'open').length;
    if (openTotal >= this.config.maxOpenPositions) {
      return reject('max_positions', { open: openTotal, max: this.config.maxOpenPositions });
    }
    if (this.isDailyLossGuardActive(risk)) {
      return reject('daily_loss_guard', {
        currentBalance: risk.currentBalance,
        dayStartBalance: risk.dayStartBalance,
        floor: this.dailyLossFloor(risk),
      });
    }

    // 2. Risk-based size, on a stop widened to the exchange's price grid
    const stopLoss = meta ? roundAway(signal.stopLoss, signal.entryPrice, meta.pricePrecision) : signal.stopLoss;
    const stopDistance = Math.abs(signal.entryPrice - stopLoss);
    if (stopDistance === 0) {
      return reject('invalid_stop', { entryPrice: signal.entryPrice, stopLoss });
    }
    const riskAmount = risk.currentBalance * this.config.riskPerTrade;
    let rawSize = riskAmount / stopDistance;

    // 3. Leverage constraint
    let leverageCapped = false;
    const maxSize = (risk.currentBalance * this.config.maxLeverage) / signal.entryPrice;
    if (rawSize > maxSize) {
      rawSize = maxSize;
      leverageCapped = true;
    }

    // 4. Exchange rounding and minimums
    const step = meta?.sizeStep ?? this.config.defaultSizeStep;
    const minSize = meta?.minOrderSize ?? this.config.defaultMinOrderSize;
    const size = floorToStep(rawSize, step);
    const notional = size * signal.entryPrice;

    if (size <= 0 || size < minSize) {
      return reject('below_min_size', { size, rawSize, minSize, step });
    }
    if (meta?.minNotional !== undefined && notional < meta.minNotional) {
      return reject('below_min_size', { notional, minNotional: meta.minNotional });
    }

    const target = takeProfitFor(signal.direction, signal.entryPrice, stopLoss, this.config.rewardRiskRatio);
    const takeProfit = meta ? Number(target.toFixed(meta.pricePrecision)) : target;

    return { ok: true, size, riskAmount, notional, leverageCapped, stopLoss, takeProfit };
  }
}

const reject = (reason: RejectReason, detail: Record<string, unknown>): SizingResult => ({
  ok: false,
  reason,
  detail,
});
