import type { OHLCV, Ticker } from '../types/market';
import type { ExitReason, Fill, Position, Signal, TradingState } from '../types/trading';
import { takeProfitFor } from '../engine/SignalEvaluator';

export interface TrailingConfig {
  enabled: boolean;
  activationR: number;
  distanceR: number;
}

export interface PositionManagerConfig {
  rewardRiskRatio: number;
  trailing: TrailingConfig;
  closedHistoryLimit: number;
}

export type PriceObservation = Pick<OHLCV, 'timestamp' | 'open' | 'high' | 'low' | 'close'>;

export interface ManageOutcome {
  closed: Position | null;
  trailedTo: number | null;
}

/** A ticker is a zero-width bar unless the provider observed a whole bar. */
export const observationFromTicker = (ticker: Ticker): PriceObservation => ({
  timestamp: ticker.timestamp,
  open: ticker.bar?.open ?? ticker.price,
  high: ticker.bar?.high ?? ticker.price,
  low: ticker.bar?.low ?? ticker.price,
  close: ticker.price,
});

export const directionSign = (direction: Position['direction']): 1 | -1 => (direction === 'bullish' ? 1 : -1);

export const realizedPnl = (position: Pick<Position, 'direction' | 'entryPrice' | 'size'>, exitPrice: number): number =>
  (exitPrice - position.entryPrice) * position.size * directionSign(position.direction);

export const syncPositionCounts = (state: TradingState): void => {
  const symbols = Object.values(state.positions)
    .filter((p) => p.status === 'open')
    .map((p) => p.symbol)
    .sort();
  state.risk.portfolioPositionCount = symbols.length;
  state.risk.symbolsWithPosition = symbols;
};

/**
 * Owns the position lifecycle: none -> open -> closed (archived). At most one
 * open position per symbol, keyed by symbol in `state.positions`.
 */
export class PositionManager {
  constructor(private readonly config: PositionManagerConfig) {}

  public getOpen(state: TradingState, symbol: string): Position | null {
    const position = state.positions[symbol];
    return position && position.status === 'open' ? position : null;
  }

  /**
   * Records a fill. The structural stop is kept and the target is re-anchored
   * on the actual fill price so the reward:risk ratio holds after slippage.
   */
  public open(state: TradingState, signal: Signal, fill: Fill): Position {
    if (this.getOpen(state, signal.symbol)) {
      throw new Error(`Position already open for ${signal.symbol}`);
    }
    const position: Position = {
      id: `pos:${signal.gapId}`,
      symbol: signal.symbol,
      direction: signal.direction,
      entryPrice: fill.price,
      size: fill.size,
      stopLoss: signal.stopLoss,
      initialStopLoss: signal.stopLoss,
      takeProfit: takeProfitFor(signal.direction, fill.price, signal.stopLoss, this.config.rewardRiskRatio),
      openedAt: fill.timestamp,
      status: 'open',
      realizedPnl: 0,
      gapId: signal.gapId,
      bestPrice: fill.price,
    };
    state.positions[signal.symbol] = position;
    syncPositionCounts(state);
    return position;
  }

  /**
   * Checks one price observation against the stop and target. When a bar
   * spans both, the stop wins. A bar that opens beyond a level exits at the
   * open instead of the level.
   */
  public manage(state: TradingState, symbol: string, obs: PriceObservation): ManageOutcome {
    const position = this.getOpen(state, symbol);
    // Nothing observed after the fill yet: the entry bar's own range predates the entry.
    if (!position || obs.timestamp <= position.openedAt) return { closed: null, trailedTo: null };

    const long = position.direction === 'bullish';
    const stopHit = long ? obs.low <= position.stopLoss : obs.high >= position.stopLoss;
    if (stopHit) {
      const exit = long ? Math.min(position.stopLoss, obs.open) : Math.max(position.stopLoss, obs.open);
      const reason: ExitReason = position.stopLoss !== position.initialStopLoss ? 'trailing_stop' : 'stop_loss';
      return { closed: this.close(state, position, exit, reason, obs.timestamp), trailedTo: null };
    }

    const targetHit = long ? obs.high >= position.takeProfit : obs.low <= position.takeProfit;
    if (targetHit) {
      const exit = long ? Math.max(position.takeProfit, obs.open) : Math.min(position.takeProfit, obs.open);
      return { closed: this.close(state, position, exit, 'take_profit', obs.timestamp), trailedTo: null };
    }

    position.bestPrice = long ? Math.max(position.bestPrice, obs.high) : Math.min(position.bestPrice, obs.low);
    return { closed: null, trailedTo: this.trail(position) };
  }

  public forceClose(
    state: TradingState,
    symbol: string,
    price: number,
    timestamp: number,
    reason: ExitReason = 'manual',
  ): Position | null {
    const position = this.getOpen(state, symbol);
    if (!position) return null;
    return this.close(state, position, price, reason, timestamp);
  }

  /**
   * Archives a position the exchange has already flattened through its
   * brackets. The exit is booked at whichever level is nearer `price`. The
   * balance is not touched: the synced exchange balance already carries the
   * result.
   */
  public settle(state: TradingState, symbol: string, price: number, timestamp: number): Position | null {
    const position = this.getOpen(state, symbol);
    if (!position) return null;
    const stopNearer = Math.abs(price - position.stopLoss) <= Math.abs(price - position.takeProfit);
    return stopNearer
      ? this.close(state, position, position.stopLoss, 'stop_loss', timestamp, false)
      : this.close(state, position, position.takeProfit, 'take_profit', timestamp, false);
  }

  private trail(position: Position): number | null {
    const { trailing } = this.config;
    if (!trailing.enabled) return null;

    const initialRisk = Math.abs(position.entryPrice - position.initialStopLoss);
    const sign = directionSign(position.direction);
    const favourable = (position.bestPrice - position.entryPrice) * sign;
    if (initialRisk === 0 || favourable < trailing.activationR * initialRisk) return null;

    const candidate = position.bestPrice - sign * trailing.distanceR * initialRisk;
    const tighter = sign === 1 ? candidate > position.stopLoss : candidate < position.stopLoss;
    if (!tighter) return null;

    position.stopLoss = candidate;
    return candidate;
  }

  private close(
    state: TradingState,
    position: Position,
    exitPrice: number,
    reason: ExitReason,
    timestamp: number,
    applyToBalance = true,
  ): Position {
    const pnl = realizedPnl(position, exitPrice);
    const closed: Position = {
      ...position,
      status: 'closed',
      exitPrice,
      exitReason: reason,
      closedAt: timestamp,
      realizedPnl: pnl,
    };

    delete state.positions[position.symbol];
    state.closed.push(closed);
    if (state.closed.length > this.config.closedHistoryLimit) {
      state.closed.splice(0, state.closed.length - this.config.closedHistoryLimit);
    }
    if (applyToBalance) state.risk.currentBalance += pnl;
    syncPositionCounts(state);
    return closed;
  }
}
