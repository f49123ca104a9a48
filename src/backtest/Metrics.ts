import type { Position } from '../types/trading';
import type { BacktestMetrics, CompletedTrade, EquityPoint } from './types';

export const toCompletedTrade = (position: Position): CompletedTrade | null => {
  if (position.status !== 'closed' || position.exitPrice === undefined || position.closedAt === undefined) return null;
  return {
    symbol: position.symbol,
    direction: position.direction,
    entryPrice: position.entryPrice,
    exitPrice: position.exitPrice,
    entryTime: position.openedAt,
    exitTime: position.closedAt,
    size: position.size,
    netProfit: position.realizedPnl,
    exitReason: position.exitReason ?? 'manual',
    holdDuration: position.closedAt - position.openedAt,
  };
};

export class MetricsCalculator {
  public static calculate(
    trades: CompletedTrade[],
    initialBalance: number,
    finalBalance: number,
    equityCurve: EquityPoint[] = [],
  ): BacktestMetrics {
    const totalTrades = trades.length;
    if (totalTrades === 0) {
      return this.createEmptyMetrics(initialBalance, finalBalance);
    }

    let wins = 0;
    let grossProfit = 0;
    let grossLoss = 0;
    const returns: number[] = [];

    for (const trade of trades) {
      if (trade.netProfit > 0) {
        wins++;
        grossProfit += trade.netProfit;
      } else {
        grossLoss += Math.abs(trade.netProfit);
      }
      // Per-trade return on notional as a Sharpe proxy.
      returns.push(trade.netProfit / (trade.entryPrice * trade.size));
    }

    const totalReturn = finalBalance - initialBalance;
    const avgReturn = returns.reduce((a, b) => a + b, 0) / totalTrades;
    const variance = returns.reduce((a, b) => a + Math.pow(b - avgReturn, 2), 0) / totalTrades;
    const stdDev = Math.sqrt(variance);

    return {
      totalTrades,
      wins,
      losses: totalTrades - wins,
      winRate: wins / totalTrades,
      profitFactor: grossLoss === 0 ? grossProfit : grossProfit / grossLoss,
      maxDrawdown: this.maxDrawdown(initialBalance, trades, equityCurve),
      sharpeRatio: stdDev === 0 ? 0 : avgReturn / stdDev,
      expectancy: totalReturn / totalTrades,
      grossProfit,
      grossLoss,
      finalBalance,
      returnPercentage: (totalReturn / initialBalance) * 100,
    };
  }

  /** Peak-to-trough on the equity curve; falls back to equity at each trade exit. */
  public static maxDrawdown(initialBalance: number, trades: CompletedTrade[], equityCurve: EquityPoint[]): number {
    const points =
      equityCurve.length > 0
        ? equityCurve.map((p) => p.equity)
        : trades.reduce<number[]>((acc, t) => [...acc, (acc[acc.length - 1] ?? initialBalance) + t.netProfit], []);

    let peak = initialBalance;
    let maxDrawdown = 0;
    for (const equity of points) {
      if (equity > peak) peak = equity;
      const dd = peak > 0 ? (peak - equity) / peak : 0;
      if (dd > maxDrawdown) maxDrawdown = dd;
    }
    return maxDrawdown;
  }

  private static createEmptyMetrics(initialBalance: number, finalBalance: number): BacktestMetrics {
    return {
      totalTrades: 0,
      wins: 0,
      losses: 0,
      winRate: 0,
      profitFactor: 0,
      maxDrawdown: 0,
      sharpeRatio: 0,
      expectancy: 0,
      grossProfit: 0,
      grossLoss: 0,
      finalBalance,
      returnPercentage: ((finalBalance - initialBalance) / initialBalance) * 100,
    };
  }
}
