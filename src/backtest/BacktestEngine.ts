import type { BotConfig } from '../config/BotConfig';
import { BacktestExecutor } from '../engine/executors/BacktestExecutor';
import { TradingEngine } from '../engine/TradingEngine';
import { directionSign } from '../execution/PositionManager';
import { MemoryStateStore } from '../persistence/StateStore';
import type { OHLCV, SymbolMeta } from '../types/market';
import type { Position, TradingState } from '../types/trading';
import type { EventSink } from '../utils/eventSink';
import { logger } from '../utils/logger';
import { MetricsCalculator, toCompletedTrade } from './Metrics';
import type { BacktestResult, CompletedTrade, EquityPoint } from './types';

export interface BacktestOptions {
  config: BotConfig;
  history: Record<string, OHLCV[]>;
  meta?: Record<string, SymbolMeta>;
  events?: EventSink;
}

/**
 * Replays history one bar close at a time through the same TradingEngine
 * the live loop uses. State lives in memory only; positions still open at
 * the end are closed at the last price.
 */
export class BacktestEngine {
  constructor(private readonly options: BacktestOptions) {}

  public async run(): Promise<BacktestResult> {
    const { config, history, meta, events } = this.options;
    const provider = new BacktestExecutor(history, config.timeframe, meta);
    const timeline = provider.timeline();
    if (timeline.length === 0) {
      throw new Error('No candles to replay');
    }

    provider.advanceTo(timeline[0]);
    const engine = await TradingEngine.create({
      config: { ...config, mode: 'backtest' },
      provider,
      store: new MemoryStateStore(),
      events,
    });

    logger.info({ symbols: config.symbols, bars: timeline.length }, 'Backtest started');
    const equityCurve: EquityPoint[] = [];
    // The state's closed archive is bounded; metrics need every trade.
    const closed: Position[] = [];
    for (const time of timeline) {
      provider.advanceTo(time);
      const report = await engine.runTick();
      closed.push(...report.closed);
      equityCurve.push({ timestamp: time, equity: await this.markToMarket(engine.getState(), provider) });
    }

    closed.push(...(await engine.closeAll()));
    const finalBalance = engine.getState().risk.currentBalance;
    const trades = closed.map(toCompletedTrade).filter((t): t is CompletedTrade => t !== null);
    const metrics = MetricsCalculator.calculate(trades, config.startingBalance, finalBalance, equityCurve);

    logger.info(
      {
        trades: metrics.totalTrades,
        winRate: metrics.winRate,
        profitFactor: metrics.profitFactor,
        maxDrawdown: metrics.maxDrawdown,
        returnPercentage: metrics.returnPercentage,
      },
      'Backtest finished',
    );
    return { metrics, trades, equityCurve, bars: timeline.length };
  }

  private async markToMarket(state: TradingState, provider: BacktestExecutor): Promise<number> {
    let equity = state.risk.currentBalance;
    for (const position of Object.values(state.positions)) {
      const ticker = await provider.getTicker(position.symbol);
      equity += (ticker.price - position.entryPrice) * position.size * directionSign(position.direction);
    }
    return equity;
  }
}

export const formatBacktestReport = (result: BacktestResult, initialBalance: number): string => {
  const m = result.metrics;
  const line = '='.repeat(60);
  return [
    line,
    'BACKTEST RESULTS',
    line,
    `   Bars replayed: ${result.bars}`,
    `   Initial Capital: $${initialBalance.toFixed(2)}`,
    `   Final Balance: $${m.finalBalance.toFixed(2)}`,
    `   Total Return: ${m.returnPercentage.toFixed(2)}%`,
    `   Win Rate: ${(m.winRate * 100).toFixed(2)}%`,
    `   Max Drawdown: ${(m.maxDrawdown * 100).toFixed(2)}%`,
    `   Profit Factor: ${m.profitFactor.toFixed(2)}`,
    `   Sharpe Ratio: ${m.sharpeRatio.toFixed(2)}`,
    `   Total Trades: ${m.totalTrades} (W: ${m.wins} L: ${m.losses})`,
    line,
  ].join('\n');
};
