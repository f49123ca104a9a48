import type { BotConfig } from '../config/BotConfig';
import { CandleSeries } from '../analysis/CandleSeries';
import { FVGDetector, emptyGapBook } from '../analysis/FVGDetector';
import { calculateMACD } from '../analysis/indicators';
import { RiskManager } from '../execution/RiskManager';
import { PositionManager, observationFromTicker, type PriceObservation } from '../execution/PositionManager';
import type { StateStore } from '../persistence/StateStore';
import { cloneState } from '../persistence/snapshot';
import type { OHLCV } from '../types/market';
import type { Position, Rejection, Signal, TradingState } from '../types/trading';
import { errorMessage } from '../utils/errors';
import { type EventSink, PinoEventSink } from '../utils/eventSink';
import { logger } from '../utils/logger';
import type { ExecutionProvider } from './ExecutionProvider';
import { SignalEvaluator } from './SignalEvaluator';

export interface TradingEngineDeps {
  config: BotConfig;
  provider: ExecutionProvider;
  store: StateStore;
  events?: EventSink;
}

export type SkipReason = 'data_unavailable' | 'insufficient_data' | 'no_new_bar' | 'error';

export interface TickReport {
  at: number;
  aborted: boolean;
  processed: string[];
  skipped: { symbol: string; reason: SkipReason }[];
  signals: Signal[];
  rejections: Rejection[];
  opened: Position[];
  closed: Position[];
  balance: number;
}

export const initialTradingState = (balance: number, now: number): TradingState => ({
  gaps: {},
  positions: {},
  closed: [],
  risk: RiskManager.initialRiskState(balance, now),
});

/**
 * One tick: housekeeping, manage open positions, then scan each symbol in
 * configured order. Every state mutation is followed by a save, so a tick
 * aborted between symbols resumes without duplicating or losing anything.
 */
export class TradingEngine {
  private readonly config: BotConfig;
  private readonly provider: ExecutionProvider;
  private readonly store: StateStore;
  private readonly events: EventSink;
  private readonly detector: FVGDetector;
  private readonly evaluator: SignalEvaluator;
  private readonly riskManager: RiskManager;
  private readonly positions: PositionManager;
  private pendingSave = false;

  private constructor(
    deps: TradingEngineDeps,
    private state: TradingState,
  ) {
    const { config } = deps;
    this.config = config;
    this.provider = deps.provider;
    this.store = deps.store;
    this.events = deps.events ?? new PinoEventSink();
    this.detector = new FVGDetector({
      maxAgeBars: config.strategy.maxGapAgeBars,
      retainRetired: config.strategy.retainRetiredGaps,
    });
    this.evaluator = new SignalEvaluator({
      rewardRiskRatio: config.risk.rewardRiskRatio,
      stopBufferPct: config.risk.stopBufferPct,
      requireRecentCrossover: config.strategy.requireRecentCrossover,
      crossoverLookback: config.strategy.crossoverLookback,
      macd: config.macd,
    });
    this.riskManager = new RiskManager(config.risk);
    this.positions = new PositionManager({
      rewardRiskRatio: config.risk.rewardRiskRatio,
      trailing: config.risk.trailing,
      closedHistoryLimit: config.closedHistoryLimit,
    });
  }

  /** Loads persisted state, or starts flat. A store that cannot be read is fatal and propagates. */
  public static async create(deps: TradingEngineDeps): Promise<TradingEngine> {
    const loaded = await deps.store.load();
    if (loaded) {
      logger.info(
        { positions: Object.keys(loaded.positions), balance: loaded.risk.currentBalance },
        'Resumed persisted trading state',
      );
      return new TradingEngine(deps, loaded);
    }
    logger.info({ balance: deps.config.startingBalance, mode: deps.provider.name }, 'Starting with fresh trading state');
    return new TradingEngine(deps, initialTradingState(deps.config.startingBalance, deps.provider.now()));
  }

  public getState(): TradingState {
    return cloneState(this.state);
  }

  public hasPendingSave(): boolean {
    return this.pendingSave;
  }

  public async runTick(abort?: AbortSignal): Promise<TickReport> {
    const now = this.provider.now();
    const report: TickReport = {
      at: now,
      aborted: false,
      processed: [],
      skipped: [],
      signals: [],
      rejections: [],
      opened: [],
      closed: [],
      balance: this.state.risk.currentBalance,
    };

    if (this.pendingSave) await this.persist();

    if (this.riskManager.rollDay(this.state.risk, now)) {
      this.events.record('daily_reset', {
        dayStartBalance: this.state.risk.dayStartBalance,
        dayStartedAt: this.state.risk.dayStartedAt,
      });
      await this.persist();
    }

    await this.syncBalance();
    await this.manageOpenPositions(report);

    for (const symbol of this.config.symbols) {
      if (abort?.aborted) {
        report.aborted = true;
        logger.warn({ remaining: this.config.symbols.slice(report.processed.length) }, 'Tick aborted');
        break;
      }
      try {
        await this.processSymbol(symbol, now, report);
      } catch (error) {
        // Unexpected failure for one symbol; the others still run.
        logger.error({ symbol, error: errorMessage(error) }, 'Symbol processing failed');
        report.skipped.push({ symbol, reason: 'error' });
      }
      report.processed.push(symbol);
    }

    report.balance = this.state.risk.currentBalance;
    return report;
  }

  /** Closes every open position at the latest price. Used at the end of a backtest. */
  public async closeAll(): Promise<Position[]> {
    const closed: Position[] = [];
    for (const symbol of Object.keys(this.state.positions).sort()) {
      const ticker = await this.provider.getTicker(symbol);
      const position = this.positions.forceClose(this.state, symbol, ticker.price, this.provider.now());
      if (!position) continue;
      closed.push(position);
      this.recordClose(position);
      await this.persist();
    }
    return closed;
  }

  private async syncBalance(): Promise<void> {
    const balance = await this.provider.getBalance();
    if (balance === null || balance === this.state.risk.currentBalance) return;
    logger.info({ from: this.state.risk.currentBalance, to: balance }, 'Balance synced from exchange');
    this.state.risk.currentBalance = balance;
    this.events.record('pnl_updated', { balance, source: 'exchange' });
    await this.persist();
  }

  private async manageOpenPositions(report: TickReport): Promise<void> {
    for (const symbol of Object.keys(this.state.positions).sort()) {
      const position = this.positions.getOpen(this.state, symbol);
      if (!position) continue;

      let held: number | null;
      let observation: PriceObservation;
      try {
        held = await this.provider.getPositionSize(symbol);
        observation = observationFromTicker(await this.provider.getTicker(symbol));
      } catch (error) {
        this.events.record('data_unavailable', { symbol, stage: 'manage', error: errorMessage(error) });
        continue;
      }

      // The exchange runs the brackets; the local book only follows it.
      if (held !== null) {
        if (held > 0) continue;
        const settled = this.positions.settle(this.state, symbol, observation.close, this.provider.now());
        if (settled) {
          report.closed.push(settled);
          this.recordClose(settled);
          await this.persist();
        }
        continue;
      }

      const bestBefore = position.bestPrice;
      const outcome = this.positions.manage(this.state, symbol, observation);
      if (outcome.closed) {
        report.closed.push(outcome.closed);
        this.recordClose(outcome.closed);
      } else if (outcome.trailedTo !== null) {
        this.events.record('stop_trailed', { symbol, positionId: position.id, stopLoss: outcome.trailedTo });
      }
      if (outcome.closed || outcome.trailedTo !== null || position.bestPrice !== bestBefore) {
        await this.persist();
      }
    }
  }

  private async processSymbol(symbol: string, now: number, report: TickReport): Promise<void> {
    const { timeframe, candleLimit } = this.config;

    let raw: OHLCV[];
    try {
      raw = await this.provider.getCandles(symbol, timeframe, candleLimit);
    } catch (error) {
      this.events.record('data_unavailable', { symbol, stage: 'candles', error: errorMessage(error) });
      report.skipped.push({ symbol, reason: 'data_unavailable' });
      return;
    }

    const series = CandleSeries.from(raw, timeframe, now);
    const latest = series.last();
    const book = this.state.gaps[symbol] ?? emptyGapBook();

    if (!latest) {
      this.events.record('insufficient_data', { symbol, bars: 0 });
      report.skipped.push({ symbol, reason: 'insufficient_data' });
      return;
    }
    // Already processed this bar: re-running a tick is a no-op.
    if (book.lastBarTime !== null && latest.timestamp <= book.lastBarTime) {
      report.skipped.push({ symbol, reason: 'no_new_bar' });
      return;
    }

    const closes = series.closes();
    const macd = calculateMACD(closes, this.config.macd);
    if (!macd) {
      this.events.record('insufficient_data', {
        symbol,
        bars: series.length,
        required: this.config.macd.slow + this.config.macd.signal,
      });
      report.skipped.push({ symbol, reason: 'insufficient_data' });
      return;
    }

    const update = this.detector.update(book, symbol, series);
    this.state.gaps[symbol] = book;
    for (const gap of update.created) {
      this.events.record('gap_created', { symbol, gapId: gap.id, direction: gap.direction, top: gap.top, bottom: gap.bottom });
    }
    for (const gap of update.retired) {
      this.events.record('gap_retired', { symbol, gapId: gap.id, status: gap.status, evicted: gap.evictedAt !== undefined });
    }

    const evaluation = this.evaluator.evaluate(symbol, update.active, latest, macd, {
      hasOpenPosition: this.positions.getOpen(this.state, symbol) !== null,
      closes,
    });

    // A touch is spent whatever the evaluator decided.
    for (const gap of evaluation.touched) {
      const consumed = this.detector.consumeTouch(book, gap.id, latest.timestamp);
      if (consumed) this.events.record('gap_retired', { symbol, gapId: consumed.id, status: consumed.status, evicted: false });
    }
    for (const rejection of evaluation.rejections) this.reject(rejection, report);
    await this.persist();

    const signal = evaluation.signal;
    if (!signal) return;
    report.signals.push(signal);
    this.events.record('signal_confirmed', {
      symbol,
      gapId: signal.gapId,
      direction: signal.direction,
      entryPrice: signal.entryPrice,
      stopLoss: signal.stopLoss,
      takeProfit: signal.takeProfit,
      histogram: signal.macd.histogram,
    });

    const meta = await this.provider.getSymbolMeta(symbol);
    const sizing = this.riskManager.size(signal, this.state, meta);
    if (!sizing.ok) {
      this.reject({ symbol, gapId: signal.gapId, reason: sizing.reason, detail: sizing.detail }, report);
      // The daily-loss guard latches inside size().
      await this.persist();
      return;
    }

    const entry: Signal = { ...signal, stopLoss: sizing.stopLoss, takeProfit: sizing.takeProfit };
    const result = await this.provider.placeOrder({
      symbol,
      direction: entry.direction,
      size: sizing.size,
      stopLoss: entry.stopLoss,
      takeProfit: entry.takeProfit,
    });
    if (!result.ok) {
      const rejection: Rejection = { symbol, gapId: signal.gapId, reason: 'execution_failed', detail: { error: result.error } };
      report.rejections.push(rejection);
      this.events.record('execution_failed', { symbol, gapId: signal.gapId, size: sizing.size, error: result.error });
      return;
    }

    const position = this.positions.open(this.state, entry, result.fill);
    report.opened.push(position);
    this.events.record('order_filled', {
      symbol,
      positionId: position.id,
      direction: position.direction,
      entryPrice: position.entryPrice,
      size: position.size,
      stopLoss: position.stopLoss,
      takeProfit: position.takeProfit,
      riskAmount: sizing.riskAmount,
      leverageCapped: sizing.leverageCapped,
      orderId: result.fill.orderId,
    });
    await this.persist();
  }

  private reject(rejection: Rejection, report: TickReport): void {
    report.rejections.push(rejection);
    this.events.record('signal_rejected', { ...rejection });
  }

  private recordClose(position: Position): void {
    this.events.record('position_closed', {
      symbol: position.symbol,
      positionId: position.id,
      exitReason: position.exitReason,
      exitPrice: position.exitPrice,
      realizedPnl: position.realizedPnl,
    });
    this.events.record('pnl_updated', { balance: this.state.risk.currentBalance, source: 'ledger' });
  }

  /** Never throws: a failed save is retried at the start of the next tick. */
  private async persist(): Promise<void> {
    try {
      await this.store.save(this.state);
      if (this.pendingSave) {
        this.pendingSave = false;
        this.events.record('state_save_recovered', {});
      }
    } catch (error) {
      this.pendingSave = true;
      this.events.record('state_save_failed', { error: errorMessage(error) });
    }
  }
}
