import type { ExecutionProvider } from '../ExecutionProvider';
import { TIMEFRAME_MS } from '../../config/constants';
import type { OHLCV, SymbolMeta, Ticker, Timeframe } from '../../types/market';
import type { OrderRequest, OrderResult } from '../../types/trading';
import { DataUnavailableError } from '../../utils/errors';

/**
 * Replays recorded candles. The clock only moves through {@link advanceTo};
 * at any instant the provider exposes exactly the bars closed by then, so
 * the engine cannot see the future.
 */
export class BacktestExecutor implements ExecutionProvider {
  public readonly name = 'backtest';
  private readonly history: Map<string, OHLCV[]>;
  private readonly intervalMs: number;
  private clock = 0;
  private orderSeq = 0;

  constructor(
    history: Record<string, OHLCV[]>,
    timeframe: Timeframe,
    private readonly meta: Record<string, SymbolMeta> = {},
  ) {
    this.intervalMs = TIMEFRAME_MS[timeframe];
    this.history = new Map(
      Object.entries(history).map(([symbol, bars]) => [symbol, [...bars].sort((a, b) => a.timestamp - b.timestamp)]),
    );
  }

  /** Distinct bar close times across all symbols, ascending. */
  public timeline(): number[] {
    const times = new Set<number>();
    for (const bars of this.history.values()) {
      for (const bar of bars) times.add(bar.timestamp + this.intervalMs);
    }
    return [...times].sort((a, b) => a - b);
  }

  public advanceTo(time: number): void {
    if (time < this.clock) {
      throw new Error(`Backtest clock cannot move backwards (${time} < ${this.clock})`);
    }
    this.clock = time;
  }

  public now(): number {
    return this.clock;
  }

  public async getCandles(symbol: string, _timeframe: Timeframe, limit: number): Promise<OHLCV[]> {
    if (!this.history.has(symbol)) throw new DataUnavailableError(symbol, `No history loaded for ${symbol}`);
    return this.closedBars(symbol).slice(-limit);
  }

  /**
   * The latest closed bar, stamped with its own close time. When the symbol
   * has no bar since the last check the timestamp does not move, so the same
   * bar is never managed twice.
   */
  public async getTicker(symbol: string): Promise<Ticker> {
    const closed = this.closedBars(symbol);
    const bar = closed[closed.length - 1];
    if (!bar) throw new DataUnavailableError(symbol, `No closed bar for ${symbol} at ${this.clock}`);
    return {
      symbol,
      price: bar.close,
      timestamp: bar.timestamp + this.intervalMs,
      bar: { open: bar.open, high: bar.high, low: bar.low },
    };
  }

  public async placeOrder(order: OrderRequest): Promise<OrderResult> {
    const closed = this.closedBars(order.symbol);
    const bar = closed[closed.length - 1];
    if (!bar) return { ok: false, error: `No price for ${order.symbol}` };
    this.orderSeq += 1;
    return {
      ok: true,
      fill: { price: bar.close, size: order.size, timestamp: this.clock, orderId: `bt-${this.orderSeq}` },
    };
  }

  public async getSymbolMeta(symbol: string): Promise<SymbolMeta | null> {
    return this.meta[symbol] ?? null;
  }

  public async getBalance(): Promise<number | null> {
    return null;
  }

  public async getPositionSize(): Promise<number | null> {
    return null;
  }

  private closedBars(symbol: string): OHLCV[] {
    const bars = this.history.get(symbol) ?? [];
    return bars.filter((b) => b.timestamp + this.intervalMs <= this.clock);
  }
}
