import type { OHLCV, SymbolMeta, Ticker, Timeframe } from '../types/market';
import type { OrderRequest, OrderResult } from '../types/trading';

export type ExecutionMode = 'paper' | 'live' | 'backtest';

/**
 * Everything the trading engine needs from the outside world. One
 * implementation is chosen at startup; the engine never branches on mode.
 */
export interface ExecutionProvider {
  readonly name: ExecutionMode;
  now(): number;
  getCandles(symbol: string, timeframe: Timeframe, limit: number): Promise<OHLCV[]>;
  getTicker(symbol: string): Promise<Ticker>;
  /** Failures come back as `{ ok: false }`; this never throws. */
  placeOrder(order: OrderRequest): Promise<OrderResult>;
  getSymbolMeta(symbol: string): Promise<SymbolMeta | null>;
  /** Exchange-reported balance, or null when the engine's own ledger is authoritative. */
  getBalance(): Promise<number | null>;
  /**
   * Size the exchange still holds for the symbol, or null when the engine
   * simulates exits itself. A number means the exchange owns the exits.
   */
  getPositionSize(symbol: string): Promise<number | null>;
}
