import type { OHLCV, SymbolMeta, Ticker, Timeframe } from '../types/market';
import type { Fill, OrderRequest } from '../types/trading';

export interface ExchangeAdapter {
  name: string;
  fetchCandles(symbol: string, timeframe: Timeframe, limit?: number): Promise<OHLCV[]>;
  fetchTicker(symbol: string): Promise<Ticker>;
  fetchSymbolMeta(symbol: string): Promise<SymbolMeta | null>;
  /** Signed endpoints; only the live executor calls these. */
  placeMarketOrder(order: OrderRequest): Promise<Fill>;
  fetchBalance(): Promise<number>;
  /** Open size in base units, 0 when flat. */
  fetchPositionSize(symbol: string): Promise<number>;
}
