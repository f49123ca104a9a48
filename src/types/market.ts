export type Timeframe = '1m' | '5m' | '15m' | '1h' | '4h' | '1d';

export interface OHLCV {
  timestamp: number; // bar open time, ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Ticker {
  symbol: string;
  price: number;
  timestamp: number;
  // Present when the observation spans a whole bar (backtests).
  bar?: Pick<OHLCV, 'open' | 'high' | 'low'>;
}

export interface SymbolMeta {
  minOrderSize: number;
  sizeStep: number;
  pricePrecision: number;
  minNotional?: number;
}
