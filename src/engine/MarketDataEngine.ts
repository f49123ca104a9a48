import type { ExchangeAdapter } from './ExchangeAdapter';
import { DeltaAdapter } from './exchanges/DeltaAdapter';
import type { OHLCV, SymbolMeta, Ticker, Timeframe } from '../types/market';
import { DataUnavailableError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Market data front for the executors: a short-lived candle cache plus
 * retry with linear backoff. After the last retry the failure surfaces as a
 * DataUnavailableError so the engine skips the symbol for the tick.
 */
export class MarketDataEngine {
  private adapter: ExchangeAdapter;
  private cache: Map<string, { data: OHLCV[]; timestamp: number }>;
  private metaCache: Map<string, SymbolMeta | null>;
  private readonly CACHE_TTL = 10000; // 10 seconds default for forming candles
  private readonly retry: RetryPolicy;

  constructor(adapter: ExchangeAdapter = new DeltaAdapter(), retry: RetryPolicy = { maxRetries: 3, baseDelayMs: 2000 }) {
    this.adapter = adapter;
    this.retry = retry;
    this.cache = new Map();
    this.metaCache = new Map();
  }

  public get exchange(): ExchangeAdapter {
    return this.adapter;
  }

  public async getCandles(symbol: string, timeframe: Timeframe, limit: number = 100): Promise<OHLCV[]> {
    const key = `${this.adapter.name}:${symbol}:${timeframe}:${limit}`;
    const cached = this.cache.get(key);
    const now = Date.now();

    if (cached && now - cached.timestamp < this.CACHE_TTL) {
      logger.debug({ symbol, timeframe }, 'Returning cached market data');
      return cached.data;
    }

    const data = await this.withRetry(symbol, 'candles', () => this.adapter.fetchCandles(symbol, timeframe, limit));
    this.cache.set(key, { data, timestamp: now });
    return data;
  }

  public async getTicker(symbol: string): Promise<Ticker> {
    return this.withRetry(symbol, 'ticker', () => this.adapter.fetchTicker(symbol));
  }

  /** Null means "unknown minimum"; callers fall back to conservative defaults. */
  public async getSymbolMeta(symbol: string): Promise<SymbolMeta | null> {
    if (this.metaCache.has(symbol)) return this.metaCache.get(symbol) ?? null;
    try {
      const meta = await this.adapter.fetchSymbolMeta(symbol);
      this.metaCache.set(symbol, meta);
      return meta;
    } catch (error) {
      logger.warn({ symbol, error: errorMessage(error) }, 'Symbol metadata unavailable, using defaults');
      return null;
    }
  }

  private async withRetry<T>(symbol: string, what: string, fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (attempt >= this.retry.maxRetries) {
          logger.error({ symbol, what, attempts: attempt + 1, error: errorMessage(error) }, 'Market data fetch failed');
          throw new DataUnavailableError(symbol, `${what} unavailable for ${symbol}: ${errorMessage(error)}`, {
            cause: error,
          });
        }
        const delay = this.retry.baseDelayMs * (attempt + 1);
        logger.warn({ symbol, what, retryCount: attempt + 1, delay }, 'Market data fetch failed, retrying...');
        await sleep(delay);
      }
    }
  }
}
