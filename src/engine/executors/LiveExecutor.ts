import type { ExecutionProvider } from '../ExecutionProvider';
import type { MarketDataEngine } from '../MarketDataEngine';
import type { OHLCV, SymbolMeta, Ticker, Timeframe } from '../../types/market';
import type { OrderRequest, OrderResult } from '../../types/trading';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

/** Real orders through the exchange adapter behind the market data engine. */
export class LiveExecutor implements ExecutionProvider {
  public readonly name = 'live';

  constructor(private readonly market: MarketDataEngine) {}

  public now(): number {
    return Date.now();
  }

  public getCandles(symbol: string, timeframe: Timeframe, limit: number): Promise<OHLCV[]> {
    return this.market.getCandles(symbol, timeframe, limit);
  }

  public getTicker(symbol: string): Promise<Ticker> {
    return this.market.getTicker(symbol);
  }

  public async placeOrder(order: OrderRequest): Promise<OrderResult> {
    try {
      const fill = await this.market.exchange.placeMarketOrder(order);
      return { ok: true, fill };
    } catch (error) {
      logger.error({ symbol: order.symbol, error: errorMessage(error) }, 'Live order rejected');
      return { ok: false, error: errorMessage(error) };
    }
  }

  public getSymbolMeta(symbol: string): Promise<SymbolMeta | null> {
    return this.market.getSymbolMeta(symbol);
  }

  public async getBalance(): Promise<number | null> {
    try {
      return await this.market.exchange.fetchBalance();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Balance unavailable, keeping local ledger');
      return null;
    }
  }

  /** Throws when the exchange cannot be asked; the engine then leaves the position alone for the tick. */
  public getPositionSize(symbol: string): Promise<number | null> {
    return this.market.exchange.fetchPositionSize(symbol);
  }
}
