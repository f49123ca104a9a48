import type { ExecutionProvider } from '../ExecutionProvider';
import type { MarketDataEngine } from '../MarketDataEngine';
import type { OHLCV, SymbolMeta, Ticker, Timeframe } from '../../types/market';
import type { OrderRequest, OrderResult } from '../../types/trading';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

/** Live market data, simulated fills at the current ticker price. */
export class PaperExecutor implements ExecutionProvider {
  public readonly name = 'paper';
  private orderSeq = 0;

  constructor(
    private readonly market: MarketDataEngine,
    private readonly clock: () => number = Date.now,
  ) {}

  public now(): number {
    return this.clock();
  }

  public getCandles(symbol: string, timeframe: Timeframe, limit: number): Promise<OHLCV[]> {
    return this.market.getCandles(symbol, timeframe, limit);
  }

  public getTicker(symbol: string): Promise<Ticker> {
    return this.market.getTicker(symbol);
  }

  public async placeOrder(order: OrderRequest): Promise<OrderResult> {
    try {
      const ticker = await this.market.getTicker(order.symbol);
      this.orderSeq += 1;
      const fill = {
        price: ticker.price,
        size: order.size,
        timestamp: this.clock(),
        orderId: `paper-${this.orderSeq}`,
      };
      logger.info({ symbol: order.symbol, direction: order.direction, ...fill }, '[PAPER] Order filled');
      return { ok: true, fill };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }

  public getSymbolMeta(symbol: string): Promise<SymbolMeta | null> {
    return this.market.getSymbolMeta(symbol);
  }

  public async getBalance(): Promise<number | null> {
    return null;
  }

  public async getPositionSize(): Promise<number | null> {
    return null;
  }
}
