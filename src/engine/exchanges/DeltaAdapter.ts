import type { ExchangeAdapter } from '../ExchangeAdapter';
import { TIMEFRAME_MS } from '../../config/constants';
import type { OHLCV, SymbolMeta, Ticker, Timeframe } from '../../types/market';
import type { Fill, OrderRequest } from '../../types/trading';
import { ExecutionError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { DeltaApiClient } from '../../client/DeltaApiClient';

type Numeric = string | number;

interface DeltaCandle {
  time: number; // seconds
  open: Numeric;
  high: Numeric;
  low: Numeric;
  close: Numeric;
  volume: Numeric;
}

interface DeltaTicker {
  symbol: string;
  close?: Numeric;
  mark_price?: Numeric;
  timestamp?: number; // microseconds
}

interface DeltaProduct {
  id: number;
  symbol: string;
  contract_value: Numeric;
  tick_size: Numeric;
}

interface DeltaOrder {
  id: number;
  size: number;
  unfilled_size: number;
  average_fill_price: Numeric | null;
  state: string;
  created_at?: string;
}

interface DeltaPosition {
  size: number; // contracts, negative when short
  entry_price?: Numeric | null;
}

interface DeltaWalletBalance {
  asset_symbol: string;
  balance: Numeric;
  available_balance?: Numeric;
}

const SETTLEMENT_ASSETS = ['USD', 'USDT'];

export class DeltaAdapter implements ExchangeAdapter {
  public name = 'Delta';
  private client: DeltaApiClient;
  private products = new Map<string, DeltaProduct>();

  constructor(client: DeltaApiClient = new DeltaApiClient()) {
    this.client = client;
  }

  public async fetchCandles(symbol: string, timeframe: Timeframe, limit: number = 100): Promise<OHLCV[]> {
    const resolutionSeconds = TIMEFRAME_MS[timeframe] / 1000;
    const endTime = Math.floor(Date.now() / 1000);
    const startTime = endTime - limit * resolutionSeconds;

    const result = await this.client.get<DeltaCandle[]>('/v2/history/candles', {
      symbol: symbol.toUpperCase(),
      resolution: timeframe,
      start: startTime,
      end: endTime,
    });

    const candles = result.map((c) => ({
      timestamp: c.time * 1000,
      open: Number(c.open),
      high: Number(c.high),
      low: Number(c.low),
      close: Number(c.close),
      volume: Number(c.volume),
    }));

    return candles.sort((a, b) => a.timestamp - b.timestamp);
  }

  public async fetchTicker(symbol: string): Promise<Ticker> {
    const ticker = await this.client.get<DeltaTicker>(`/v2/tickers/${symbol.toUpperCase()}`);
    const price = Number(ticker.close ?? ticker.mark_price);
    if (!Number.isFinite(price) || price <= 0) {
      throw new Error(`Ticker for ${symbol} has no usable price`);
    }
    return {
      symbol,
      price,
      timestamp: ticker.timestamp ? Math.floor(ticker.timestamp / 1000) : Date.now(),
    };
  }

  /** Sizes are expressed in base units; Delta trades whole contracts of `contract_value` each. */
  public async fetchSymbolMeta(symbol: string): Promise<SymbolMeta | null> {
    const product = await this.product(symbol);
    const contractValue = Number(product.contract_value);
    const tickSize = Number(product.tick_size);
    if (!Number.isFinite(contractValue) || contractValue <= 0) {
      logger.warn({ symbol, contract_value: product.contract_value }, 'Delta product has no contract value');
      return null;
    }
    return {
      minOrderSize: contractValue,
      sizeStep: contractValue,
      pricePrecision: decimalsOf(tickSize),
    };
  }

  public async placeMarketOrder(order: OrderRequest): Promise<Fill> {
    const product = await this.product(order.symbol);
    const contractValue = Number(product.contract_value);
    const contracts = Math.floor(order.size / contractValue + 1e-9);
    if (contracts < 1) {
      throw new ExecutionError(order.symbol, `Order size ${order.size} is below one contract (${contractValue})`);
    }

    const precision = decimalsOf(Number(product.tick_size));
    const placed = await this.client.post<DeltaOrder>('/v2/orders', {
      product_id: product.id,
      size: contracts,
      side: order.direction === 'bullish' ? 'buy' : 'sell',
      order_type: 'market_order',
      bracket_stop_loss_price: order.stopLoss.toFixed(precision),
      bracket_take_profit_price: order.takeProfit.toFixed(precision),
    });

    const filledContracts = placed.size - placed.unfilled_size;
    const price = Number(placed.average_fill_price);
    if (filledContracts <= 0 || !Number.isFinite(price) || price <= 0) {
      throw new ExecutionError(order.symbol, `Order ${placed.id} not filled (state: ${placed.state})`);
    }

    logger.info({ orderId: placed.id, symbol: order.symbol, contracts, filledContracts }, 'Delta market order filled');
    return {
      price,
      size: filledContracts * contractValue,
      timestamp: placed.created_at ? Date.parse(placed.created_at) : Date.now(),
      orderId: String(placed.id),
    };
  }

  public async fetchBalance(): Promise<number> {
    const balances = await this.client.get<DeltaWalletBalance[]>('/v2/wallet/balances', {}, true);
    const settlement = balances.find((b) => SETTLEMENT_ASSETS.includes(b.asset_symbol));
    if (!settlement) {
      throw new Error('No USD/USDT wallet balance reported');
    }
    return Number(settlement.balance);
  }

  public async fetchPositionSize(symbol: string): Promise<number> {
    const product = await this.product(symbol);
    const position = await this.client.get<DeltaPosition>('/v2/positions', { product_id: product.id }, true);
    return Math.abs(Number(position.size)) * Number(product.contract_value);
  }

  private async product(symbol: string): Promise<DeltaProduct> {
    const key = symbol.toUpperCase();
    const cached = this.products.get(key);
    if (cached) return cached;
    const product = await this.client.get<DeltaProduct>(`/v2/products/${key}`);
    this.products.set(key, product);
    return product;
  }
}

const decimalsOf = (step: number): number => {
  if (!Number.isFinite(step) || step <= 0 || step >= 1) return 0;
  return Math.max(0, Math.ceil(-Math.log10(step) - 1e-9));
};
