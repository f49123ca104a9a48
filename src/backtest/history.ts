import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { DAY_MS, TIMEFRAME_MS } from '../config/constants';
import type { MarketDataEngine } from '../engine/MarketDataEngine';
import type { OHLCV, Timeframe } from '../types/market';
import { DataUnavailableError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const candleFileSchema = z.array(
  z.object({
    timestamp: z.number(),
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    volume: z.number().default(0),
  }),
);

/** Bars needed to cover `days` of history plus MACD warm-up. */
export const historyLimit = (days: number, timeframe: Timeframe): number =>
  Math.ceil((days * DAY_MS) / TIMEFRAME_MS[timeframe]) + 50;

/** Reads `<dir>/<SYMBOL>.json`, an array of OHLCV objects with millisecond open times. */
export const loadHistoryFromDir = async (dir: string, symbols: string[]): Promise<Record<string, OHLCV[]>> => {
  const history: Record<string, OHLCV[]> = {};
  for (const symbol of symbols) {
    const file = path.join(dir, `${symbol}.json`);
    let json: unknown;
    try {
      json = JSON.parse(await fs.readFile(file, 'utf8'));
    } catch (error) {
      throw new DataUnavailableError(symbol, `Cannot read candles from ${file}: ${errorMessage(error)}`, { cause: error });
    }
    const parsed = candleFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new DataUnavailableError(symbol, `Invalid candle file ${file}: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    history[symbol] = parsed.data;
    logger.info({ symbol, bars: parsed.data.length, file }, 'Loaded backtest candles');
  }
  return history;
};

export const fetchHistory = async (
  market: MarketDataEngine,
  symbols: string[],
  timeframe: Timeframe,
  days: number,
): Promise<Record<string, OHLCV[]>> => {
  const limit = historyLimit(days, timeframe);
  const history: Record<string, OHLCV[]> = {};
  for (const symbol of symbols) {
    logger.info({ symbol, timeframe, limit }, 'Fetching backtest candles');
    history[symbol] = await market.getCandles(symbol, timeframe, limit);
  }
  return history;
};
