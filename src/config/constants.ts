import type { Timeframe } from '../types/market';

// Hard invariants of the gap tracker and risk layer. Tunables live in BotConfig.
export const MAX_ACTIVE_GAPS_PER_SYMBOL = 3;
export const MAX_OPEN_POSITIONS_PER_SYMBOL = 1;
export const STATE_SNAPSHOT_VERSION = 1;

export const TIMEFRAME_MS: Record<Timeframe, number> = {
  '1m': 60_000,
  '5m': 300_000,
  '15m': 900_000,
  '1h': 3_600_000,
  '4h': 14_400_000,
  '1d': 86_400_000,
};

export const DAY_MS = 86_400_000;
