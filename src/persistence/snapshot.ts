import { z } from 'zod';
import { STATE_SNAPSHOT_VERSION } from '../config/constants';
import type { TradingState } from '../types/trading';

const direction = z.enum(['bullish', 'bearish']);

const gapSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  direction,
  top: z.number(),
  bottom: z.number(),
  createdAt: z.number(),
  createdIndex: z.number().int(),
  status: z.enum(['active', 'filled', 'expired']),
  fillCount: z.number().int().min(0).max(1),
  filledAt: z.number().optional(),
  expiredAt: z.number().optional(),
  evictedAt: z.number().optional(),
});

const gapBookSchema = z.object({
  active: z.array(gapSchema),
  retired: z.array(gapSchema),
  lastBarTime: z.number().nullable(),
  barCount: z.number().int().min(0),
});

const positionSchema = z.object({
  id: z.string(),
  symbol: z.string(),
  direction,
  entryPrice: z.number(),
  size: z.number(),
  stopLoss: z.number(),
  initialStopLoss: z.number(),
  takeProfit: z.number(),
  openedAt: z.number(),
  status: z.enum(['open', 'closed']),
  realizedPnl: z.number(),
  gapId: z.string(),
  bestPrice: z.number(),
  exitPrice: z.number().optional(),
  exitReason: z.enum(['stop_loss', 'take_profit', 'trailing_stop', 'manual']).optional(),
  closedAt: z.number().optional(),
});

const riskStateSchema = z.object({
  dayStartBalance: z.number(),
  dayStartedAt: z.number(),
  currentBalance: z.number(),
  dailyLossGuardTriggered: z.boolean(),
  portfolioPositionCount: z.number().int().min(0),
  symbolsWithPosition: z.array(z.string()),
});

export const snapshotSchema = z.object({
  version: z.literal(STATE_SNAPSHOT_VERSION),
  savedAt: z.number(),
  gaps: z.record(gapBookSchema),
  positions: z.record(positionSchema),
  closed: z.array(positionSchema),
  risk: riskStateSchema,
});

export type Snapshot = z.infer<typeof snapshotSchema>;

export const toSnapshot = (state: TradingState, savedAt: number): Snapshot => ({
  version: STATE_SNAPSHOT_VERSION,
  savedAt,
  gaps: state.gaps,
  positions: state.positions,
  closed: state.closed,
  risk: state.risk,
});

export const fromSnapshot = (snapshot: Snapshot): TradingState => ({
  gaps: snapshot.gaps,
  positions: snapshot.positions,
  closed: snapshot.closed,
  risk: snapshot.risk,
});

/** Deep copy through the wire format, so stored state never aliases live state. */
export const cloneState = (state: TradingState): TradingState => {
  const copy: unknown = JSON.parse(JSON.stringify(toSnapshot(state, 0)));
  return fromSnapshot(snapshotSchema.parse(copy));
};
