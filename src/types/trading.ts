export type GapDirection = 'bullish' | 'bearish';
export type GapStatus = 'active' | 'filled' | 'expired';

export interface FairValueGap {
  id: string;
  symbol: string;
  direction: GapDirection;
  top: number;
  bottom: number;
  createdAt: number; // open time of the third candle
  createdIndex: number; // bar sequence number within the symbol's book
  status: GapStatus;
  fillCount: number;
  filledAt?: number;
  expiredAt?: number;
  evictedAt?: number;
}

/**
 * Per-symbol gap state. `barCount` and `lastBarTime` make the detector
 * forward-only: bars at or before `lastBarTime` are never visited again.
 */
export interface GapBook {
  active: FairValueGap[];
  retired: FairValueGap[];
  lastBarTime: number | null;
  barCount: number;
}

export type MacdState = 'confirmed' | 'pending' | 'rejected';

export interface MacdSnapshot {
  macd: number;
  signalLine: number;
  histogram: number;
}

export interface Signal {
  symbol: string;
  direction: GapDirection;
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  gapId: string;
  macdState: MacdState;
  macd: MacdSnapshot;
  timestamp: number;
}

export type RejectReason =
  | 'open_position'
  | 'superseded'
  | 'macd_disagreement'
  | 'already_filled'
  | 'invalid_stop'
  | 'below_min_size'
  | 'max_positions'
  | 'daily_loss_guard'
  | 'execution_failed';

export interface Rejection {
  symbol: string;
  reason: RejectReason;
  gapId?: string;
  detail?: Record<string, unknown>;
}

export type PositionStatus = 'open' | 'closed';
export type ExitReason = 'stop_loss' | 'take_profit' | 'trailing_stop' | 'manual';

export interface Position {
  id: string;
  symbol: string;
  direction: GapDirection;
  entryPrice: number;
  size: number;
  stopLoss: number;
  initialStopLoss: number;
  takeProfit: number;
  openedAt: number;
  status: PositionStatus;
  realizedPnl: number;
  gapId: string;
  bestPrice: number;
  exitPrice?: number;
  exitReason?: ExitReason;
  closedAt?: number;
}

export interface RiskState {
  dayStartBalance: number;
  dayStartedAt: number;
  currentBalance: number;
  dailyLossGuardTriggered: boolean;
  portfolioPositionCount: number;
  symbolsWithPosition: string[];
}

/**
 * Everything the engine owns between ticks. Passed explicitly through every
 * component call; only the state store reads or writes it to disk.
 */
export interface TradingState {
  gaps: Record<string, GapBook>;
  positions: Record<string, Position>;
  closed: Position[];
  risk: RiskState;
}

export interface OrderRequest {
  symbol: string;
  direction: GapDirection;
  size: number;
  stopLoss: number;
  takeProfit: number;
}

export interface Fill {
  price: number;
  size: number;
  timestamp: number;
  orderId?: string;
}

export type OrderResult =
  | { ok: true; fill: Fill }
  | { ok: false; error: string };
