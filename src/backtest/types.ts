import type { ExitReason, GapDirection } from '../types/trading';

export interface CompletedTrade {
  symbol: string;
  direction: GapDirection;
  entryPrice: number;
  exitPrice: number;
  entryTime: number;
  exitTime: number;
  size: number;
  netProfit: number;
  exitReason: ExitReason;
  holdDuration: number;
}

export interface BacktestMetrics {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number; // 0-1
  profitFactor: number;
  maxDrawdown: number; // 0-1, from the equity curve
  sharpeRatio: number;
  expectancy: number; // average net profit per trade
  grossProfit: number;
  grossLoss: number;
  finalBalance: number;
  returnPercentage: number;
}

export interface EquityPoint {
  timestamp: number;
  equity: number;
}

export interface BacktestResult {
  metrics: BacktestMetrics;
  trades: CompletedTrade[];
  equityCurve: EquityPoint[];
  bars: number;
}
