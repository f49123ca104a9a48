import { describe, expect, it } from "vitest";

import { RiskManager, floorToStep, isNewTradingDay } from "../src/execution/RiskManager";
import type { Position, Signal, TradingState } from "../src/types/trading";
import type { SymbolMeta } from "../src/types/market";

const NOW = Date.UTC(2024, 0, 1, 12);
const META: SymbolMeta = { minOrderSize: 0.1, sizeStep: 0.1, pricePrecision: 2 };

function state(balance = 1000): TradingState {
  return { gaps: {}, positions: {}, closed: [], risk: RiskManager.initialRiskState(balance, NOW) };
}

function signal(overrides: Partial<Signal> = {}): Signal {
  return {
    symbol: "AAA",
    direction: "bullish",
    entryPrice: 100,
    stopLoss: 98,
    takeProfit: 104,
    gapId: "AAA:bullish:1",
    macdState: "confirmed",
    macd: { macd: 1, signalLine: 0.5, histogram: 0.5 },
    timestamp: NOW,
    ...overrides,
  };
}

function openPosition(symbol: string): Position {
  return {
    id: `pos:${symbol}`,
    symbol,
    direction: "bullish",
    entryPrice: 100,
    size: 1,
    stopLoss: 98,
    initialStopLoss: 98,
    takeProfit: 104,
    openedAt: NOW,
    status: "open",
    realizedPnl: 0,
    gapId: `${symbol}:bullish:1`,
    bestPrice: 100,
  };
}

describe("RiskManager.size", () => {
  const risk = new RiskManager({ riskPerTrade: 0.01, dailyLossLimitPct: 0.05, maxOpenPositions: 5, maxLeverage: 2 });

  it("sizes 1% risk over the stop distance", () => {
    expect(risk.size(signal(), state(), META)).toEqual({
      ok: true,
      size: 5,
      riskAmount: 10,
      notional: 500,
      leverageCapped: false,
      stopLoss: 98,
      takeProfit: 104,
    });
  });

  it("widens the stop onto the price grid before sizing", () => {
    const result = risk.size(signal({ stopLoss: 97.987 }), state(), META);
    expect(result).toMatchObject({ ok: true, size: 4.9, stopLoss: 97.98, takeProfit: 104.04 });
  });

  it("widens a bearish stop upwards", () => {
    const bearish = signal({ direction: "bearish", entryPrice: 100, stopLoss: 102.001, takeProfit: 96 });
    expect(risk.size(bearish, state(), META)).toMatchObject({ ok: true, stopLoss: 102.01, takeProfit: 95.98 });
  });

  it("keeps raw levels without metadata", () => {
    const result = risk.size(signal({ stopLoss: 97.987 }), state(), null);
    expect(result).toMatchObject({ ok: true, stopLoss: 97.987 });
  });

  it("rounds down to the size step", () => {
    const result = risk.size(signal({ stopLoss: 97 }), state(), META);
    expect(result.ok && result.size).toBe(3.3);
  });

  it("caps size at the leverage limit", () => {
    const result = risk.size(signal({ stopLoss: 99.9 }), state(), META);
    expect(result).toMatchObject({ ok: true, size: 20, leverageCapped: true });
  });

  it("falls back to default step and minimum without metadata", () => {
    const result = risk.size(signal({ stopLoss: 97 }), state(), null);
    expect(result.ok && result.size).toBe(3.333);
  });

  it("rejects sizes under the exchange minimum", () => {
    const result = risk.size(signal(), state(), { ...META, minOrderSize: 10 });
    expect(result).toMatchObject({ ok: false, reason: "below_min_size" });
  });

  it("rejects notionals under the exchange minimum", () => {
    const result = risk.size(signal(), state(), { ...META, minNotional: 1000 });
    expect(result).toMatchObject({ ok: false, reason: "below_min_size", detail: { notional: 500, minNotional: 1000 } });
  });

  it("rejects a zero stop distance", () => {
    expect(risk.size(signal({ stopLoss: 100 }), state(), META)).toMatchObject({ ok: false, reason: "invalid_stop" });
  });

  it("allows one open position per symbol", () => {
    const s = state();
    s.positions.AAA = openPosition("AAA");
    expect(risk.size(signal(), s, META)).toMatchObject({ ok: false, reason: "open_position" });
  });

  it("enforces the portfolio cap", () => {
    const capped = new RiskManager({ maxOpenPositions: 1 });
    const s = state();
    s.positions.BBB = openPosition("BBB");
    expect(capped.size(signal(), s, META)).toMatchObject({ ok: false, reason: "max_positions" });
  });

  it("rejects at 949.99 and allows exactly 950 against a 1000 day start", () => {
    const below = state();
    below.risk.currentBalance = 949.99;
    expect(risk.size(signal(), below, META)).toMatchObject({ ok: false, reason: "daily_loss_guard" });
    expect(below.risk.dailyLossGuardTriggered).toBe(true);

    const atFloor = state();
    atFloor.risk.currentBalance = 950;
    expect(risk.size(signal(), atFloor, META).ok).toBe(true);
    expect(atFloor.risk.dailyLossGuardTriggered).toBe(false);
  });

  it("keeps the guard latched for the rest of the day", () => {
    const s = state();
    s.risk.currentBalance = 900;
    risk.size(signal(), s, META);
    s.risk.currentBalance = 1200;

    expect(risk.size(signal(), s, META)).toMatchObject({ ok: false, reason: "daily_loss_guard" });
  });

  it("checks caps before the daily-loss guard", () => {
    const s = state();
    s.risk.currentBalance = 900;
    s.positions.AAA = openPosition("AAA");
    expect(risk.size(signal(), s, META)).toMatchObject({ ok: false, reason: "open_position" });
  });
});

describe("trading day", () => {
  it("compares UTC calendar dates", () => {
    expect(isNewTradingDay(Date.UTC(2024, 0, 1, 23, 59), Date.UTC(2024, 0, 2, 0, 0))).toBe(true);
    expect(isNewTradingDay(Date.UTC(2024, 0, 1, 0, 0), Date.UTC(2024, 0, 1, 23, 59))).toBe(false);
  });

  it("re-anchors the day start and clears the guard on a new day", () => {
    const manager = new RiskManager();
    const s = state();
    s.risk.currentBalance = 900;
    s.risk.dailyLossGuardTriggered = true;

    expect(manager.rollDay(s.risk, Date.UTC(2024, 0, 1, 23))).toBe(false);
    expect(manager.rollDay(s.risk, Date.UTC(2024, 0, 2, 0, 5))).toBe(true);
    expect(s.risk).toMatchObject({
      dayStartBalance: 900,
      dayStartedAt: Date.UTC(2024, 0, 2),
      dailyLossGuardTriggered: false,
    });
  });
});

describe("floorToStep", () => {
  it("tolerates float noise just under a step", () => {
    expect(floorToStep(0.3 / 0.1, 1)).toBe(3);
    expect(floorToStep(1.23456, 0.01)).toBe(1.23);
  });
});
