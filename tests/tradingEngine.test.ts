import { describe, expect, it, vi } from "vitest";

import { BacktestEngine } from "../src/backtest/BacktestEngine";
import type { ExchangeAdapter } from "../src/engine/ExchangeAdapter";
import { MarketDataEngine } from "../src/engine/MarketDataEngine";
import { BacktestExecutor } from "../src/engine/executors/BacktestExecutor";
import { LiveExecutor } from "../src/engine/executors/LiveExecutor";
import { TradingEngine, type TickReport } from "../src/engine/TradingEngine";
import { MemoryStateStore } from "../src/persistence/StateStore";
import type { OHLCV, SymbolMeta } from "../src/types/market";
import type { OrderResult, TradingState } from "../src/types/trading";
import { BASE_TIMESTAMP, CaptureSink, HOUR, closeOf, scenarioBars, testConfig } from "./helpers";

const META: SymbolMeta = { minOrderSize: 0.001, sizeStep: 0.001, pricePrecision: 2 };
const GAP_ID = `AAA:bullish:${BASE_TIMESTAMP + 42 * HOUR}`;

class FailingExecutor extends BacktestExecutor {
  async placeOrder(): Promise<OrderResult> {
    return { ok: false, error: "exchange down" };
  }
}

class FlakyStore extends MemoryStateStore {
  public failing = false;

  async save(state: TradingState): Promise<void> {
    if (this.failing) throw new Error("disk full");
    await super.save(state);
  }
}

interface Harness {
  engine: TradingEngine;
  provider: BacktestExecutor;
  store: MemoryStateStore;
  sink: CaptureSink;
}

async function harness(
  options: {
    symbols?: string[];
    history?: Record<string, OHLCV[]>;
    provider?: BacktestExecutor;
    store?: MemoryStateStore;
  } = {},
): Promise<Harness> {
  const symbols = options.symbols ?? ["AAA"];
  const history = options.history ?? Object.fromEntries(symbols.map((s) => [s, scenarioBars()]));
  const meta = Object.fromEntries(Object.keys(history).map((s) => [s, META]));
  const provider = options.provider ?? new BacktestExecutor(history, "1h", meta);
  const store = options.store ?? new MemoryStateStore();
  const sink = new CaptureSink();
  provider.advanceTo(closeOf(0));
  const engine = await TradingEngine.create({ config: testConfig({ symbols }), provider, store, events: sink });
  return { engine, provider, store, sink };
}

async function runThrough(h: Harness, from: number, to: number): Promise<TickReport[]> {
  const reports: TickReport[] = [];
  for (let i = from; i <= to; i++) {
    h.provider.advanceTo(closeOf(i));
    reports.push(await h.engine.runTick());
  }
  return reports;
}

describe("TradingEngine", () => {
  it("opens one position on a confirmed midpoint touch and closes it at the target", async () => {
    const h = await harness();
    const reports = await runThrough(h, 0, 43);

    expect(reports[42].signals).toHaveLength(0);
    expect(reports[43].signals).toHaveLength(1);
    expect(reports[43].opened).toHaveLength(1);

    let state = h.engine.getState();
    const position = state.positions.AAA;
    expect(position).toMatchObject({
      id: `pos:${GAP_ID}`,
      direction: "bullish",
      entryPrice: 188,
      size: 1.111,
      stopLoss: 179,
      takeProfit: 206,
      openedAt: closeOf(43),
      status: "open",
    });
    expect(state.gaps.AAA.active).toHaveLength(0);
    expect(state.gaps.AAA.retired.find((g) => g.id === GAP_ID)).toMatchObject({
      status: "filled",
      fillCount: 1,
      filledAt: BASE_TIMESTAMP + 43 * HOUR,
    });

    const [last] = await runThrough(h, 44, 44);
    expect(last.closed).toHaveLength(1);

    state = h.engine.getState();
    expect(state.positions).toEqual({});
    expect(state.closed[0]).toMatchObject({ exitReason: "take_profit", exitPrice: 206, closedAt: closeOf(44) });
    expect(state.closed[0].realizedPnl).toBeCloseTo(18 * 1.111, 9);
    expect(state.risk.currentBalance).toBeCloseTo(1000 + 18 * 1.111, 9);
    expect(h.sink.of("position_closed")).toHaveLength(1);
  });

  it("skips warm-up bars without touching state", async () => {
    const h = await harness();
    const reports = await runThrough(h, 0, 10);

    expect(reports.every((r) => r.skipped.length === 1 && r.skipped[0].reason === "insufficient_data")).toBe(true);
    expect(h.engine.getState().gaps).toEqual({});
    expect(h.sink.of("insufficient_data")).toHaveLength(11);
  });

  it("treats the same candle seen twice as a single signal", async () => {
    const h = await harness();
    await runThrough(h, 0, 43);
    const before = h.engine.getState();

    const again = await h.engine.runTick();

    expect(again.signals).toEqual([]);
    expect(again.skipped).toEqual([{ symbol: "AAA", reason: "no_new_bar" }]);
    expect(h.sink.of("order_filled")).toHaveLength(1);
    expect(h.engine.getState()).toEqual(before);
  });

  it("resumes an aborted tick to the same state as an uninterrupted run", async () => {
    const symbols = ["AAA", "BBB"];
    const straight = await harness({ symbols });
    await runThrough(straight, 0, 43);

    const interrupted = await harness({ symbols });
    await runThrough(interrupted, 0, 42);
    const controller = new AbortController();
    interrupted.sink.onRecord = (kind, payload) => {
      if (kind === "order_filled" && payload.symbol === "AAA") controller.abort();
    };
    interrupted.provider.advanceTo(closeOf(43));
    const partial = await interrupted.engine.runTick(controller.signal);

    expect(partial.aborted).toBe(true);
    expect(partial.processed).toEqual(["AAA"]);

    const resumed = await TradingEngine.create({
      config: testConfig({ symbols }),
      provider: interrupted.provider,
      store: interrupted.store,
      events: new CaptureSink(),
    });
    const rest = await resumed.runTick();

    expect(rest.opened.map((p) => p.symbol)).toEqual(["BBB"]);
    expect(resumed.getState()).toEqual(straight.engine.getState());
    expect(Object.keys(resumed.getState().positions).sort()).toEqual(["AAA", "BBB"]);
  });

  it("keeps the gap consumed when the order fails", async () => {
    const history = { AAA: scenarioBars() };
    const h = await harness({ history, provider: new FailingExecutor(history, "1h", { AAA: META }) });
    const reports = await runThrough(h, 0, 44);

    expect(reports[43].rejections).toEqual([
      { symbol: "AAA", gapId: GAP_ID, reason: "execution_failed", detail: { error: "exchange down" } },
    ]);
    expect(h.sink.of("execution_failed")).toHaveLength(1);
    const state = h.engine.getState();
    expect(state.positions).toEqual({});
    expect(state.gaps.AAA.retired.find((g) => g.id === GAP_ID)?.status).toBe("filled");
    expect(reports[44].signals).toHaveLength(0);
  });

  it("retries a failed save at the start of the next tick", async () => {
    const store = new FlakyStore();
    const h = await harness({ store });
    await runThrough(h, 0, 42);

    store.failing = true;
    await runThrough(h, 43, 43);
    expect(h.engine.hasPendingSave()).toBe(true);
    expect(h.sink.of("state_save_failed").length).toBeGreaterThan(0);
    expect((await store.load())?.positions).toEqual({});

    store.failing = false;
    await h.engine.runTick();
    expect(h.engine.hasPendingSave()).toBe(false);
    expect(h.sink.of("state_save_recovered")).toHaveLength(1);
    expect(await store.load()).toEqual(h.engine.getState());
  });

  it("skips a symbol without data and carries on with the rest", async () => {
    const h = await harness({ symbols: ["ZZZ", "AAA"], history: { AAA: scenarioBars() } });
    const reports = await runThrough(h, 0, 43);

    expect(reports[43].skipped).toEqual([{ symbol: "ZZZ", reason: "data_unavailable" }]);
    expect(reports[43].opened.map((p) => p.symbol)).toEqual(["AAA"]);
    expect(h.engine.getState().gaps.ZZZ).toBeUndefined();
  });
});

describe("TradingEngine on a live exchange", () => {
  function exchange(): ExchangeAdapter {
    return {
      name: "Fake",
      fetchCandles: vi.fn(async () => scenarioBars().slice(0, 44)),
      fetchTicker: vi.fn(async (symbol: string) => ({ symbol, price: 170, timestamp: Date.now() })),
      fetchSymbolMeta: vi.fn(async () => META),
      placeMarketOrder: vi.fn<ExchangeAdapter["placeMarketOrder"]>(async (order) => ({
        price: 188,
        size: order.size,
        timestamp: Date.now(),
        orderId: "7",
      })),
      fetchBalance: vi
        .fn<ExchangeAdapter["fetchBalance"]>()
        .mockResolvedValueOnce(1000)
        .mockResolvedValueOnce(1000)
        .mockResolvedValue(990.001),
      fetchPositionSize: vi.fn<ExchangeAdapter["fetchPositionSize"]>().mockResolvedValueOnce(1.111).mockResolvedValue(0),
    };
  }

  it("leaves exits to the exchange brackets and books a bracket stop once", async () => {
    const adapter = exchange();
    const sink = new CaptureSink();
    const engine = await TradingEngine.create({
      config: testConfig(),
      provider: new LiveExecutor(new MarketDataEngine(adapter, { maxRetries: 0, baseDelayMs: 0 })),
      store: new MemoryStateStore(),
      events: sink,
    });

    const first = await engine.runTick();
    expect(first.opened).toHaveLength(1);
    expect(engine.getState().positions.AAA).toMatchObject({ entryPrice: 188, size: 1.111, stopLoss: 179, takeProfit: 206 });

    // Price is through the stop but the exchange still holds the position.
    const second = await engine.runTick();
    expect(second.closed).toEqual([]);
    expect(engine.getState().positions.AAA?.status).toBe("open");
    expect(engine.getState().risk.currentBalance).toBe(1000);

    // The bracket filled between ticks; the synced balance already carries the loss.
    const third = await engine.runTick();
    expect(third.closed).toHaveLength(1);
    const state = engine.getState();
    expect(state.positions).toEqual({});
    expect(state.closed[0]).toMatchObject({ exitReason: "stop_loss", exitPrice: 179 });
    expect(state.closed[0].realizedPnl).toBeCloseTo(-9 * 1.111, 9);
    expect(state.risk.currentBalance).toBe(990.001);
    expect(state.risk.dailyLossGuardTriggered).toBe(false);
    expect(adapter.placeMarketOrder).toHaveBeenCalledTimes(1);
  });
});

describe("BacktestExecutor", () => {
  it("stamps the ticker with the close time of the bar it describes", async () => {
    const history = { AAA: scenarioBars().slice(0, 2), BBB: scenarioBars().slice(0, 4) };
    const provider = new BacktestExecutor(history, "1h");

    provider.advanceTo(closeOf(3));
    await expect(provider.getTicker("AAA")).resolves.toMatchObject({ price: history.AAA[1].close, timestamp: closeOf(1) });
    await expect(provider.getTicker("BBB")).resolves.toMatchObject({ timestamp: closeOf(3) });
  });
});

describe("BacktestEngine", () => {
  it("replays history through the trading engine and reports metrics", async () => {
    const result = await new BacktestEngine({
      config: testConfig(),
      history: { AAA: scenarioBars() },
      meta: { AAA: META },
      events: new CaptureSink(),
    }).run();

    expect(result.bars).toBe(45);
    expect(result.equityCurve).toHaveLength(45);
    expect(result.trades).toHaveLength(1);
    expect(result.trades[0]).toMatchObject({ direction: "bullish", entryPrice: 188, exitPrice: 206, exitReason: "take_profit" });
    expect(result.metrics).toMatchObject({ totalTrades: 1, wins: 1, losses: 0, winRate: 1, maxDrawdown: 0 });
    expect(result.metrics.finalBalance).toBeCloseTo(1000 + 18 * 1.111, 9);
  });

  it("never manages a position against its own entry bar when another symbol moves the clock", async () => {
    const result = await new BacktestEngine({
      config: testConfig({ symbols: ["AAA", "BBB"] }),
      history: { AAA: scenarioBars().slice(0, 44), BBB: scenarioBars() },
      meta: { AAA: META, BBB: META },
      events: new CaptureSink(),
    }).run();

    const aaa = result.trades.filter((t) => t.symbol === "AAA");
    expect(aaa).toEqual([
      {
        symbol: "AAA",
        direction: "bullish",
        entryPrice: 188,
        exitPrice: 188,
        entryTime: closeOf(43),
        exitTime: closeOf(44),
        size: 1.111,
        netProfit: 0,
        exitReason: "manual",
        holdDuration: HOUR,
      },
    ]);
    expect(result.trades.find((t) => t.symbol === "BBB")).toMatchObject({ exitReason: "take_profit", exitPrice: 206 });
  });

  it("counts every trade even when the closed archive keeps none", async () => {
    const result = await new BacktestEngine({
      config: testConfig({ closedHistoryLimit: 0 }),
      history: { AAA: scenarioBars() },
      meta: { AAA: META },
      events: new CaptureSink(),
    }).run();

    expect(result.trades).toHaveLength(1);
    expect(result.metrics).toMatchObject({ totalTrades: 1, wins: 1 });
    expect(result.metrics.grossProfit).toBeCloseTo(18 * 1.111, 9);
    expect(result.metrics.finalBalance).toBeCloseTo(1000 + 18 * 1.111, 9);
  });
});
