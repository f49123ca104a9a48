import { parseConfig, type BotConfig } from "../src/config/BotConfig";
import type { OHLCV } from "../src/types/market";
import type { EventKind, EventSink } from "../src/utils/eventSink";

export const HOUR = 3_600_000;
export const BASE_TIMESTAMP = Date.UTC(2024, 0, 1);

type BarShape = { o: number; h: number; l: number; c: number };

export function bar(index: number, shape: Partial<BarShape> & { h: number; l: number }): OHLCV {
  const close = shape.c ?? (shape.h + shape.l) / 2;
  return {
    timestamp: BASE_TIMESTAMP + index * HOUR,
    open: shape.o ?? close,
    high: shape.h,
    low: shape.l,
    close,
    volume: 1,
  };
}

export function bars(shapes: (Partial<BarShape> & { h: number; l: number })[], startIndex = 0): OHLCV[] {
  return shapes.map((shape, i) => bar(startIndex + i, shape));
}

/** Steadily accelerating uptrend without any three-bar gaps: closes 100, 101, 102, ... */
export function warmupBars(count: number): OHLCV[] {
  const out: OHLCV[] = [];
  let prev: number | null = null;
  for (let i = 0; i < count; i++) {
    const close = 100 + i + Math.floor((i * i) / 40);
    const open: number = prev ?? close - 1;
    out.push(bar(i, { o: open, h: Math.max(open, close) + 1, l: Math.min(open, close) - 2, c: close }));
    prev = close;
  }
  return out;
}

/**
 * 40 warm-up bars (last close 177), then:
 * bar 42 completes a bullish gap top 186 / bottom 179 (midpoint 182.5),
 * bar 43 trades back through the midpoint and closes at 188,
 * bar 44 rallies to 207.
 */
export function scenarioBars(): OHLCV[] {
  return [
    ...warmupBars(40),
    ...bars(
      [
        { o: 177, h: 179, l: 174, c: 178 },
        { o: 178, h: 188, l: 177, c: 187 },
        { o: 187, h: 190, l: 186, c: 189 },
        { o: 189, h: 189.5, l: 182, c: 188 },
        { o: 188, h: 207, l: 187, c: 205 },
      ],
      40,
    ),
  ];
}

/** Close time of bar `index` on the hourly grid. */
export const closeOf = (index: number): number => BASE_TIMESTAMP + (index + 1) * HOUR;

export function testConfig(overrides: Record<string, unknown> = {}): BotConfig {
  return parseConfig({
    symbols: ["AAA"],
    timeframe: "1h",
    startingBalance: 1000,
    risk: { stopBufferPct: 0 },
    ...overrides,
  });
}

export class CaptureSink implements EventSink {
  public readonly events: { kind: EventKind; payload: Record<string, unknown> }[] = [];
  public onRecord?: (kind: EventKind, payload: Record<string, unknown>) => void;

  record(kind: EventKind, payload: Record<string, unknown>): void {
    this.events.push({ kind, payload });
    this.onRecord?.(kind, payload);
  }

  of(kind: EventKind): Record<string, unknown>[] {
    return this.events.filter((e) => e.kind === kind).map((e) => e.payload);
  }
}
