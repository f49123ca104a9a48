import { TIMEFRAME_MS } from '../config/constants';
import type { Timeframe } from '../types/market';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { TickReport } from './TradingEngine';

/** Delay until the next bar close on the UTC-aligned grid, plus a settle buffer for the exchange. */
export const msUntilNextClose = (now: number, timeframe: Timeframe, bufferMs: number): number => {
  const interval = TIMEFRAME_MS[timeframe];
  const nextClose = Math.floor(now / interval) * interval + interval;
  return nextClose - now + bufferMs;
};

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const abortableSleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface TickRunner {
  runTick(abort?: AbortSignal): Promise<TickReport>;
}

export interface SchedulerOptions {
  timeframe: Timeframe;
  settleBufferMs: number;
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Runs one tick right away, then one per bar close until aborted. Ticks never
 * overlap: the next wait starts only after the previous tick returned.
 */
export class Scheduler {
  private readonly clock: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly engine: TickRunner,
    private readonly options: SchedulerOptions,
  ) {
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? abortableSleep;
  }

  public async run(signal: AbortSignal): Promise<number> {
    let ticks = 0;
    while (!signal.aborted) {
      try {
        const report = await this.engine.runTick(signal);
        ticks++;
        logger.info(
          {
            tick: ticks,
            processed: report.processed.length,
            signals: report.signals.length,
            opened: report.opened.length,
            closed: report.closed.length,
            balance: report.balance,
          },
          '--- Tick complete ---',
        );
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Tick failed');
      }
      if (signal.aborted) break;

      const delay = msUntilNextClose(this.clock(), this.options.timeframe, this.options.settleBufferMs);
      logger.info({ nextTickInMin: Math.round(delay / 60000) }, 'Waiting for next bar close');
      await this.sleep(delay, signal);
    }
    logger.info({ ticks }, 'Scheduler stopped');
    return ticks;
  }
}
