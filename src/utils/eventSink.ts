import { logger, Logger } from './logger';

export type EventKind =
  | 'gap_created'
  | 'gap_retired'
  | 'signal_confirmed'
  | 'signal_rejected'
  | 'order_filled'
  | 'execution_failed'
  | 'position_closed'
  | 'stop_trailed'
  | 'pnl_updated'
  | 'daily_reset'
  | 'data_unavailable'
  | 'insufficient_data'
  | 'state_save_failed'
  | 'state_save_recovered';

export interface EventSink {
  record(kind: EventKind, payload: Record<string, unknown>): void;
}

const WARN_EVENTS: ReadonlySet<EventKind> = new Set([
  'signal_rejected',
  'data_unavailable',
  'insufficient_data',
]);

const ERROR_EVENTS: ReadonlySet<EventKind> = new Set(['execution_failed', 'state_save_failed']);

/**
 * Writes domain events as structured pino records. Logging must never break a
 * tick, so serialization failures are reported on stderr and dropped.
 */
export class PinoEventSink implements EventSink {
  constructor(private readonly log: Logger = logger) {}

  public record(kind: EventKind, payload: Record<string, unknown>): void {
    try {
      const entry = { event: kind, ...payload };
      if (ERROR_EVENTS.has(kind)) this.log.error(entry, kind);
      else if (WARN_EVENTS.has(kind)) this.log.warn(entry, kind);
      else this.log.info(entry, kind);
    } catch (error) {
      process.stderr.write(`event sink failure (${kind}): ${String(error)}\n`);
    }
  }
}
