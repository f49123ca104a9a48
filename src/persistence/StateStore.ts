import { promises as fs } from 'fs';
import path from 'path';
import type { TradingState } from '../types/trading';
import { StateStoreError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { cloneState, fromSnapshot, snapshotSchema, toSnapshot } from './snapshot';

export interface StateStore {
  /** Null when nothing has been saved yet. Throws StateStoreError on unreadable state. */
  load(): Promise<TradingState | null>;
  save(state: TradingState): Promise<void>;
}

/**
 * JSON snapshot on disk. Writes go to a temp file that is renamed over the
 * target, so a crash mid-write leaves the previous snapshot intact.
 */
export class JsonFileStateStore implements StateStore {
  constructor(
    private readonly file: string,
    private readonly clock: () => number = Date.now,
  ) {}

  async load(): Promise<TradingState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf8');
    } catch (err) {
      if (isErrno(err) && err.code === 'ENOENT') return null;
      throw new StateStoreError(this.file, `Cannot read state: ${errorMessage(err)}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StateStoreError(this.file, `State is not valid JSON: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = snapshotSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new StateStoreError(this.file, `State failed validation: ${issues.join('; ')}`);
    }
    return fromSnapshot(parsed.data);
  }

  async save(state: TradingState): Promise<void> {
    const body = JSON.stringify(toSnapshot(state, this.clock()), null, 2) + '\n';
    const tmp = `${this.file}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(path.resolve(this.file)), { recursive: true });
      await fs.writeFile(tmp, body, 'utf8');
      await fs.rename(tmp, this.file);
    } catch (err) {
      await fs.rm(tmp, { force: true }).catch((rmErr: unknown) =>
        logger.warn({ file: tmp, error: errorMessage(rmErr) }, 'Could not remove temp state file'),
      );
      throw new StateStoreError(this.file, `Cannot write state: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/** Keeps deep copies in memory. Used for backtests, which must not touch the live snapshot. */
export class MemoryStateStore implements StateStore {
  private stored: TradingState | null;
  public saves = 0;

  constructor(initial: TradingState | null = null) {
    this.stored = initial ? cloneState(initial) : null;
  }

  async load(): Promise<TradingState | null> {
    return this.stored ? cloneState(this.stored) : null;
  }

  async save(state: TradingState): Promise<void> {
    this.stored = cloneState(state);
    this.saves += 1;
  }
}

const isErrno = (err: unknown): err is NodeJS.ErrnoException =>
  err instanceof Error && 'code' in err && typeof err.code === 'string';
