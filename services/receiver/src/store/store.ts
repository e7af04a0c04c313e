import { CommitFailure } from '../errors.js';
import { logger } from '../utils/logger.js';
import { tradeDate } from '../utils/trade-date.js';
import { commitFailures, flushRows, pendingRows } from '../metrics/metrics.js';
import type { Tick } from '../types/tick.js';
import type { TickLedger } from './ledger.js';

export type PendingRow = {
  tick: Tick;
  tradeDate: string;
  streamId: string | null;
  receivedAt: Date;
};

export type FlushResult = { ticks: number; depths: number };

/** Durable side: writes one batch atomically or not at all. */
export interface TickArchive {
  write(rows: readonly PendingRow[]): Promise<FlushResult>;
}

export type StoreOptions = {
  flushIntervalMs: number;
  /** Flush early once this many ticks are pending. */
  flushMaxRows: number;
  tradeTz: string;
  now?: () => number;
};

const EMPTY: FlushResult = { ticks: 0, depths: 0 };

export class TickStore {
  private pending: PendingRow[] = [];
  private inFlight: Promise<FlushResult> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private started = false;
  private localSeq = 0;
  private readonly now: () => number;

  constructor(
    private readonly ledger: TickLedger,
    private readonly archive: TickArchive,
    private readonly opts: StoreOptions,
  ) {
    this.now = opts.now ?? Date.now;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Writes the tick to the ledger, then queues it for the next flush. Ticks
   * recorded without a stream id get a process-local one.
   */
  async record(tick: Tick, streamId: string | null = null): Promise<void> {
    const date = tradeDate(tick.exchangeTs * 1000, this.opts.tradeTz);
    const receivedAt = this.now();
    await this.ledger.write(tick, date, streamId ?? `local-${receivedAt}-${++this.localSeq}`);

    this.pending.push({ tick, tradeDate: date, streamId, receivedAt: new Date(receivedAt) });
    pendingRows.set(this.pending.length);
    if (this.started && this.pending.length >= this.opts.flushMaxRows && !this.inFlight) {
      void this.flush();
    }
  }

  /**
   * Moves the pending buffer to durable storage. Only one flush runs at a
   * time; callers arriving meanwhile share its result. A failed commit puts
   * the batch back ahead of anything recorded since.
   */
  flush(): Promise<FlushResult> {
    if (this.inFlight) return this.inFlight;
    const run = this.commit().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.timer = setInterval(() => { void this.flush(); }, this.opts.flushIntervalMs);
    this.timer.unref();
  }

  /** Stops the schedule, lets a running flush finish, then flushes what is left. */
  async stop(): Promise<FlushResult> {
    this.started = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
    const res = await this.flush();
    if (this.pending.length) {
      logger.error({ pending: this.pending.length }, 'store stopped with unflushed ticks');
    }
    return res;
  }

  private async commit(): Promise<FlushResult> {
    if (!this.pending.length) return EMPTY;

    const batch = this.pending;
    this.pending = [];
    pendingRows.set(0);

    const started = this.now();
    try {
      const res = await this.archive.write(batch);
      flushRows.inc({ table: 'ticks' }, res.ticks);
      flushRows.inc({ table: 'tick_depths' }, res.depths);
      logger.info({ ...res, ms: this.now() - started }, 'flushed ticks');
      return res;
    } catch (err) {
      const failure = new CommitFailure(batch.length, { cause: err });
      this.pending = batch.concat(this.pending);
      pendingRows.set(this.pending.length);
      commitFailures.inc();
      logger.error({ err: failure, cause: err }, failure.message);
      return EMPTY;
    }
  }
}
