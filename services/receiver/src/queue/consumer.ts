import { DecodeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { acked, consumed, decodeErrors, storeErrors } from '../metrics/metrics.js';
import { decodeTick, type Tick } from '../types/tick.js';
import type { StreamEntry, TickStreamReader } from './stream.js';

export interface TickSink {
  record(tick: Tick, streamId: string): Promise<void>;
}

export type ConsumerOptions = {
  count: number;
  blockMs: number;
  claimMinIdleMs: number;
  claimIntervalMs: number;
  /** Pause after a store failure or a lost connection before reading again. */
  retryDelayMs?: number;
  now?: () => number;
};

export type BatchResult = { processed: number; dropped: number; retained: number };

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Reads the tick stream as one member of a consumer group. An entry is
 * acknowledged only after the store has taken it (or after it proved
 * undecodable); anything else stays pending and comes back through the
 * startup drain or a later claim.
 */
export class StreamConsumer {
  private running = false;
  private loop: Promise<void> | null = null;
  private lastClaimAt = 0;
  private readonly now: () => number;

  constructor(
    private readonly stream: TickStreamReader,
    private readonly sink: TickSink,
    private readonly opts: ConsumerOptions,
  ) {
    this.now = opts.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    await this.stream.ensureGroup();
    this.running = true;
    this.lastClaimAt = this.now();
    this.loop = this.run();
    logger.info({ count: this.opts.count, blockMs: this.opts.blockMs }, 'stream consumer started');
  }

  /** Lets the current read finish (at most one block timeout) and waits for the loop to exit. */
  async stop(): Promise<void> {
    this.running = false;
    const loop = this.loop;
    this.loop = null;
    if (loop) await loop;
    logger.info('stream consumer stopped');
  }

  private async run(): Promise<void> {
    await this.drainPending();

    while (this.running) {
      try {
        if (this.now() - this.lastClaimAt >= this.opts.claimIntervalMs) {
          this.lastClaimAt = this.now();
          const claimed = await this.stream.claim(this.opts.claimMinIdleMs, this.opts.count);
          if (claimed.length) {
            logger.info({ count: claimed.length }, 'claimed idle entries');
            const res = await this.handle(claimed, 'claimed');
            if (res.retained) await this.pause();
          }
        }
        if (!this.running) break;

        const entries = await this.stream.read('>', this.opts.count, this.opts.blockMs);
        if (!entries.length) continue;
        const res = await this.handle(entries, 'new');
        if (res.retained) await this.pause();
      } catch (err) {
        logger.error({ err }, 'stream read failed; retrying');
        await this.pause();
      }
    }
  }

  /** Entries delivered to this consumer before a restart and never acknowledged. */
  private async drainPending(): Promise<void> {
    let total = 0;
    while (this.running) {
      let res: BatchResult;
      try {
        const entries = await this.stream.read('0', this.opts.count, 0);
        if (!entries.length) break;
        res = await this.handle(entries, 'pending');
      } catch (err) {
        logger.error({ err }, 'pending replay failed; retrying');
        await this.pause();
        continue;
      }
      total += res.processed + res.dropped;
      if (res.retained) {
        // the store is failing; leave the rest for a later claim
        await this.pause();
        break;
      }
    }
    if (total) logger.info({ count: total }, 'replayed pending entries');
  }

  /**
   * Processes entries in stream order. Stops at the first store failure so
   * that entry and everything after it stay pending.
   */
  async handle(entries: readonly StreamEntry[], source: string): Promise<BatchResult> {
    const done: string[] = [];
    const result: BatchResult = { processed: 0, dropped: 0, retained: 0 };
    consumed.inc({ source }, entries.length);

    for (const [i, entry] of entries.entries()) {
      let tick: Tick;
      try {
        tick = decodeTick(entry.id, entry.data);
      } catch (err) {
        if (!(err instanceof DecodeError)) throw err;
        decodeErrors.inc();
        logger.warn({ id: entry.id, err: err.message }, 'dropping undecodable entry');
        done.push(entry.id);
        result.dropped++;
        continue;
      }

      try {
        await this.sink.record(tick, entry.id);
      } catch (err) {
        storeErrors.inc();
        result.retained = entries.length - i;
        logger.error({ id: entry.id, err, retained: result.retained }, 'store rejected tick; leaving entries pending');
        break;
      }
      done.push(entry.id);
      result.processed++;
    }

    if (done.length) {
      await this.stream.ack(done);
      acked.inc(done.length);
    }
    return result;
  }

  private pause(): Promise<void> {
    return sleep(this.opts.retryDelayMs ?? 1000);
  }
}
