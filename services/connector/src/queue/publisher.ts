import { PublishTimeout } from '../errors.js';
import { logger } from '../utils/logger.js';
import { dropped, published, publishInFlight, publishLate } from '../metrics/metrics.js';
import type { PublishOutcome, Tick } from '../types/domain.js';
import type { StreamWriter } from './stream.js';

/** `timeout` means the outcome was unknown when the caller gave up; see `late`. */
export type DropReason = 'saturated' | 'timeout' | 'error';
export type LateOutcome = 'acknowledged' | 'failed';

export type PublisherOptions = {
  timeoutMs: number;
  /** Bounded hand-off window: writes issued but not yet acknowledged. */
  maxInFlight: number;
};

export type PublisherStats = {
  published: number;
  dropped: Record<DropReason, number>;
  /** Timed-out writes that settled afterwards. */
  late: Record<LateOutcome, number>;
  inFlight: number;
};

/**
 * Socket-side end of the pipeline. `publish` settles within `timeoutMs` and
 * never rejects; anything that cannot be written in time is reported as
 * dropped and counted. A timed-out write may still land: when it settles it
 * is counted again under `late`, so `dropped{timeout}` minus
 * `late{acknowledged}` is what actually went missing. Writes are issued in call order on one connection, which keeps
 * per-socket order intact in the stream.
 */
export class Publisher {
  private inFlight = 0;
  private readonly stats: PublisherStats = {
    published: 0,
    dropped: { saturated: 0, timeout: 0, error: 0 },
    late: { acknowledged: 0, failed: 0 },
    inFlight: 0,
  };
  private lastDropLogAt = 0;

  constructor(private readonly writer: StreamWriter, private readonly opts: PublisherOptions) {}

  publish(tick: Tick): Promise<PublishOutcome> {
    if (this.inFlight >= this.opts.maxInFlight) {
      this.drop('saturated');
      return Promise.resolve('dropped');
    }

    const payload = JSON.stringify(tick);
    this.inFlight++;
    publishInFlight.set(this.inFlight);

    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;
    const timeout = new Promise<PublishTimeout>((resolve) => {
      timer = setTimeout(() => {
        timedOut = true;
        resolve(new PublishTimeout(this.opts.timeoutMs));
      }, this.opts.timeoutMs);
    });
    // settles the slot whenever the write itself finishes, even after a timeout
    const write = this.writer.append(payload).then(
      () => true as const,
      (err: unknown) => err,
    ).then((res) => {
      if (timedOut) this.late(res === true ? 'acknowledged' : 'failed');
      return res;
    }).finally(() => {
      this.inFlight--;
      publishInFlight.set(this.inFlight);
    });

    return Promise.race([write, timeout]).then((res) => {
      clearTimeout(timer);
      if (res === true) {
        this.stats.published++;
        published.inc();
        return 'acknowledged';
      }
      if (res instanceof PublishTimeout) {
        this.drop('timeout');
      } else {
        this.drop('error', res);
      }
      return 'dropped';
    });
  }

  snapshot(): PublisherStats {
    return {
      published: this.stats.published,
      dropped: { ...this.stats.dropped },
      late: { ...this.stats.late },
      inFlight: this.inFlight,
    };
  }

  private late(outcome: LateOutcome): void {
    this.stats.late[outcome]++;
    publishLate.inc({ outcome });
  }

  private drop(reason: DropReason, err?: unknown): void {
    this.stats.dropped[reason]++;
    dropped.inc({ reason });
    // a saturated queue would otherwise log once per tick
    const now = Date.now();
    if (now - this.lastDropLogAt >= 1000) {
      this.lastDropLogAt = now;
      logger.warn({ reason, err, dropped: this.stats.dropped }, 'publisher dropping ticks');
    }
  }
}
