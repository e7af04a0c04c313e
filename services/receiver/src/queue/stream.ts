import type { Redis } from 'ioredis';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

export type StreamEntry = {
  id: string;
  /** `null` when the entry was trimmed away while still pending. */
  data: string | null;
};

/** `>` reads new entries; `0` re-reads this consumer's pending ones. */
export type ReadCursor = '>' | '0';

export interface TickStreamReader {
  ensureGroup(): Promise<void>;
  read(cursor: ReadCursor, count: number, blockMs: number): Promise<StreamEntry[]>;
  ack(ids: readonly string[]): Promise<number>;
  /** Takes over entries other consumers left pending for at least `minIdleMs`. */
  claim(minIdleMs: number, count: number): Promise<StreamEntry[]>;
}

export type StreamClient = Pick<Redis, 'xgroup' | 'xreadgroup' | 'xack' | 'xautoclaim'>;

export type GroupOptions = { key: string; group: string; consumer: string };

const RawEntry = z.tuple([z.string(), z.array(z.string()).nullable()]);
const RawEntries = z.array(RawEntry);
const ReadReply = z.array(z.tuple([z.string(), RawEntries])).nullable();
// Redis 7 appends the ids it deleted; 6.2 stops after the entries
const ClaimReply = z.tuple([z.string(), RawEntries]).rest(z.unknown());

function toEntries(raw: z.infer<typeof RawEntries>): StreamEntry[] {
  return raw.map(([id, fields]) => {
    if (!fields) return { id, data: null };
    const idx = fields.indexOf('data');
    return { id, data: idx >= 0 && idx % 2 === 0 ? fields[idx + 1] ?? null : null };
  });
}

export class RedisTickStream implements TickStreamReader {
  private claimCursor = '0-0';

  constructor(private readonly redis: StreamClient, private readonly opts: GroupOptions) {}

  async ensureGroup(): Promise<void> {
    try {
      await this.redis.xgroup('CREATE', this.opts.key, this.opts.group, '0', 'MKSTREAM');
      logger.info({ stream: this.opts.key, group: this.opts.group }, 'created consumer group');
    } catch (err) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) return;
      throw err;
    }
  }

  async read(cursor: ReadCursor, count: number, blockMs: number): Promise<StreamEntry[]> {
    const { key, group, consumer } = this.opts;
    const reply: unknown =
      cursor === '0'
        ? await this.redis.xreadgroup('GROUP', group, consumer, 'COUNT', count, 'STREAMS', key, cursor)
        : await this.redis.xreadgroup('GROUP', group, consumer, 'COUNT', count, 'BLOCK', blockMs, 'STREAMS', key, cursor);
    const parsed = ReadReply.parse(reply);
    if (!parsed) return [];
    return parsed.flatMap(([, entries]) => toEntries(entries));
  }

  async ack(ids: readonly string[]): Promise<number> {
    if (!ids.length) return 0;
    return this.redis.xack(this.opts.key, this.opts.group, ...ids);
  }

  async claim(minIdleMs: number, count: number): Promise<StreamEntry[]> {
    const { key, group, consumer } = this.opts;
    const reply: unknown = await this.redis.xautoclaim(key, group, consumer, minIdleMs, this.claimCursor, 'COUNT', count);
    const [next, entries] = ClaimReply.parse(reply);
    this.claimCursor = next;
    return toEntries(entries);
  }
}
