import type { Redis } from 'ioredis';
import { logger } from '../utils/logger.js';

export interface StreamWriter {
  /** Appends one entry and resolves with the id the queue assigned. */
  append(payload: string): Promise<string>;
}

export type StreamOptions = {
  key: string;
  maxLen: number;
  /** `MAXLEN ~` lets Redis trim lazily at macro-node boundaries. */
  approximate?: boolean;
};

export type StreamClient = Pick<Redis, 'xadd' | 'xgroup'>;

/** Append side of the Redis stream; the receiver owns the read side. */
export class RedisStreamWriter implements StreamWriter {
  constructor(private readonly redis: StreamClient, private readonly opts: StreamOptions) {}

  async append(payload: string): Promise<string> {
    const id = await this.redis.xadd(
      this.opts.key,
      'MAXLEN',
      this.opts.approximate ? '~' : '=',
      this.opts.maxLen,
      '*',
      'data',
      payload,
    );
    if (id === null) throw new Error(`XADD to ${this.opts.key} returned no id`);
    return id;
  }

  async ensureGroup(group: string): Promise<void> {
    try {
      await this.redis.xgroup('CREATE', this.opts.key, group, '0', 'MKSTREAM');
      logger.info({ stream: this.opts.key, group }, 'created consumer group');
    } catch (err) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) return;
      throw err;
    }
  }
}
