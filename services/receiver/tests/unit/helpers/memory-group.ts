import type { ReadCursor, StreamEntry, TickStreamReader } from '../../../src/queue/stream.js';

type Pending = { consumer: string; deliveredAt: number; deliveries: number };

/**
 * One stream with one consumer group, in memory. Tracks delivery and the
 * pending list the way XREADGROUP / XACK / XAUTOCLAIM do.
 */
export class MemoryGroupStream {
  readonly entries: StreamEntry[] = [];
  readonly pending = new Map<string, Pending>();
  private delivered = 0;
  private seq = 0;

  add(data: string | null): string {
    const id = `${++this.seq}-0`;
    this.entries.push({ id, data });
    return id;
  }

  /** Hands the next `count` entries to `consumer` without anyone processing them. */
  deliver(consumer: string, count: number, at = 0): StreamEntry[] {
    const out = this.entries.slice(this.delivered, this.delivered + count);
    this.delivered += out.length;
    for (const e of out) this.pending.set(e.id, { consumer, deliveredAt: at, deliveries: 1 });
    return out;
  }

  pendingFor(consumer: string): string[] {
    return [...this.pending].filter(([, p]) => p.consumer === consumer).map(([id]) => id);
  }

  reader(consumer: string, now: () => number = Date.now): TickStreamReader {
    return {
      ensureGroup: async () => undefined,
      read: async (cursor: ReadCursor, count: number, blockMs: number) => {
        if (cursor === '0') {
          const ids = new Set(this.pendingFor(consumer));
          return this.entries.filter((e) => ids.has(e.id)).slice(0, count);
        }
        const out = this.deliver(consumer, count, now());
        if (!out.length && blockMs > 0) await new Promise((r) => setTimeout(r, blockMs));
        return out;
      },
      ack: async (ids: readonly string[]) => {
        let n = 0;
        for (const id of ids) if (this.pending.delete(id)) n++;
        return n;
      },
      claim: async (minIdleMs: number, count: number) => {
        const out: StreamEntry[] = [];
        for (const e of this.entries) {
          const p = this.pending.get(e.id);
          if (!p || p.consumer === consumer || now() - p.deliveredAt < minIdleMs) continue;
          this.pending.set(e.id, { consumer, deliveredAt: now(), deliveries: p.deliveries + 1 });
          out.push(e);
          if (out.length >= count) break;
        }
        return out;
      },
    };
  }
}
