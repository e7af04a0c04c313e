import { UPSERT_LATEST, type LedgerClient, type LedgerPipeline } from '../../../src/store/ledger.js';

/**
 * The handful of Redis structures the ledger touches, in memory. The only
 * script it understands is the guarded latest-snapshot upsert.
 */
export class MemoryRedis implements LedgerClient {
  readonly zsets = new Map<string, Map<string, number>>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly sets = new Map<string, Set<string>>();
  readonly ttls = new Map<string, number>();
  failNextExec: Error | null = null;

  pipeline(): LedgerPipeline {
    const ops: Array<() => unknown> = [];
    const p: LedgerPipeline = {
      zadd: (key, score, member) => {
        ops.push(() => this.zset(key).set(member, score));
        return p;
      },
      sadd: (key, member) => {
        ops.push(() => this.set(key).add(member));
        return p;
      },
      expire: (key, seconds) => {
        ops.push(() => this.ttls.set(key, seconds));
        return p;
      },
      eval: (script, _numKeys, ...args) => {
        ops.push(() => this.upsertLatest(script, args));
        return p;
      },
      exec: async () => {
        const err = this.failNextExec;
        if (err) {
          this.failNextExec = null;
          return ops.map((): [Error | null, unknown] => [err, null]);
        }
        return ops.map((op): [Error | null, unknown] => [null, op()]);
      },
    };
    return p;
  }

  hash(key: string): Record<string, string> {
    return Object.fromEntries(this.hashes.get(key) ?? []);
  }

  private upsertLatest(script: string, args: (string | number)[]): number {
    if (script !== UPSERT_LATEST) throw new Error('unknown script');
    const [key, ts, ttl, ...pairs] = args;
    const cur = this.hashes.get(String(key))?.get('exchange_ts');
    if (cur !== undefined && Number(cur) > Number(ts)) return 0;
    const h = new Map<string, string>();
    for (let i = 0; i < pairs.length; i += 2) h.set(String(pairs[i]), String(pairs[i + 1]));
    this.hashes.set(String(key), h);
    if (Number(ttl) > 0) this.ttls.set(String(key), Number(ttl));
    return 1;
  }

  private zset(key: string): Map<string, number> {
    const z = this.zsets.get(key) ?? new Map<string, number>();
    this.zsets.set(key, z);
    return z;
  }

  private set(key: string): Set<string> {
    const s = this.sets.get(key) ?? new Set<string>();
    this.sets.set(key, s);
    return s;
  }
}
