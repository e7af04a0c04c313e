import type { Tick } from '../types/tick.js';

/** The pipeline commands the ledger issues; ioredis' pipeline satisfies it. */
export interface LedgerPipeline {
  zadd(key: string, score: number, member: string): unknown;
  sadd(key: string, member: string): unknown;
  expire(key: string, seconds: number): unknown;
  eval(script: string, numKeys: number, ...args: (string | number)[]): unknown;
  exec(): Promise<[Error | null, unknown][] | null>;
}

export interface LedgerClient {
  pipeline(): LedgerPipeline;
}

export interface TickLedger {
  /**
   * `entryId` tells apart ticks with identical content; writing the same
   * entry again leaves the ledger unchanged.
   */
  write(tick: Tick, tradeDate: string, entryId: string): Promise<void>;
}

export type LedgerOptions = {
  keyPrefix: string;
  /** Retention for every ledger key; 0 keeps them forever. */
  ttlSec: number;
};

// ARGV[1] exchange ts, ARGV[2] ttl, ARGV[3..] field/value pairs.
// An older tick never overwrites a newer snapshot; an equal one does, so a
// redelivered tick leaves the hash as it was. The hash is replaced whole.
export const UPSERT_LATEST = `
local cur = redis.call('HGET', KEYS[1], 'exchange_ts')
if cur and tonumber(cur) > tonumber(ARGV[1]) then
  return 0
end
redis.call('DEL', KEYS[1])
redis.call('HSET', KEYS[1], unpack(ARGV, 3))
local ttl = tonumber(ARGV[2])
if ttl > 0 then
  redis.call('EXPIRE', KEYS[1], ttl)
end
return 1
`;

export function ledgerKeys(prefix: string, symbol: string, tradeDate: string) {
  return {
    ticks: `${prefix}ticks:${symbol}:${tradeDate}`,
    depth: `${prefix}depth:${symbol}:${tradeDate}`,
    latest: `${prefix}latest:${symbol}`,
    symbols: `${prefix}symbols:${tradeDate}`,
  };
}

/** Flattened snapshot fields; absent values are left out, and the script drops what the previous tick wrote. */
export function latestFields(tick: Tick): (string | number)[] {
  const bestBid = tick.depth?.buy[0];
  const bestAsk = tick.depth?.sell[0];
  const fields: Record<string, number | string | undefined> = {
    instrument_token: tick.instrumentToken,
    trading_symbol: tick.tradingSymbol,
    exchange_ts: tick.exchangeTs,
    last_price: tick.lastPrice,
    volume: tick.volume,
    oi: tick.oi,
    buy_quantity: tick.buyQuantity,
    sell_quantity: tick.sellQuantity,
    best_bid: bestBid?.price,
    best_bid_qty: bestBid?.quantity,
    best_ask: bestAsk?.price,
    best_ask_qty: bestAsk?.quantity,
  };
  const out: (string | number)[] = [];
  for (const [k, v] of Object.entries(fields)) {
    if (v !== undefined) out.push(k, v);
  }
  return out;
}

/**
 * Fast-storage side of the store: per-symbol history, latest snapshot, depth
 * history and the day's symbol set, written in one pipeline per tick.
 */
export class RedisLedger implements TickLedger {
  constructor(private readonly redis: LedgerClient, private readonly opts: LedgerOptions) {}

  async write(tick: Tick, tradeDate: string, entryId: string): Promise<void> {
    const keys = ledgerKeys(this.opts.keyPrefix, tick.tradingSymbol, tradeDate);
    const ttl = this.opts.ttlSec;
    const p = this.redis.pipeline();

    p.zadd(keys.ticks, tick.exchangeTs, JSON.stringify({ id: entryId, ...tick }));
    p.eval(UPSERT_LATEST, 1, keys.latest, tick.exchangeTs, ttl, ...latestFields(tick));
    p.sadd(keys.symbols, tick.tradingSymbol);
    if (tick.depth) {
      p.zadd(keys.depth, tick.exchangeTs, JSON.stringify({ id: entryId, ts: tick.exchangeTs, ...tick.depth }));
    }
    if (ttl > 0) {
      p.expire(keys.ticks, ttl);
      p.expire(keys.symbols, ttl);
      if (tick.depth) p.expire(keys.depth, ttl);
    }

    const results = await p.exec();
    if (!results) throw new Error('ledger pipeline was discarded');
    const failed = results.find(([err]) => err !== null);
    if (failed?.[0]) throw failed[0];
  }
}
