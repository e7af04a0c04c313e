import { pool } from '../db/pool.js';
import { logger } from '../utils/logger.js';
import { ALLOCATE_TICK_IDS, INSERT_DEPTHS_BATCH, INSERT_TICKS_BATCH } from '../db/sql.js';
import type { FlushResult, PendingRow, TickArchive } from '../store/store.js';

const toDate = (sec: number | undefined) => (sec === undefined ? null : new Date(sec * 1000));
const opt = <T>(v: T | undefined): T | null => (v === undefined ? null : v);

/** Column arrays for INSERT_TICKS_BATCH, in parameter order. */
export function tickColumns(ids: readonly string[], rows: readonly PendingRow[]): unknown[] {
  return [
    ids,
    rows.map((r) => r.tick.instrumentToken),
    rows.map((r) => r.tick.tradingSymbol),
    rows.map((r) => opt(r.tick.underlying)),
    rows.map((r) => r.tick.mode),
    rows.map((r) => toDate(r.tick.exchangeTs)),
    rows.map((r) => r.tradeDate),
    rows.map((r) => r.tick.lastPrice),
    rows.map((r) => opt(r.tick.lastQuantity)),
    rows.map((r) => opt(r.tick.averagePrice)),
    rows.map((r) => opt(r.tick.volume)),
    rows.map((r) => opt(r.tick.buyQuantity)),
    rows.map((r) => opt(r.tick.sellQuantity)),
    rows.map((r) => opt(r.tick.ohlc?.open)),
    rows.map((r) => opt(r.tick.ohlc?.high)),
    rows.map((r) => opt(r.tick.ohlc?.low)),
    rows.map((r) => opt(r.tick.ohlc?.close)),
    rows.map((r) => opt(r.tick.changePct)),
    rows.map((r) => toDate(r.tick.lastTradeTs)),
    rows.map((r) => opt(r.tick.oi)),
    rows.map((r) => opt(r.tick.oiDayHigh)),
    rows.map((r) => opt(r.tick.oiDayLow)),
    rows.map((r) => r.streamId),
    rows.map((r) => r.receivedAt),
  ];
}

type DepthColumns = {
  tickId: string[];
  token: number[];
  ts: Date[];
  side: string[];
  level: number[];
  price: number[];
  quantity: number[];
  orders: number[];
};

export function depthColumns(ids: readonly string[], rows: readonly PendingRow[]): DepthColumns {
  const cols: DepthColumns = { tickId: [], token: [], ts: [], side: [], level: [], price: [], quantity: [], orders: [] };
  rows.forEach((r, i) => {
    const depth = r.tick.depth;
    if (!depth) return;
    for (const side of ['buy', 'sell'] as const) {
      depth[side].forEach((lvl, level) => {
        cols.tickId.push(ids[i]);
        cols.token.push(r.tick.instrumentToken);
        cols.ts.push(new Date(r.tick.exchangeTs * 1000));
        cols.side.push(side);
        cols.level.push(level);
        cols.price.push(lvl.price);
        cols.quantity.push(lvl.quantity);
        cols.orders.push(lvl.orders);
      });
    }
  });
  return cols;
}

/** Writes ticks and their depth levels in one transaction. */
export async function insertTickBatch(rows: readonly PendingRow[]): Promise<FlushResult> {
  if (!rows.length) return { ticks: 0, depths: 0 };

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const alloc = await client.query<{ id: string }>(ALLOCATE_TICK_IDS, [rows.length]);
    const ids = alloc.rows.map((r) => r.id);
    if (ids.length !== rows.length) throw new Error(`allocated ${ids.length} ids for ${rows.length} ticks`);

    await client.query(INSERT_TICKS_BATCH, tickColumns(ids, rows));

    const d = depthColumns(ids, rows);
    if (d.tickId.length) {
      await client.query(INSERT_DEPTHS_BATCH, [d.tickId, d.token, d.ts, d.side, d.level, d.price, d.quantity, d.orders]);
    }
    await client.query('COMMIT');
    return { ticks: rows.length, depths: d.tickId.length };
  } catch (err) {
    await client.query('ROLLBACK').catch((e: unknown) => logger.warn({ err: e }, 'rollback failed'));
    throw err;
  } finally {
    client.release();
  }
}

export const pgArchive: TickArchive = { write: insertTickBatch };
