import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';

// ---- Mocks (MUST match import specifiers used by the SUT) ----
vi.mock('../../src/db/pool.js', () => ({
  pool: { connect: vi.fn() },
}));

import { pool } from '../../src/db/pool.js';
import { ALLOCATE_TICK_IDS, INSERT_DEPTHS_BATCH, INSERT_TICKS_BATCH } from '../../src/db/sql.js';
import { depthColumns, insertTickBatch, tickColumns } from '../../src/repositories/ticks.repo.js';
import type { PendingRow } from '../../src/store/store.js';

const TS = 1_714_967_100;
const RECEIVED = new Date(1_714_967_200_000);

function row(price: number, withDepth = false): PendingRow {
  return {
    tick: {
      instrumentToken: 408065,
      tradingSymbol: 'INFY',
      mode: withDepth ? 'full' : 'ltp',
      tradable: true,
      exchangeTs: TS,
      lastPrice: price,
      ...(withDepth
        ? { depth: { buy: [{ price: 99.5, quantity: 3, orders: 1 }], sell: [{ price: 100.5, quantity: 4, orders: 2 }] } }
        : {}),
    },
    tradeDate: '2024-05-06',
    streamId: `${price}-0`,
    receivedAt: RECEIVED,
  };
}

function fakeClient(opts: { failOn?: string } = {}) {
  const query = vi.fn(async (sql: string, params?: unknown[]) => {
    if (opts.failOn && sql === opts.failOn) throw new Error('deadlock detected');
    if (sql === ALLOCATE_TICK_IDS) {
      const n = Number(params?.[0] ?? 0);
      return { rows: Array.from({ length: n }, (_, i) => ({ id: String(41 + i) })) };
    }
    return { rows: [] };
  });
  const release = vi.fn();
  return { query, release };
}

describe('ticks.repo', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('maps ticks to column arrays, absent values as null', () => {
    const cols = tickColumns(['41'], [row(100)]);
    expect(cols).toHaveLength(24);
    expect(cols[0]).toEqual(['41']);
    expect(cols[1]).toEqual([408065]);
    expect(cols[5]).toEqual([new Date(TS * 1000)]);
    expect(cols[6]).toEqual(['2024-05-06']);
    expect(cols[7]).toEqual([100]);
    expect(cols[8]).toEqual([null]);
    expect(cols[22]).toEqual(['100-0']);
    expect(cols[23]).toEqual([RECEIVED]);
  });

  it('expands depth levels per side with their tick id', () => {
    const d = depthColumns(['41', '42'], [row(100), row(101, true)]);
    expect(d).toEqual({
      tickId: ['42', '42'],
      token: [408065, 408065],
      ts: [new Date(TS * 1000), new Date(TS * 1000)],
      side: ['buy', 'sell'],
      level: [0, 0],
      price: [99.5, 100.5],
      quantity: [3, 4],
      orders: [1, 2],
    });
  });

  it('writes ticks and depths in one transaction', async () => {
    const client = fakeClient();
    (pool.connect as unknown as Mock).mockResolvedValue(client);

    const res = await insertTickBatch([row(100), row(101, true)]);

    expect(res).toEqual({ ticks: 2, depths: 2 });
    expect(client.query.mock.calls.map(([sql]) => sql)).toEqual([
      'BEGIN',
      ALLOCATE_TICK_IDS,
      INSERT_TICKS_BATCH,
      INSERT_DEPTHS_BATCH,
      'COMMIT',
    ]);
    expect(client.query.mock.calls[1][1]).toEqual([2]);
    expect(client.query.mock.calls[3][1]?.[0]).toEqual(['42', '42']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('skips the depth insert when no tick carries depth', async () => {
    const client = fakeClient();
    (pool.connect as unknown as Mock).mockResolvedValue(client);

    await expect(insertTickBatch([row(100)])).resolves.toEqual({ ticks: 1, depths: 0 });
    expect(client.query.mock.calls.map(([sql]) => sql)).not.toContain(INSERT_DEPTHS_BATCH);
  });

  it('rolls back and rethrows when an insert fails', async () => {
    const client = fakeClient({ failOn: INSERT_TICKS_BATCH });
    (pool.connect as unknown as Mock).mockResolvedValue(client);

    await expect(insertTickBatch([row(100)])).rejects.toThrow('deadlock detected');
    expect(client.query.mock.calls.map(([sql]) => sql)).toEqual(['BEGIN', ALLOCATE_TICK_IDS, INSERT_TICKS_BATCH, 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('does not touch the pool for an empty batch', async () => {
    await expect(insertTickBatch([])).resolves.toEqual({ ticks: 0, depths: 0 });
    expect(pool.connect).not.toHaveBeenCalled();
  });
});
