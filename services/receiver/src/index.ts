import type { Server } from 'node:http';
import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';
import { getReader, getRedis, shutdownRedis } from './redis/index.js';
import { pool, dbHealth } from './db/pool.js';
import { ensureSchema } from './db/migrate.js';
import { RedisTickStream } from './queue/stream.js';
import { StreamConsumer } from './queue/consumer.js';
import { RedisLedger } from './store/ledger.js';
import { TickStore } from './store/store.js';
import { pgArchive } from './repositories/ticks.repo.js';
import { startOpsServer } from './server/http.js';

let consumer: StreamConsumer | null = null;
let store: TickStore | null = null;
let opsServer: Server | null = null;

async function main() {
  await ensureSchema();

  const ledger = new RedisLedger(getRedis(), { keyPrefix: cfg.store.keyPrefix, ttlSec: cfg.store.ttlSec });
  const s = new TickStore(ledger, pgArchive, {
    flushIntervalMs: cfg.store.flushIntervalMs,
    flushMaxRows: cfg.store.flushMaxRows,
    tradeTz: cfg.store.tradeTz,
  });
  store = s;
  s.start();

  const stream = new RedisTickStream(getReader(), {
    key: cfg.stream.name,
    group: cfg.stream.group,
    consumer: cfg.stream.consumer,
  });
  consumer = new StreamConsumer(stream, s, cfg.stream);
  await consumer.start();

  if (cfg.opsPort) {
    opsServer = startOpsServer(cfg.opsPort, {
      redis: async () => (await getRedis().ping()) === 'PONG',
      db: dbHealth,
      pending: () => s.pendingCount,
    });
  }

  logger.info(
    {
      env: cfg.env,
      stream: cfg.stream.name,
      group: cfg.stream.group,
      consumer: cfg.stream.consumer,
      flushIntervalMs: cfg.store.flushIntervalMs,
      opsPort: cfg.opsPort || undefined,
    },
    'receiver started',
  );
}

let closing = false;
async function shutdown(sig: string, code = 0) {
  if (closing) return;
  closing = true;
  logger.warn({ sig }, 'receiver shutting down');

  try {
    await consumer?.stop(); // no new entries after this
  } catch (e) {
    logger.error({ err: e }, 'error stopping consumer');
  }
  try {
    const res = await store?.stop();
    if (res) logger.info(res, 'final flush');
  } catch (e) {
    logger.error({ err: e }, 'error in final flush');
  }

  const srv = opsServer;
  if (srv) await new Promise<void>((r) => srv.close(() => r()));

  try {
    await shutdownRedis();
  } catch (e) {
    logger.error({ err: e }, 'error shutting down redis');
  }
  try {
    await pool.end();
  } catch (e) {
    logger.error({ err: e }, 'error closing pg pool');
  }

  logger.info('bye');
  process.exit(code);
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaughtException');
  void shutdown('uncaughtException', 1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'unhandledRejection');
  void shutdown('unhandledRejection', 1);
});

main().catch((e: unknown) => {
  logger.fatal({ err: e }, 'receiver fatal');
  void shutdown('fatal', 1);
});
