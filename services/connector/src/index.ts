import type { Server } from 'node:http';
import { cfg } from './config/index.js';
import { logger } from './utils/logger.js';
import { tradeDate } from './utils/trade-date.js';
import { CapacityExceeded } from './errors.js';
import { SessionContext } from './auth/session-context.js';
import { HttpTokenProvider, StaticTokenProvider, type TokenProvider } from './auth/token-provider.js';
import { HttpInstrumentSource, HttpSpotPriceSource } from './instruments/source.js';
import { partition } from './instruments/partitioner.js';
import { SessionManager } from './socket/manager.js';
import type { SymbolInfo } from './socket/session.js';
import { getRedis, redisHealth, shutdownRedis } from './redis/index.js';
import { RedisStreamWriter } from './queue/stream.js';
import { Publisher } from './queue/publisher.js';
import { startOpsServer } from './server/ops.js';

let manager: SessionManager | null = null;
let opsServer: Server | null = null;
let statsTimer: NodeJS.Timeout | null = null;

function tokenProvider(): TokenProvider {
  const b = cfg.broker;
  if (b.authUrl) {
    return new HttpTokenProvider(b.authUrl, {
      apiKey: b.apiKey,
      userId: b.userId,
      password: b.password,
      totpSecret: b.totpSecret,
    });
  }
  return new StaticTokenProvider(b.accessToken);
}

async function main() {
  const today = tradeDate(Date.now(), cfg.tradeTz);
  const context = new SessionContext(cfg.broker.apiKey, tokenProvider());
  await context.refresh();

  const source = new HttpInstrumentSource(cfg.instruments.url, cfg.broker.apiKey, () => context.token);
  const universe = await source.listInstruments(today);

  let spot = new Map<string, number>();
  if (cfg.instruments.strikeRangePct !== undefined) {
    const quotes = new HttpSpotPriceSource(
      cfg.quoteUrl,
      cfg.broker.apiKey,
      () => context.token,
      cfg.instruments.underlyingExchange,
    );
    spot = await quotes.spotPrices(cfg.instruments.underlyings);
  }

  const { instruments: filtered, sets: partitions } = partition(
    universe,
    { asOf: today, ...cfg.instruments },
    cfg.sockets.count,
    cfg.sockets.maxPerConnection,
    spot,
  );
  partitions.forEach((p, idx) => logger.info({ socket: idx, instruments: p.length }, 'partition'));

  const symbols = new Map<number, SymbolInfo>(
    filtered.map((i) => [i.token, { tradingSymbol: i.tradingSymbol, underlying: i.underlying }]),
  );

  const writer = new RedisStreamWriter(getRedis(), {
    key: cfg.stream.name,
    maxLen: cfg.stream.maxLen,
    approximate: cfg.stream.approximate,
  });
  await writer.ensureGroup(cfg.stream.group);
  const publisher = new Publisher(writer, cfg.publish);

  manager = new SessionManager({
    url: cfg.broker.wsUrl,
    mode: cfg.sockets.mode,
    context,
    symbols,
    sink: (tick) => { void publisher.publish(tick); },
    reconnectBaseMs: cfg.sockets.reconnectBaseMs,
    reconnectMaxMs: cfg.sockets.reconnectMaxMs,
    staleAfterMs: cfg.sockets.staleAfterMs,
    authMaxRefreshes: cfg.sockets.authMaxRefreshes,
    startStaggerMs: 1000,
  });
  await manager.start(partitions);

  const m = manager;
  if (cfg.opsPort > 0) {
    opsServer = startOpsServer(cfg.opsPort, { health: () => m.health(), redis: redisHealth });
  }
  if (cfg.statsIntervalMs > 0) {
    statsTimer = setInterval(() => {
      logger.info({ ...m.totals(), health: m.health().status, publisher: publisher.snapshot() }, 'connector stats');
    }, cfg.statsIntervalMs).unref();
  }

  logger.info(
    {
      env: cfg.env,
      tradingDate: today,
      underlyings: cfg.instruments.underlyings,
      instruments: filtered.length,
      sockets: partitions.filter((p) => p.length).length,
      stream: cfg.stream.name,
    },
    'connector started',
  );
}

let closing = false;
async function shutdown(sig: string, code = 0) {
  if (closing) return;
  closing = true;
  logger.warn({ sig }, 'connector shutting down');

  if (statsTimer) clearInterval(statsTimer);
  try {
    await manager?.stop(cfg.sockets.stopTimeoutMs);
  } catch (e) {
    logger.error({ err: e }, 'error stopping sockets');
  }
  const srv = opsServer;
  if (srv) await new Promise<void>((r) => srv.close(() => r()));
  try {
    await shutdownRedis();
  } catch (e) {
    logger.error({ err: e }, 'error shutting down redis');
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
  if (e instanceof CapacityExceeded) {
    logger.fatal({ required: e.required, capacity: e.capacity }, e.message);
  } else {
    logger.fatal({ err: e }, 'connector fatal');
  }
  void shutdown('fatal', 1);
});
