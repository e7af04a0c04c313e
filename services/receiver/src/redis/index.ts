import { Redis } from 'ioredis';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';

// Shared client for ledger writes and acks; blocking reads get their own
// connection so XREADGROUP BLOCK never stalls the pipeline.
let primary: Redis | null = null;
let reader: Redis | null = null;

function attachLoggers(client: Redis, label: string) {
  client.on('connect',    () => logger.info({ label }, 'redis connect'));
  client.on('ready',      () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',        () => logger.warn({ label }, 'redis end'));
  client.on('error',      (err) => logger.error({ label, err }, 'redis error'));
}

export function getRedis(): Redis {
  if (!primary) {
    primary = new Redis(cfg.redisUrl, {
      maxRetriesPerRequest: null,
      enableAutoPipelining: true,
      lazyConnect: false,
    });
    attachLoggers(primary, 'primary');
  }
  return primary;
}

export function getReader(): Redis {
  if (!reader) {
    reader = getRedis().duplicate();
    attachLoggers(reader, 'reader');
  }
  return reader;
}

export async function shutdownRedis(): Promise<void> {
  const clients = [reader, primary].filter((c): c is Redis => c !== null);
  reader = null;
  primary = null;
  await Promise.all(clients.map((c) => c.quit().catch(() => c.disconnect())));
}
