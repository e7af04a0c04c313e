import { Redis } from 'ioredis';
import { cfg } from '../config/index.js';
import { logger } from '../utils/logger.js';

let primary: Redis | null = null;

function attachLoggers(client: Redis, label: string) {
  client.on('ready',        () => logger.info({ label }, 'redis ready'));
  client.on('reconnecting', (delay: number) => logger.warn({ label, delay }, 'redis reconnecting'));
  client.on('end',          () => logger.warn({ label }, 'redis end'));
  client.on('error',        (err) => logger.error({ label, err }, 'redis error'));
}

export function getRedis(): Redis {
  if (!primary) {
    primary = new Redis(cfg.redisUrl, {
      maxRetriesPerRequest: 1,
      enableAutoPipelining: true,
      lazyConnect: false,
    });
    attachLoggers(primary, 'publisher');
  }
  return primary;
}

export async function redisHealth(): Promise<boolean> {
  try {
    return (await getRedis().ping()) === 'PONG';
  } catch {
    return false;
  }
}

export async function shutdownRedis(): Promise<void> {
  if (!primary) return;
  const c = primary;
  primary = null;
  await c.quit().catch(() => c.disconnect());
}
