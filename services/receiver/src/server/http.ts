import http from 'node:http';
import { logger } from '../utils/logger.js';
import { registry } from '../metrics/metrics.js';

export type OpsProbes = {
  redis: () => Promise<boolean>;
  db: () => Promise<boolean>;
  pending: () => number;
};

async function check(probe: () => Promise<boolean>): Promise<'ok' | 'fail'> {
  try {
    return (await probe()) ? 'ok' : 'fail';
  } catch {
    return 'fail';
  }
}

export function startOpsServer(port: number, probes: OpsProbes) {
  const server = http.createServer(async (req, res) => {
    try {
      if (!req.url) {
        res.statusCode = 400;
        res.end('bad request');
        return;
      }
      if (req.url === '/ops/health/liveness') {
        res.setHeader('content-type', 'application/json');
        res.end(JSON.stringify({ ok: true }));
        return;
      }
      if (req.url === '/ops/health/readiness') {
        const checks = { redis: await check(probes.redis), db: await check(probes.db) };
        const ready = checks.redis === 'ok' && checks.db === 'ok';
        res.statusCode = ready ? 200 : 503;
        res.setHeader('content-type', 'application/json');
        res.end(JSON.stringify({ status: ready ? 'ready' : 'not_ready', checks, pending: probes.pending() }));
        return;
      }
      if (req.url === '/ops/metrics') {
        res.setHeader('content-type', registry.contentType);
        res.end(await registry.metrics());
        return;
      }

      // default 404
      res.statusCode = 404;
      res.setHeader('content-type', 'application/json');
      res.end(JSON.stringify({ error: { code: 'NOT_FOUND', message: 'unknown path' } }));
    } catch (err) {
      logger.error({ err }, 'ops request failed');
      res.statusCode = 500;
      res.setHeader('content-type', 'application/json');
      res.end(JSON.stringify({ error: { code: 'INTERNAL', message: 'unexpected error' } }));
    }
  });

  server.listen(port, () => {
    logger.info({ port }, 'ops server listening');
  });

  return server;
}
