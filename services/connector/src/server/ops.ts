import http from 'node:http';
import { registry } from '../metrics/metrics.js';
import { logger } from '../utils/logger.js';
import type { ManagerHealth } from '../socket/manager.js';

export type OpsProbes = {
  health: () => ManagerHealth;
  redis: () => Promise<boolean>;
};

export function startOpsServer(port: number, probes: OpsProbes) {
  const server = http.createServer(async (req, res) => {
    try {
      const url = req.url || '/';
      if (url === '/ops/health/liveness') {
        res.writeHead(200, { 'content-type': 'application/json' });
        res.end(JSON.stringify({ ok: true }));
        return;
      }
      if (url === '/ops/health/readiness') {
        const sockets = probes.health();
        const redisOk = await probes.redis();
        const ready = sockets.status !== 'down' && redisOk;
        res.writeHead(ready ? 200 : 503, { 'content-type': 'application/json' });
        res.end(JSON.stringify({
          status: ready ? 'ready' : 'not_ready',
          checks: { redis: redisOk ? 'ok' : 'fail', sockets: sockets.status },
          sessions: sockets.sessions,
        }));
        return;
      }
      if (url === '/ops/metrics') {
        res.writeHead(200, { 'content-type': registry.contentType });
        res.end(await registry.metrics());
        return;
      }
      res.writeHead(404, { 'content-type': 'application/json' });
      res.end(JSON.stringify({ error: { code: 'NOT_FOUND', message: 'unknown path' } }));
    } catch (err) {
      logger.error({ err }, 'ops request failed');
      res.writeHead(500, { 'content-type': 'application/json' });
      res.end(JSON.stringify({ error: { code: 'INTERNAL', message: 'unexpected error' } }));
    }
  });

  server.listen(port, () => {
    logger.info({ port }, 'ops server listening');
  });
  return server;
}
