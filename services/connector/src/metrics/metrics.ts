import { Registry, collectDefaultMetrics, Counter, Gauge } from 'prom-client';
export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const ticksReceived = new Counter({
  name: 'connector_ticks_received_total',
  help: 'Ticks decoded from broker sockets',
  labelNames: ['socket'],
  registers: [registry],
});
export const decodeErrors = new Counter({
  name: 'connector_decode_errors_total',
  help: 'Malformed socket packets dropped',
  labelNames: ['socket'],
  registers: [registry],
});
export const reconnects = new Counter({
  name: 'connector_reconnects_total',
  help: 'Socket reconnect attempts',
  labelNames: ['socket'],
  registers: [registry],
});
export const sessionState = new Gauge({
  name: 'connector_session_subscribed',
  help: '1 when the socket session is subscribed, 0 otherwise',
  labelNames: ['socket'],
  registers: [registry],
});
export const published = new Counter({
  name: 'connector_published_total',
  help: 'Ticks appended to the stream',
  registers: [registry],
});
export const dropped = new Counter({
  name: 'connector_dropped_total',
  help: 'Ticks the publisher gave up on; reason="timeout" means the outcome was unknown at the time',
  labelNames: ['reason'],
  registers: [registry],
});
export const publishLate = new Counter({
  name: 'connector_publish_late_total',
  help: 'Writes already counted as dropped{reason="timeout"} that settled afterwards, by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});
export const publishInFlight = new Gauge({
  name: 'connector_publish_inflight',
  help: 'Stream writes awaiting acknowledgement',
  registers: [registry],
});
