import { Registry, collectDefaultMetrics, Counter, Gauge } from 'prom-client';
export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const consumed = new Counter({ name: 'receiver_consumed_total', help: 'Stream entries read', labelNames: ['source'], registers: [registry] });
export const acked = new Counter({ name: 'receiver_acked_total', help: 'Stream entries acknowledged', registers: [registry] });
export const decodeErrors = new Counter({ name: 'receiver_decode_errors_total', help: 'Entries dropped as undecodable', registers: [registry] });
export const storeErrors = new Counter({ name: 'receiver_store_errors_total', help: 'Entries left pending after a ledger failure', registers: [registry] });
export const flushRows = new Counter({ name: 'receiver_flush_rows_total', help: 'Rows written to durable storage', labelNames: ['table'], registers: [registry] });
export const commitFailures = new Counter({ name: 'receiver_commit_failures_total', help: 'Flushes rolled back', registers: [registry] });
export const pendingRows = new Gauge({ name: 'receiver_pending_rows', help: 'Ticks waiting for the next flush', registers: [registry] });
