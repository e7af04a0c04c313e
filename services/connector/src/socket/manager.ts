import { logger } from '../utils/logger.js';
import type { SessionContext } from '../auth/session-context.js';
import type { SubscriptionSet, Tick, TickMode } from '../types/domain.js';
import { SocketSession, type SessionStatus, type SymbolInfo } from './session.js';
import type { TransportFactory } from './transport.js';

export type HealthStatus = 'ok' | 'degraded' | 'down';

export type ManagerHealth = {
  status: HealthStatus;
  sessions: SessionStatus[];
};

export type ManagerOptions = {
  url: string;
  mode: TickMode;
  context: SessionContext;
  symbols: ReadonlyMap<number, SymbolInfo>;
  /** Single outbound path for every socket; must not block. */
  sink: (tick: Tick) => void;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  staleAfterMs?: number;
  /** Consecutive token refreshes a socket may ask for before it is halted. */
  authMaxRefreshes?: number;
  startStaggerMs?: number;
  transport?: TransportFactory;
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class SessionManager {
  private sessions: SocketSession[] = [];
  private readonly authFailures = new Map<number, number>();

  constructor(private readonly opts: ManagerOptions) {}

  /** One socket per non-empty subscription set, all feeding the same sink. */
  async start(partitions: readonly SubscriptionSet[]): Promise<void> {
    if (this.sessions.length) throw new Error('session manager already started');

    const active = partitions.filter((p) => p.length > 0);
    if (!active.length) {
      logger.warn('no instruments to subscribe');
      return;
    }

    const sink = this.opts.sink;
    const onTicks = (ticks: Tick[]) => {
      for (const t of ticks) sink(t);
    };

    for (const [idx, tokens] of active.entries()) {
      const session = new SocketSession({
        id: idx,
        url: this.opts.url,
        tokens,
        mode: this.opts.mode,
        auth: this.opts.context,
        symbols: this.opts.symbols,
        onTicks,
        onAuthRejected: (s) => { void this.recoverAuth(s); },
        onStateChange: (state) => {
          if (state === 'subscribed') this.authFailures.delete(idx);
        },
        reconnectBaseMs: this.opts.reconnectBaseMs,
        reconnectMaxMs: this.opts.reconnectMaxMs,
        staleAfterMs: this.opts.staleAfterMs,
        transport: this.opts.transport,
      });
      this.sessions.push(session);
      session.start();
      // the broker throttles bursts of handshakes from one key
      if (idx < active.length - 1 && this.opts.startStaggerMs) await sleep(this.opts.startStaggerMs);
    }
    logger.info({ sockets: this.sessions.length }, 'socket sessions started');
  }

  /** Asks every socket to close, then force-terminates whatever is left after `timeoutMs`. */
  async stop(timeoutMs = 5000): Promise<void> {
    const sessions = this.sessions;
    this.sessions = [];
    await Promise.all(sessions.map((s) => s.stop(timeoutMs)));
    for (const s of sessions) {
      if (s.currentState !== 'disconnected') s.terminate();
    }
    logger.info({ sockets: sessions.length }, 'socket sessions stopped');
  }

  health(): ManagerHealth {
    const sessions = this.sessions.map((s) => s.status());
    return { status: aggregateHealth(sessions), sessions };
  }

  totals(): { ticks: number; subscribed: number; sockets: number } {
    const sessions = this.sessions.map((s) => s.status());
    return {
      ticks: sessions.reduce((n, s) => n + s.ticks, 0),
      subscribed: sessions.filter((s) => s.state === 'subscribed').length,
      sockets: sessions.length,
    };
  }

  private async recoverAuth(session: SocketSession): Promise<void> {
    // another socket already refreshed since this one read its token
    if (session.tokenGeneration < this.opts.context.tokenGeneration) {
      logger.info({ socket: session.id }, 'rejected token already replaced; reconnecting');
      session.reconnect();
      return;
    }

    const failures = (this.authFailures.get(session.id) ?? 0) + 1;
    this.authFailures.set(session.id, failures);

    const budget = this.opts.authMaxRefreshes ?? 3;
    if (failures > budget) {
      session.halt(`token rejected ${failures} times in a row`);
      return;
    }

    try {
      await this.opts.context.refresh();
      session.reconnect();
    } catch (err) {
      logger.error({ socket: session.id, err }, 'token refresh failed');
      session.halt('token refresh failed');
    }
  }
}

export function aggregateHealth(sessions: readonly SessionStatus[]): HealthStatus {
  if (!sessions.length) return 'down';
  if (sessions.some((s) => s.halted)) return 'down';
  const subscribed = sessions.filter((s) => s.state === 'subscribed').length;
  if (subscribed === sessions.length) return 'ok';
  return subscribed > 0 ? 'degraded' : 'down';
}
