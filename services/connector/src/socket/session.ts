import { TransportError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { decodeErrors, reconnects, sessionState, ticksReceived } from '../metrics/metrics.js';
import type { SubscriptionSet, Tick, TickMode } from '../types/domain.js';
import { backoffDelay } from './backoff.js';
import { decodeFrame, modeRequest, parseTextFrame, subscribeRequest } from './codec.js';
import { wsTransport, type Transport, type TransportFactory } from './transport.js';

export type SessionState = 'disconnected' | 'connecting' | 'subscribed' | 'error';

/** What a socket needs from the session context on every connect. */
export interface TokenSource {
  readonly apiKey: string;
  readonly token: string; // throws AuthRejected when none is held
  readonly tokenGeneration: number;
}

export type SymbolInfo = { tradingSymbol: string; underlying?: string };

export type SessionOptions = {
  id: number;
  url: string;
  tokens: SubscriptionSet;
  mode: TickMode;
  auth: TokenSource;
  symbols: ReadonlyMap<number, SymbolInfo>;
  /** Must not block: ticks are handed off synchronously from the receive path. */
  onTicks: (ticks: Tick[]) => void;
  onAuthRejected?: (session: SocketSession) => void;
  onStateChange?: (state: SessionState, prev: SessionState) => void;
  reconnectBaseMs?: number;
  reconnectMaxMs?: number;
  staleAfterMs?: number;
  transport?: TransportFactory;
  now?: () => number;
};

export type SessionStatus = {
  id: number;
  state: SessionState;
  instruments: number;
  ticks: number;
  decodeErrors: number;
  reconnects: number;
  lastTickAt: number | null;
  lastError: string | null;
  authRejected: boolean;
  halted: boolean;
};

export class SocketSession {
  readonly id: number;
  private state: SessionState = 'disconnected';
  private transport: Transport | null = null;
  private conn = 0; // bumped whenever the current transport is abandoned
  private attempt = 0;
  private usedGeneration = 0;
  private stopped = true;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private staleTimer: NodeJS.Timeout | null = null;
  private closeWaiter: (() => void) | null = null;

  private tickCount = 0;
  private decodeErrorCount = 0;
  private reconnectCount = 0;
  private lastTickAt: number | null = null;
  private lastError: string | null = null;
  private authRejected = false;
  private halted = false;

  private readonly label: string;
  private readonly newTransport: TransportFactory;
  private readonly now: () => number;

  constructor(private readonly opts: SessionOptions) {
    this.id = opts.id;
    this.label = String(opts.id);
    this.newTransport = opts.transport ?? wsTransport;
    this.now = opts.now ?? Date.now;
  }

  get currentState(): SessionState {
    return this.state;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.halted = false;
    this.connect();
  }

  /** Reconnect straight away, e.g. after the owner refreshed the token. */
  reconnect(): void {
    if (this.stopped || this.halted) return;
    this.clearTimers();
    this.abandonTransport();
    this.authRejected = false;
    this.connect();
  }

  /** Marks the session as fatally failed; it stays down until started again. */
  halt(reason: string): void {
    this.lastError = reason;
    this.halted = true;
    this.stopped = true;
    this.clearTimers();
    this.abandonTransport();
    logger.error({ socket: this.id, reason }, 'socket halted');
  }

  /** Closes the transport and waits for the close, terminating it after `timeoutMs`. */
  async stop(timeoutMs = 5000): Promise<void> {
    this.stopped = true;
    this.clearTimers();
    const t = this.transport;
    if (!t) {
      this.setState('disconnected');
      return;
    }

    const closed = new Promise<void>((resolve) => { this.closeWaiter = resolve; });
    t.close();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    const res = await Promise.race([closed, timedOut]);
    clearTimeout(timer);
    if (res === 'timeout') {
      logger.warn({ socket: this.id, timeoutMs }, 'socket did not close in time; terminating');
      this.terminate();
    }
  }

  /** Hard stop without waiting for the close handshake. */
  terminate(): void {
    this.stopped = true;
    this.clearTimers();
    this.abandonTransport();
    this.setState('disconnected');
    this.settleClose();
  }

  /** Generation of the token this socket last connected with. */
  get tokenGeneration(): number {
    return this.usedGeneration;
  }

  status(): SessionStatus {
    return {
      id: this.id,
      state: this.state,
      instruments: this.opts.tokens.length,
      ticks: this.tickCount,
      decodeErrors: this.decodeErrorCount,
      reconnects: this.reconnectCount,
      lastTickAt: this.lastTickAt,
      lastError: this.lastError,
      authRejected: this.authRejected,
      halted: this.halted,
    };
  }

  // ---- connection lifecycle ----

  private connect(): void {
    if (this.stopped) return;
    this.setState('connecting');

    let token: string;
    try {
      token = this.opts.auth.token;
      this.usedGeneration = this.opts.auth.tokenGeneration;
    } catch (err) {
      this.onAuthRejected(err instanceof Error ? err.message : String(err));
      return;
    }

    const url = new URL(this.opts.url);
    url.searchParams.set('api_key', this.opts.auth.apiKey);
    url.searchParams.set('access_token', token);

    const conn = ++this.conn;
    const live = () => conn === this.conn;
    this.transport = this.newTransport(url.toString(), {
      onOpen: () => { if (live()) this.onOpen(); },
      onMessage: (data, isBinary) => { if (live()) this.onMessage(data, isBinary); },
      onClose: (code, reason) => { if (live()) this.onClose(code, reason); },
      onError: (err) => { if (live()) this.fail(new TransportError(err.message, { cause: err })); },
      onRejected: (status) => {
        if (!live()) return;
        if (status === 401 || status === 403) this.onAuthRejected(`upgrade refused with HTTP ${status}`);
        else this.fail(new TransportError(`upgrade refused with HTTP ${status}`));
      },
    });
  }

  private onOpen(): void {
    const t = this.transport;
    if (!t) return;
    this.attempt = 0;
    const tokens = this.opts.tokens;
    logger.info({ socket: this.id, count: tokens.length, mode: this.opts.mode }, 'socket connected, subscribing');
    if (tokens.length) {
      t.send(subscribeRequest(tokens));
      t.send(modeRequest(this.opts.mode, tokens));
    }
    this.setState('subscribed');
    this.armWatchdog();
  }

  private onMessage(data: Buffer, isBinary: boolean): void {
    this.armWatchdog();

    if (!isBinary) {
      const frame = parseTextFrame(data.toString('utf8'));
      if (frame?.type === 'error') {
        this.fail(new TransportError(`server error: ${JSON.stringify(frame.data)}`));
      } else if (frame) {
        logger.debug({ socket: this.id, type: frame.type }, 'socket text frame');
      }
      return;
    }

    const nowMs = this.now();
    const { ticks, errors } = decodeFrame(data, Math.floor(nowMs / 1000));
    for (const err of errors) {
      this.decodeErrorCount++;
      decodeErrors.inc({ socket: this.label });
      logger.warn({ socket: this.id, err: err.message }, 'dropping malformed packet');
    }
    if (!ticks.length) return;

    this.tickCount += ticks.length;
    this.lastTickAt = nowMs;
    ticksReceived.inc({ socket: this.label }, ticks.length);

    const enriched: Tick[] = ticks.map((t) => {
      const info = this.opts.symbols.get(t.instrumentToken);
      return {
        ...t,
        tradingSymbol: info?.tradingSymbol ?? `TOKEN_${t.instrumentToken}`,
        ...(info?.underlying ? { underlying: info.underlying } : {}),
      };
    });
    try {
      this.opts.onTicks(enriched);
    } catch (err) {
      logger.error({ socket: this.id, err }, 'tick handler threw');
    }
  }

  private onClose(code: number, reason: string): void {
    if (this.stopped) {
      this.transport = null;
      this.setState('disconnected');
      this.settleClose();
      return;
    }
    this.fail(new TransportError(`closed by server [${code}] ${reason}`));
  }

  private onAuthRejected(reason: string): void {
    this.clearTimers();
    this.abandonTransport();
    this.authRejected = true;
    this.lastError = `auth rejected: ${reason}`;
    this.setState('error');
    logger.error({ socket: this.id, reason }, 'session token rejected');
    this.opts.onAuthRejected?.(this);
  }

  /** Transport-level failure: error state, then reconnect after a capped backoff. */
  private fail(err: TransportError): void {
    if (this.stopped) return;
    this.clearTimers();
    this.abandonTransport();
    this.lastError = err.message;
    this.setState('error');

    this.attempt++;
    this.reconnectCount++;
    reconnects.inc({ socket: this.label });
    const delay = backoffDelay(this.attempt, this.opts.reconnectBaseMs ?? 1000, this.opts.reconnectMaxMs ?? 60_000);
    logger.warn({ socket: this.id, err: err.message, attempt: this.attempt, delay }, 'socket failed; reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect();
    }, delay);
  }

  // ---- helpers ----

  private armWatchdog(): void {
    const ms = this.opts.staleAfterMs ?? 0;
    if (!ms) return;
    if (this.staleTimer) clearTimeout(this.staleTimer);
    this.staleTimer = setTimeout(() => {
      this.staleTimer = null;
      this.fail(new TransportError(`no frames for ${ms}ms`));
    }, ms);
  }

  private abandonTransport(): void {
    this.conn++;
    const t = this.transport;
    this.transport = null;
    if (t) t.terminate();
  }

  private clearTimers(): void {
    if (this.reconnectTimer) { clearTimeout(this.reconnectTimer); this.reconnectTimer = null; }
    if (this.staleTimer) { clearTimeout(this.staleTimer); this.staleTimer = null; }
  }

  private settleClose(): void {
    const w = this.closeWaiter;
    this.closeWaiter = null;
    w?.();
  }

  private setState(next: SessionState): void {
    const prev = this.state;
    if (prev === next) return;
    this.state = next;
    sessionState.set({ socket: this.label }, next === 'subscribed' ? 1 : 0);
    logger.debug({ socket: this.id, from: prev, to: next }, 'socket state');
    this.opts.onStateChange?.(next, prev);
  }
}
