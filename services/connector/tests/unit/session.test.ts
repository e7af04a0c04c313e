import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SocketSession, type SessionOptions, type TokenSource } from '../../src/socket/session.js';
import { backoffDelay } from '../../src/socket/backoff.js';
import { AuthRejected } from '../../src/errors.js';
import type { Tick } from '../../src/types/domain.js';
import { fakeTransports, frame, ltpPacket } from './helpers/fake-transport.js';

const NOW_MS = 1_700_000_000_000;
const auth: TokenSource = { apiKey: 'test-key', token: 'test-token', tokenGeneration: 1 };
const SUBSCRIBE = '{"a":"subscribe","v":[408065,256265]}';
const MODE = '{"a":"mode","v":["full",[408065,256265]]}';

function makeSession(overrides: Partial<SessionOptions> = {}) {
  const transports = fakeTransports();
  const onTicks = vi.fn<[Tick[]], void>();
  const session = new SocketSession({
    id: 0,
    url: 'wss://broker.test',
    tokens: [408065, 256265],
    mode: 'full',
    auth,
    symbols: new Map([[408065, { tradingSymbol: 'INFY', underlying: 'INFY' }]]),
    onTicks,
    reconnectBaseMs: 1000,
    reconnectMaxMs: 8000,
    transport: transports.factory,
    now: () => NOW_MS,
    ...overrides,
  });
  return { session, transports, onTicks };
}

describe('SocketSession', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('connects with the session credentials and subscribes on open', () => {
    const { session, transports } = makeSession();
    session.start();
    expect(session.currentState).toBe('connecting');

    const t = transports.last();
    const url = new URL(t.url);
    expect(url.searchParams.get('api_key')).toBe('test-key');
    expect(url.searchParams.get('access_token')).toBe('test-token');

    t.handlers.onOpen();
    expect(t.sent).toEqual([SUBSCRIBE, MODE]);
    expect(session.currentState).toBe('subscribed');
  });

  it('resubscribes exactly once per reconnect and ignores the abandoned transport', () => {
    const { session, transports } = makeSession();
    session.start();
    transports.last().handlers.onOpen();

    transports.created[0].handlers.onClose(1006, 'abnormal');
    expect(session.currentState).toBe('error');
    expect(transports.created[0].terminated).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(transports.created).toHaveLength(2);
    transports.created[1].handlers.onOpen();
    expect(transports.created[1].sent).toEqual([SUBSCRIBE, MODE]);

    // late events from the old connection change nothing
    transports.created[0].handlers.onOpen();
    transports.created[0].handlers.onClose(1006, 'late');
    expect(transports.created[1].sent).toHaveLength(2);
    expect(transports.created[0].sent).toHaveLength(2);
    expect(session.currentState).toBe('subscribed');
  });

  it('backs off exponentially between failed attempts', () => {
    const { session, transports } = makeSession();
    session.start();
    transports.last().handlers.onClose(1006, '');
    vi.advanceTimersByTime(1000);
    expect(transports.created).toHaveLength(2);

    transports.last().handlers.onError(new Error('ECONNRESET'));
    vi.advanceTimersByTime(1999);
    expect(transports.created).toHaveLength(2);
    vi.advanceTimersByTime(1);
    expect(transports.created).toHaveLength(3);
    expect(session.status()).toMatchObject({ reconnects: 2, lastError: 'ECONNRESET' });
  });

  it('caps the backoff delay', () => {
    expect(backoffDelay(1, 1000, 8000)).toBe(1000);
    expect(backoffDelay(3, 1000, 8000)).toBe(4000);
    expect(backoffDelay(10, 1000, 8000)).toBe(8000);
  });

  it('reports a refused upgrade as an auth rejection and does not retry on its own', () => {
    const onAuthRejected = vi.fn();
    const { session, transports } = makeSession({ onAuthRejected });
    session.start();
    transports.last().handlers.onRejected(403);

    expect(session.currentState).toBe('error');
    expect(onAuthRejected).toHaveBeenCalledWith(session);
    expect(session.status()).toMatchObject({
      authRejected: true,
      lastError: 'auth rejected: upgrade refused with HTTP 403',
    });
    vi.advanceTimersByTime(60_000);
    expect(transports.created).toHaveLength(1);
  });

  it('treats other refused upgrades as transport errors', () => {
    const { session, transports } = makeSession();
    session.start();
    transports.last().handlers.onRejected(502);
    expect(session.status().authRejected).toBe(false);
    vi.advanceTimersByTime(1000);
    expect(transports.created).toHaveLength(2);
  });

  it('reports a missing token without opening a transport', () => {
    const onAuthRejected = vi.fn();
    const noToken: TokenSource = {
      apiKey: 'test-key',
      tokenGeneration: 0,
      get token(): string {
        throw new AuthRejected('no token');
      },
    };
    const { session, transports } = makeSession({ auth: noToken, onAuthRejected });
    session.start();
    expect(transports.created).toHaveLength(0);
    expect(onAuthRejected).toHaveBeenCalledTimes(1);
    expect(session.status().lastError).toBe('auth rejected: no token');
  });

  it('drops malformed packets and forwards the rest with symbols attached', () => {
    const { session, transports, onTicks } = makeSession();
    session.start();
    const t = transports.last();
    t.handlers.onOpen();
    t.handlers.onMessage(frame(Buffer.alloc(10), ltpPacket(408065, 150025), ltpPacket(778, 100)), true);

    expect(onTicks).toHaveBeenCalledTimes(1);
    expect(onTicks.mock.calls[0][0]).toEqual([
      {
        instrumentToken: 408065,
        tradingSymbol: 'INFY',
        underlying: 'INFY',
        tradable: true,
        mode: 'ltp',
        exchangeTs: 1_700_000_000,
        lastPrice: 1500.25,
      },
      {
        instrumentToken: 778,
        tradingSymbol: 'TOKEN_778',
        tradable: true,
        mode: 'ltp',
        exchangeTs: 1_700_000_000,
        lastPrice: 1,
      },
    ]);
    expect(session.status()).toMatchObject({ ticks: 2, decodeErrors: 1, lastTickAt: NOW_MS, state: 'subscribed' });
  });

  it('keeps receiving when the tick handler throws', () => {
    const { session, transports, onTicks } = makeSession();
    onTicks.mockImplementation(() => {
      throw new Error('sink broke');
    });
    session.start();
    const t = transports.last();
    t.handlers.onOpen();
    t.handlers.onMessage(frame(ltpPacket(408065, 1)), true);
    t.handlers.onMessage(frame(ltpPacket(408065, 2)), true);
    expect(onTicks).toHaveBeenCalledTimes(2);
    expect(session.currentState).toBe('subscribed');
  });

  it('fails on a server error text frame', () => {
    const { session, transports } = makeSession();
    session.start();
    const t = transports.last();
    t.handlers.onOpen();
    t.handlers.onMessage(Buffer.from('{"type":"error","data":"bad subscription"}'), false);
    expect(session.currentState).toBe('error');
    expect(session.status().lastError).toBe('server error: "bad subscription"');
  });

  it('reconnects when the connection goes quiet', () => {
    const { session, transports } = makeSession({ staleAfterMs: 5000 });
    session.start();
    const t = transports.last();
    t.handlers.onOpen();

    vi.advanceTimersByTime(4000);
    t.handlers.onMessage(Buffer.from([0]), true); // heartbeat re-arms the watchdog
    vi.advanceTimersByTime(4999);
    expect(session.currentState).toBe('subscribed');

    vi.advanceTimersByTime(1);
    expect(session.currentState).toBe('error');
    expect(session.status().lastError).toBe('no frames for 5000ms');
  });

  it('stops cleanly when the server acknowledges the close', async () => {
    const { session, transports } = makeSession();
    session.start();
    const t = transports.last();
    t.handlers.onOpen();

    await session.stop(1000);
    expect(t.closed).toBe(true);
    expect(t.terminated).toBe(false);
    expect(session.currentState).toBe('disconnected');

    vi.advanceTimersByTime(60_000);
    expect(transports.created).toHaveLength(1);
  });

  it('terminates a transport that does not close in time', async () => {
    const transports = fakeTransports({ autoClose: false });
    const { session } = makeSession({ transport: transports.factory });
    session.start();
    const t = transports.last();
    t.handlers.onOpen();

    const stopped = session.stop(1000);
    await vi.advanceTimersByTimeAsync(1000);
    await stopped;
    expect(t.terminated).toBe(true);
    expect(session.currentState).toBe('disconnected');
  });

  it('stays down after a halt', () => {
    const { session, transports } = makeSession();
    session.start();
    session.halt('gave up');
    session.reconnect();
    vi.advanceTimersByTime(60_000);
    expect(transports.created).toHaveLength(1);
    expect(session.status()).toMatchObject({ halted: true, lastError: 'gave up' });
  });
});
