// src/config/index.ts
import { z } from 'zod';

const csv = (s: string) =>
  s
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);

const Env = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  OPS_PORT: z.coerce.number().int().nonnegative().default(0),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),

  REDIS_URL: z.string().default('redis://127.0.0.1:6379'),
  STREAM_NAME: z.string().default('ticks:raw'),
  STREAM_MAXLEN: z.coerce.number().int().positive().default(100_000),
  STREAM_TRIM: z.enum(['exact', 'approx']).default('exact'),
  CONSUMER_GROUP: z.string().default('tick_processors'),

  // broker session
  BROKER_WS_URL: z.string().default('wss://ws.kite.trade'),
  BROKER_API_KEY: z.string().default(''),
  ACCESS_TOKEN: z.string().optional(),
  AUTH_URL: z.string().optional(),
  BROKER_USER_ID: z.string().default(''),
  BROKER_PASSWORD: z.string().default(''),
  BROKER_TOTP_SECRET: z.string().default(''),

  // instrument universe
  INSTRUMENTS_URL: z.string().default('https://api.kite.trade/instruments'),
  UNDERLYINGS: z.string().default('NIFTY'),
  EXCHANGE: z.string().default('NFO'),
  UNDERLYING_EXCHANGE: z.string().default('NSE'),
  INSTRUMENT_KINDS: z.string().default('call,put,future'),
  INCLUDE_UNDERLYING: z.union([z.literal('1'), z.literal('0')]).default('1'),
  WEEKLY_EXPIRIES: z.coerce.number().int().nonnegative().default(2),
  MONTHLY_EXPIRIES: z.coerce.number().int().nonnegative().default(2),
  STRIKE_RANGE_PCT: z.coerce.number().positive().optional(),
  QUOTE_URL: z.string().default('https://api.kite.trade/quote/ltp'),

  // sockets
  NUM_SOCKETS: z.coerce.number().int().min(1).max(3).default(3),
  MAX_PER_CONNECTION: z.coerce.number().int().positive().default(3000),
  TICK_MODE: z.enum(['ltp', 'quote', 'full']).default('full'),
  RECONNECT_BASE_MS: z.coerce.number().int().positive().default(1000),
  RECONNECT_MAX_MS: z.coerce.number().int().positive().default(60_000),
  STALE_AFTER_MS: z.coerce.number().int().nonnegative().default(10_000),
  AUTH_MAX_REFRESHES: z.coerce.number().int().nonnegative().default(3),
  STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // publisher
  PUBLISH_TIMEOUT_MS: z.coerce.number().int().positive().default(250),
  PUBLISH_MAX_INFLIGHT: z.coerce.number().int().positive().default(10_000),

  STATS_INTERVAL_MS: z.coerce.number().int().nonnegative().default(10_000),
  TRADE_TZ: z.string().default('Asia/Kolkata'),
});

const e = Env.parse(process.env);

const KINDS = ['spot', 'future', 'call', 'put'] as const;
type KindName = (typeof KINDS)[number];
const isKind = (s: string): s is KindName => (KINDS as readonly string[]).includes(s);

export const cfg = {
  env: e.NODE_ENV,
  opsPort: e.OPS_PORT,

  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',

  redisUrl: e.REDIS_URL,
  stream: {
    name: e.STREAM_NAME,
    maxLen: e.STREAM_MAXLEN,
    approximate: e.STREAM_TRIM === 'approx',
    group: e.CONSUMER_GROUP,
  },

  broker: {
    wsUrl: e.BROKER_WS_URL,
    apiKey: e.BROKER_API_KEY,
    accessToken: e.ACCESS_TOKEN,
    authUrl: e.AUTH_URL,
    userId: e.BROKER_USER_ID,
    password: e.BROKER_PASSWORD,
    totpSecret: e.BROKER_TOTP_SECRET,
  },

  instruments: {
    url: e.INSTRUMENTS_URL,
    underlyings: csv(e.UNDERLYINGS).map((s) => s.toUpperCase()),
    exchange: e.EXCHANGE,
    underlyingExchange: e.UNDERLYING_EXCHANGE,
    kinds: csv(e.INSTRUMENT_KINDS).filter(isKind),
    includeUnderlying: e.INCLUDE_UNDERLYING === '1',
    weeklyExpiries: e.WEEKLY_EXPIRIES,
    monthlyExpiries: e.MONTHLY_EXPIRIES,
    strikeRangePct: e.STRIKE_RANGE_PCT,
  },
  quoteUrl: e.QUOTE_URL,

  sockets: {
    count: e.NUM_SOCKETS,
    maxPerConnection: e.MAX_PER_CONNECTION,
    mode: e.TICK_MODE,
    reconnectBaseMs: e.RECONNECT_BASE_MS,
    reconnectMaxMs: e.RECONNECT_MAX_MS,
    staleAfterMs: e.STALE_AFTER_MS,
    authMaxRefreshes: e.AUTH_MAX_REFRESHES,
    stopTimeoutMs: e.STOP_TIMEOUT_MS,
  },

  publish: {
    timeoutMs: e.PUBLISH_TIMEOUT_MS,
    maxInFlight: e.PUBLISH_MAX_INFLIGHT,
  },

  statsIntervalMs: e.STATS_INTERVAL_MS,
  tradeTz: e.TRADE_TZ,
} as const;
