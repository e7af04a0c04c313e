import { fetch } from 'undici';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import type { Instrument } from '../types/domain.js';

export interface InstrumentSource {
  listInstruments(tradingDate: string): Promise<Instrument[]>;
}

export interface SpotPriceSource {
  /** Last traded spot price per underlying; underlyings it cannot price are left out. */
  spotPrices(underlyings: readonly string[]): Promise<Map<string, number>>;
}

// index spots trade under a display name, derivatives under the short name
const SPOT_ALIASES: Record<string, string> = {
  'NIFTY 50': 'NIFTY',
  'NIFTY BANK': 'BANKNIFTY',
  'NIFTY FIN SERVICE': 'FINNIFTY',
  'NIFTY MID SELECT': 'MIDCPNIFTY',
  SENSEX: 'SENSEX',
};

const SPOT_NAMES: Record<string, string> = Object.fromEntries(
  Object.entries(SPOT_ALIASES).map(([name, underlying]) => [underlying, name]),
);
const BSE_SPOTS = new Set(['SENSEX']);

/** Quote key of an underlying's spot, e.g. NIFTY -> NSE:NIFTY 50. */
export function spotQuoteKey(underlying: string, spotExchange: string): string {
  const exchange = BSE_SPOTS.has(underlying) ? 'BSE' : spotExchange;
  return `${exchange}:${SPOT_NAMES[underlying] ?? underlying}`;
}

const LtpResponse = z.object({
  data: z.record(z.object({ last_price: z.number() })),
});

const num = z.coerce.number();

export const InstrumentRow = z.object({
  instrument_token: z.coerce.number().int().positive(),
  tradingsymbol: z.string().min(1),
  name: z.string().default(''),
  expiry: z.string().default(''),
  strike: num.default(0),
  instrument_type: z.string(),
  segment: z.string().default(''),
  exchange: z.string(),
});
export type InstrumentRow = z.infer<typeof InstrumentRow>;

/** Maps one dump row to the closed instrument variant; unsupported types yield null. */
export function toInstrument(row: InstrumentRow): Instrument | null {
  const base = {
    token: row.instrument_token,
    tradingSymbol: row.tradingsymbol,
    exchange: row.exchange,
  };
  const underlying = row.name.toUpperCase();

  switch (row.instrument_type) {
    case 'CE':
    case 'PE':
      if (!row.expiry) return null;
      return { ...base, underlying, kind: row.instrument_type === 'CE' ? 'call' : 'put', expiry: row.expiry, strike: row.strike };
    case 'FUT':
      if (!row.expiry) return null;
      return { ...base, underlying, kind: 'future', expiry: row.expiry };
    case 'EQ':
      return { ...base, underlying: SPOT_ALIASES[row.tradingsymbol] ?? row.tradingsymbol, kind: 'spot' };
    default:
      // index rows carry an empty type on some dumps
      if (row.segment === 'INDICES') {
        return { ...base, underlying: SPOT_ALIASES[row.tradingsymbol] ?? row.tradingsymbol, kind: 'spot' };
      }
      return null;
  }
}

export function parseInstrumentDump(csvText: string): Instrument[] {
  const records: unknown[] = parse(csvText, { columns: true, skip_empty_lines: true, trim: true });
  const out: Instrument[] = [];
  let invalid = 0;
  for (const rec of records) {
    const row = InstrumentRow.safeParse(rec);
    if (!row.success) { invalid++; continue; }
    const inst = toInstrument(row.data);
    if (inst) out.push(inst);
  }
  if (invalid) logger.warn({ invalid }, 'instrument rows failed validation');
  return out;
}

function brokerHeaders(apiKey: string, token: string): Record<string, string> {
  return { 'X-Kite-Version': '3', authorization: `token ${apiKey}:${token}` };
}

export class HttpInstrumentSource implements InstrumentSource {
  constructor(
    private readonly url: string,
    private readonly apiKey: string,
    private readonly token: () => string,
    private readonly timeoutMs = 30_000,
  ) {}

  async listInstruments(tradingDate: string): Promise<Instrument[]> {
    const res = await fetch(this.url, {
      headers: brokerHeaders(this.apiKey, this.token()),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) throw new Error(`instrument dump failed: HTTP ${res.status}`);
    const instruments = parseInstrumentDump(await res.text());
    logger.info({ tradingDate, count: instruments.length }, 'instrument master loaded');
    return instruments;
  }
}

/**
 * Spot prices from the broker's LTP quote endpoint, one request for every
 * underlying. A failed lookup is logged and yields no prices, which leaves the
 * strike window unapplied.
 */
export class HttpSpotPriceSource implements SpotPriceSource {
  constructor(
    private readonly url: string,
    private readonly apiKey: string,
    private readonly token: () => string,
    private readonly spotExchange: string,
    private readonly timeoutMs = 10_000,
  ) {}

  async spotPrices(underlyings: readonly string[]): Promise<Map<string, number>> {
    const prices = new Map<string, number>();
    if (!underlyings.length) return prices;

    const keys = new Map(underlyings.map((u) => [spotQuoteKey(u, this.spotExchange), u]));
    const url = new URL(this.url);
    for (const key of keys.keys()) url.searchParams.append('i', key);

    try {
      const res = await fetch(url.toString(), {
        headers: brokerHeaders(this.apiKey, this.token()),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) throw new Error(`spot quote failed: HTTP ${res.status}`);
      const body = LtpResponse.parse(await res.json());
      for (const [key, quote] of Object.entries(body.data)) {
        const underlying = keys.get(key);
        if (underlying) prices.set(underlying, quote.last_price);
      }
    } catch (err) {
      logger.warn({ err, underlyings }, 'could not fetch spot prices; strike window not applied');
      return prices;
    }

    const missing = underlyings.filter((u) => !prices.has(u));
    if (missing.length) logger.warn({ missing }, 'no spot price; keeping every strike');
    return prices;
  }
}
