import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';

vi.mock('undici', () => ({ fetch: vi.fn() }));

import { fetch } from 'undici';
import {
  HttpInstrumentSource,
  HttpSpotPriceSource,
  parseInstrumentDump,
  spotQuoteKey,
  toInstrument,
} from '../../src/instruments/source.js';

const HEADER = 'instrument_token,exchange_token,tradingsymbol,name,last_price,expiry,strike,tick_size,lot_size,instrument_type,segment,exchange';
const DUMP = [
  HEADER,
  '256265,1001,NIFTY 50,NIFTY 50,0,,0,0,0,EQ,INDICES,NSE',
  '10001,39,NIFTY24MAY22000CE,NIFTY,0,2024-05-30,22000,0.05,50,CE,NFO-OPT,NFO',
  '10002,40,NIFTY24MAYFUT,NIFTY,0,2024-05-30,0,0.05,50,FUT,NFO-FUT,NFO',
  'abc,41,BROKEN,NIFTY,0,2024-05-30,0,0.05,50,FUT,NFO-FUT,NFO',
  '10003,42,ODDITY,NIFTY,0,2024-05-30,0,0.05,50,XX,NFO-OPT,NFO',
  '10004,43,NIFTY24MAY22000PE,NIFTY,0,,22000,0.05,50,PE,NFO-OPT,NFO',
].join('\n');

describe('instrument source', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('maps dump rows onto instrument variants and skips the rest', () => {
    expect(parseInstrumentDump(DUMP)).toEqual([
      { token: 256265, tradingSymbol: 'NIFTY 50', exchange: 'NSE', underlying: 'NIFTY', kind: 'spot' },
      {
        token: 10001,
        tradingSymbol: 'NIFTY24MAY22000CE',
        exchange: 'NFO',
        underlying: 'NIFTY',
        kind: 'call',
        expiry: '2024-05-30',
        strike: 22000,
      },
      {
        token: 10002,
        tradingSymbol: 'NIFTY24MAYFUT',
        exchange: 'NFO',
        underlying: 'NIFTY',
        kind: 'future',
        expiry: '2024-05-30',
      },
    ]);
  });

  it('treats index rows without a type as spots', () => {
    const inst = toInstrument({
      instrument_token: 260105,
      tradingsymbol: 'NIFTY BANK',
      name: 'NIFTY BANK',
      expiry: '',
      strike: 0,
      instrument_type: '',
      segment: 'INDICES',
      exchange: 'NSE',
    });
    expect(inst).toEqual({ token: 260105, tradingSymbol: 'NIFTY BANK', exchange: 'NSE', underlying: 'BANKNIFTY', kind: 'spot' });
  });

  it('downloads the dump with the session credentials', async () => {
    (fetch as unknown as Mock).mockResolvedValue({ ok: true, status: 200, text: async () => DUMP });
    const source = new HttpInstrumentSource('https://broker.test/instruments', 'test-key', () => 'test-token');

    const list = await source.listInstruments('2024-05-06');
    expect(list).toHaveLength(3);

    const [url, init] = (fetch as unknown as Mock).mock.calls[0];
    expect(url).toBe('https://broker.test/instruments');
    expect(init.headers).toEqual({ 'X-Kite-Version': '3', authorization: 'token test-key:test-token' });
  });

  it('fails on a non-2xx answer', async () => {
    (fetch as unknown as Mock).mockResolvedValue({ ok: false, status: 403, text: async () => '' });
    const source = new HttpInstrumentSource('https://broker.test/instruments', 'test-key', () => 'test-token');
    await expect(source.listInstruments('2024-05-06')).rejects.toThrow('instrument dump failed: HTTP 403');
  });

  it('names index spots by their quote key', () => {
    expect(spotQuoteKey('NIFTY', 'NSE')).toBe('NSE:NIFTY 50');
    expect(spotQuoteKey('SENSEX', 'NSE')).toBe('BSE:SENSEX');
    expect(spotQuoteKey('RELIANCE', 'NSE')).toBe('NSE:RELIANCE');
  });

  it('looks up spot prices for every underlying in one request', async () => {
    (fetch as unknown as Mock).mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => ({ data: { 'NSE:NIFTY 50': { instrument_token: 256265, last_price: 22010.5 } } }),
    });
    const quotes = new HttpSpotPriceSource('https://broker.test/quote/ltp', 'test-key', () => 'test-token', 'NSE');

    const prices = await quotes.spotPrices(['NIFTY', 'BANKNIFTY']);
    expect([...prices]).toEqual([['NIFTY', 22010.5]]);

    const [url, init] = (fetch as unknown as Mock).mock.calls[0];
    expect(new URL(url).searchParams.getAll('i')).toEqual(['NSE:NIFTY 50', 'NSE:NIFTY BANK']);
    expect(init.headers).toEqual({ 'X-Kite-Version': '3', authorization: 'token test-key:test-token' });
  });

  it('returns no spot prices when the quote call fails', async () => {
    (fetch as unknown as Mock).mockResolvedValue({ ok: false, status: 429, json: async () => ({}) });
    const quotes = new HttpSpotPriceSource('https://broker.test/quote/ltp', 'test-key', () => 'test-token', 'NSE');
    await expect(quotes.spotPrices(['NIFTY'])).resolves.toEqual(new Map());
  });
});
