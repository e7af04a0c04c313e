import { describe, it, expect } from 'vitest';
import { decodeTick } from '../../src/types/tick.js';
import { DecodeError } from '../../src/errors.js';

const wire = {
  instrumentToken: 408065,
  tradingSymbol: 'INFY',
  mode: 'full',
  tradable: true,
  exchangeTs: 1_700_000_000,
  lastPrice: 1500.25,
  volume: 120000,
  depth: { buy: [{ price: 1500, quantity: 10, orders: 1 }], sell: [{ price: 1500.5, quantity: 5, orders: 2 }] },
};

describe('decodeTick', () => {
  it('accepts the connector payload', () => {
    expect(decodeTick('1-0', JSON.stringify(wire))).toEqual(wire);
  });

  it('defaults tradable when absent', () => {
    const { tradable: _omit, ...rest } = wire;
    expect(decodeTick('1-0', JSON.stringify(rest)).tradable).toBe(true);
  });

  it('rejects non-JSON payloads', () => {
    expect(() => decodeTick('2-0', '{oops')).toThrow(new DecodeError('2-0', 'payload is not JSON'));
  });

  it('names the first invalid field', () => {
    const bad = JSON.stringify({ ...wire, lastPrice: 'n/a' });
    expect(() => decodeTick('3-0', bad)).toThrow('entry 3-0: lastPrice: Expected number, received string');
  });

  it('rejects entries whose fields were trimmed away', () => {
    expect(() => decodeTick('4-0', null)).toThrow('entry 4-0: missing data field');
  });
});
