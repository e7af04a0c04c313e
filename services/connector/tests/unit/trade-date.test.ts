import { describe, it, expect } from 'vitest';
import { tradeDate } from '../../src/utils/trade-date.js';

describe('tradeDate', () => {
  it('rolls over at midnight in the exchange time zone', () => {
    const lateUtc = Date.UTC(2024, 4, 6, 20, 0); // 01:30 next day in Kolkata
    expect(tradeDate(lateUtc, 'Asia/Kolkata')).toBe('2024-05-07');
    expect(tradeDate(lateUtc, 'UTC')).toBe('2024-05-06');
  });
});
