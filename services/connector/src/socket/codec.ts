import { z } from 'zod';
import { DecodeError } from '../errors.js';
import type { Depth, DepthLevel, Tick, TickMode } from '../types/domain.js';

export type WireTick = Omit<Tick, 'tradingSymbol' | 'underlying'>;

export type DecodeResult = { ticks: WireTick[]; errors: DecodeError[] };

// packet sizes on the binary feed
const LTP = 8;
const INDEX_QUOTE = 28;
const INDEX_FULL = 32;
const QUOTE = 44;
const FULL = 184;

const SEGMENT_CDS = 3;
const SEGMENT_BCD = 6;
const SEGMENT_INDICES = 9;
const DEPTH_OFFSET = 64;
const DEPTH_ENTRY = 12;
const DEPTH_LEVELS = 5;

function priceDivisor(token: number): number {
  const segment = token & 0xff;
  if (segment === SEGMENT_CDS) return 10_000_000;
  if (segment === SEGMENT_BCD) return 10_000;
  return 100;
}

function changePct(last: number, close: number): number {
  return close !== 0 ? ((last - close) * 100) / close : 0;
}

function decodeDepth(p: Buffer, div: number): Depth {
  const buy: DepthLevel[] = [];
  const sell: DepthLevel[] = [];
  for (let i = 0, off = DEPTH_OFFSET; off + DEPTH_ENTRY <= p.length; i++, off += DEPTH_ENTRY) {
    const level = {
      quantity: p.readUInt32BE(off),
      price: p.readUInt32BE(off + 4) / div,
      orders: p.readUInt16BE(off + 8),
    };
    (i < DEPTH_LEVELS ? buy : sell).push(level);
  }
  return { buy, sell };
}

/** Decodes one packet. `nowSec` stands in for the exchange timestamp on modes that carry none. */
export function decodePacket(p: Buffer, nowSec: number): WireTick {
  if (p.length < LTP) throw new DecodeError(`packet too short: ${p.length} bytes`);

  const instrumentToken = p.readUInt32BE(0);
  const div = priceDivisor(instrumentToken);
  const tradable = (instrumentToken & 0xff) !== SEGMENT_INDICES;
  const lastPrice = p.readUInt32BE(4) / div;

  switch (p.length) {
    case LTP:
      return { instrumentToken, tradable, mode: 'ltp', exchangeTs: nowSec, lastPrice };

    case INDEX_QUOTE:
    case INDEX_FULL: {
      const ohlc = {
        high: p.readUInt32BE(8) / div,
        low: p.readUInt32BE(12) / div,
        open: p.readUInt32BE(16) / div,
        close: p.readUInt32BE(20) / div,
      };
      const full = p.length === INDEX_FULL;
      return {
        instrumentToken,
        tradable,
        mode: full ? 'full' : 'quote',
        exchangeTs: full ? p.readUInt32BE(28) : nowSec,
        lastPrice,
        ohlc,
        changePct: changePct(lastPrice, ohlc.close),
      };
    }

    case QUOTE:
    case FULL: {
      const ohlc = {
        open: p.readUInt32BE(28) / div,
        high: p.readUInt32BE(32) / div,
        low: p.readUInt32BE(36) / div,
        close: p.readUInt32BE(40) / div,
      };
      const tick: WireTick = {
        instrumentToken,
        tradable,
        mode: 'quote',
        exchangeTs: nowSec,
        lastPrice,
        lastQuantity: p.readUInt32BE(8),
        averagePrice: p.readUInt32BE(12) / div,
        volume: p.readUInt32BE(16),
        buyQuantity: p.readUInt32BE(20),
        sellQuantity: p.readUInt32BE(24),
        ohlc,
        changePct: changePct(lastPrice, ohlc.close),
      };
      if (p.length === FULL) {
        tick.mode = 'full';
        tick.lastTradeTs = p.readUInt32BE(44);
        tick.oi = p.readUInt32BE(48);
        tick.oiDayHigh = p.readUInt32BE(52);
        tick.oiDayLow = p.readUInt32BE(56);
        tick.exchangeTs = p.readUInt32BE(60);
        tick.depth = decodeDepth(p, div);
      }
      return tick;
    }

    default:
      throw new DecodeError(`unknown packet length ${p.length} for token ${instrumentToken}`);
  }
}

/**
 * Splits a binary frame (int16 packet count, then int16 length + bytes per
 * packet). One-byte frames are heartbeats. A bad packet is reported and
 * skipped; a frame whose lengths overrun the buffer stops at that point.
 */
export function decodeFrame(buf: Buffer, nowSec: number): DecodeResult {
  const out: DecodeResult = { ticks: [], errors: [] };
  if (buf.length < 2) return out;

  const count = buf.readUInt16BE(0);
  let off = 2;
  for (let i = 0; i < count; i++) {
    if (off + 2 > buf.length) {
      out.errors.push(new DecodeError(`frame truncated before packet ${i} of ${count}`));
      break;
    }
    const len = buf.readUInt16BE(off);
    off += 2;
    if (off + len > buf.length) {
      out.errors.push(new DecodeError(`packet ${i} overruns frame (${len} bytes at ${off}, frame ${buf.length})`));
      break;
    }
    try {
      out.ticks.push(decodePacket(buf.subarray(off, off + len), nowSec));
    } catch (err) {
      out.errors.push(err instanceof DecodeError ? err : new DecodeError(String(err)));
    }
    off += len;
  }
  return out;
}

export function subscribeRequest(tokens: readonly number[]): string {
  return JSON.stringify({ a: 'subscribe', v: tokens });
}

export function modeRequest(mode: TickMode, tokens: readonly number[]): string {
  return JSON.stringify({ a: 'mode', v: [mode, tokens] });
}

const TextFrame = z.object({ type: z.string(), data: z.unknown().optional() });
export type TextFrame = z.infer<typeof TextFrame>;

/** Text frames carry order updates, notices and errors; anything else is ignored. */
export function parseTextFrame(text: string): TextFrame | null {
  try {
    const parsed = TextFrame.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
