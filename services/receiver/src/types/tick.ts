import { z } from 'zod';
import { DecodeError } from '../errors.js';

const DepthLevel = z.object({
  price: z.number(),
  quantity: z.number().nonnegative(),
  orders: z.number().int().nonnegative(),
});

const Ohlc = z.object({ open: z.number(), high: z.number(), low: z.number(), close: z.number() });

/** Wire shape the connector appends to the stream. */
export const TickSchema = z.object({
  instrumentToken: z.number().int().nonnegative(),
  tradingSymbol: z.string().min(1),
  underlying: z.string().optional(),
  mode: z.enum(['ltp', 'quote', 'full']),
  tradable: z.boolean().default(true),
  exchangeTs: z.number().nonnegative(),
  lastPrice: z.number(),
  lastQuantity: z.number().optional(),
  averagePrice: z.number().optional(),
  volume: z.number().optional(),
  buyQuantity: z.number().optional(),
  sellQuantity: z.number().optional(),
  ohlc: Ohlc.optional(),
  changePct: z.number().optional(),
  lastTradeTs: z.number().optional(),
  oi: z.number().optional(),
  oiDayHigh: z.number().optional(),
  oiDayLow: z.number().optional(),
  depth: z
    .object({ buy: z.array(DepthLevel).max(20), sell: z.array(DepthLevel).max(20) })
    .optional(),
});

export type Tick = z.infer<typeof TickSchema>;
export type DepthLevel = z.infer<typeof DepthLevel>;

export function decodeTick(entryId: string, data: string | null): Tick {
  if (data === null) throw new DecodeError(entryId, 'missing data field');
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    throw new DecodeError(entryId, 'payload is not JSON');
  }
  const parsed = TickSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(entryId, issue ? `${issue.path.join('.') || 'tick'}: ${issue.message}` : 'invalid tick');
  }
  return parsed.data;
}
