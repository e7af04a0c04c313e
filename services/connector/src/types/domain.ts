type InstrumentBase = {
  token: number;
  tradingSymbol: string;
  underlying: string; // e.g. NIFTY
  exchange: string;
};

export type SpotInstrument = InstrumentBase & { kind: 'spot' };
export type FutureInstrument = InstrumentBase & { kind: 'future'; expiry: string }; // YYYY-MM-DD
export type OptionInstrument = InstrumentBase & { kind: 'call' | 'put'; expiry: string; strike: number };

export type Instrument = SpotInstrument | FutureInstrument | OptionInstrument;
export type InstrumentKind = Instrument['kind'];

/** Ordered tokens owned by one socket connection. */
export type SubscriptionSet = readonly number[];

export type TickMode = 'ltp' | 'quote' | 'full';

export type DepthLevel = { price: number; quantity: number; orders: number };
export type Depth = { buy: DepthLevel[]; sell: DepthLevel[] };

export type Ohlc = { open: number; high: number; low: number; close: number };

export type Tick = {
  instrumentToken: number;
  tradingSymbol: string;
  underlying?: string;
  mode: TickMode;
  tradable: boolean;
  exchangeTs: number;       // epoch seconds
  lastPrice: number;
  lastQuantity?: number;
  averagePrice?: number;
  volume?: number;
  buyQuantity?: number;
  sellQuantity?: number;
  ohlc?: Ohlc;
  changePct?: number;
  lastTradeTs?: number;
  oi?: number;
  oiDayHigh?: number;
  oiDayLow?: number;
  depth?: Depth;
};

export type PublishOutcome = 'acknowledged' | 'dropped';
