import { CapacityExceeded } from '../errors.js';
import type { Instrument, InstrumentKind, SubscriptionSet } from '../types/domain.js';

/** Broker cap on concurrent streaming connections per API key. */
export const MAX_SOCKETS = 3;

export type ExpiryPolicy = {
  asOf: string;                        // trading date, YYYY-MM-DD
  underlyings: readonly string[];
  kinds: readonly InstrumentKind[];
  exchange: string;                    // derivatives segment, e.g. NFO
  underlyingExchange: string;          // spot segment, e.g. NSE
  includeUnderlying: boolean;
  weeklyExpiries: number;              // nearest N expiries
  monthlyExpiries: number;             // last expiry of the current month and the N-1 following
  /** Keeps only options struck within this percentage of the underlying's spot price. */
  strikeRangePct?: number;
};

/** Spot prices keyed by underlying, e.g. NIFTY. */
export type SpotPrices = ReadonlyMap<string, number>;

export type Partition = {
  instruments: Instrument[];
  sets: SubscriptionSet[];
};

function assertNever(x: never): never {
  throw new Error(`unhandled instrument kind: ${JSON.stringify(x)}`);
}

function addMonths(year: number, month: number, n: number): string {
  const idx = year * 12 + (month - 1) + n;
  const y = Math.floor(idx / 12);
  const m = (idx % 12) + 1;
  return `${y}-${String(m).padStart(2, '0')}`;
}

/**
 * Picks the expiries in scope: the first `weekly` upcoming expiries plus the
 * last expiry of each of the next `monthly` calendar months (current month first).
 * Dates are ISO strings so plain string comparison orders them.
 */
export function selectTargetExpiries(expiries: Iterable<string>, asOf: string, weekly: number, monthly: number): Set<string> {
  const upcoming = [...new Set(expiries)].filter((d) => d >= asOf).sort();
  const selected = new Set(upcoming.slice(0, weekly));

  const lastByMonth = new Map<string, string>();
  for (const d of upcoming) lastByMonth.set(d.slice(0, 7), d); // ascending, so the last write wins

  const [y, m] = asOf.split('-').map(Number);
  for (let i = 0; i < monthly; i++) {
    const last = lastByMonth.get(addMonths(y, m, i));
    if (last) selected.add(last);
  }
  return selected;
}

/**
 * Applies the expiry policy and the kind set, then the strike window when one
 * is set. An underlying without a spot price keeps all its strikes. Output is
 * ordered by token.
 */
export function filterUniverse(universe: readonly Instrument[], policy: ExpiryPolicy, spot: SpotPrices = new Map()): Instrument[] {
  const underlyings = new Set(policy.underlyings);
  const kinds = new Set(policy.kinds);
  const pct = policy.strikeRangePct;

  const inStrikeWindow = (underlying: string, strike: number): boolean => {
    const price = spot.get(underlying);
    if (pct === undefined || price === undefined) return true;
    return strike >= price * (1 - pct / 100) && strike <= price * (1 + pct / 100);
  };

  const expiriesByUnderlying = new Map<string, string[]>();
  for (const inst of universe) {
    if (inst.kind === 'spot') continue;
    if (inst.exchange !== policy.exchange || !underlyings.has(inst.underlying) || !kinds.has(inst.kind)) continue;
    const list = expiriesByUnderlying.get(inst.underlying) ?? [];
    list.push(inst.expiry);
    expiriesByUnderlying.set(inst.underlying, list);
  }

  const targets = new Map<string, Set<string>>();
  for (const [u, list] of expiriesByUnderlying) {
    targets.set(u, selectTargetExpiries(list, policy.asOf, policy.weeklyExpiries, policy.monthlyExpiries));
  }

  const keep = (inst: Instrument): boolean => {
    if (!underlyings.has(inst.underlying)) return false;
    switch (inst.kind) {
      case 'spot':
        return policy.includeUnderlying && inst.exchange === policy.underlyingExchange;
      case 'future':
        return (
          inst.exchange === policy.exchange &&
          kinds.has(inst.kind) &&
          (targets.get(inst.underlying)?.has(inst.expiry) ?? false)
        );
      case 'call':
      case 'put':
        return (
          inst.exchange === policy.exchange &&
          kinds.has(inst.kind) &&
          (targets.get(inst.underlying)?.has(inst.expiry) ?? false) &&
          inStrikeWindow(inst.underlying, inst.strike)
        );
      default:
        return assertNever(inst);
    }
  };

  const byToken = new Map<number, Instrument>();
  for (const inst of universe) {
    if (!byToken.has(inst.token) && keep(inst)) byToken.set(inst.token, inst);
  }
  return [...byToken.values()].sort((a, b) => a.token - b.token);
}

/**
 * Round-robin over token-sorted instruments, so the same universe always lands
 * on the same socket index and set sizes differ by at most one.
 */
export function distribute(tokens: readonly number[], connections: number, maxPerConnection: number): SubscriptionSet[] {
  const n = Math.min(Math.max(1, Math.floor(connections)), MAX_SOCKETS);
  const capacity = n * maxPerConnection;
  if (tokens.length > capacity) throw new CapacityExceeded(tokens.length, capacity);

  const sets: number[][] = Array.from({ length: n }, () => []);
  tokens.forEach((token, i) => sets[i % n].push(token));
  return sets;
}

/** Filters the universe and spreads what is left over the sockets. */
export function partition(
  universe: readonly Instrument[],
  policy: ExpiryPolicy,
  maxConnections: number,
  maxPerConnection: number,
  spot: SpotPrices = new Map(),
): Partition {
  const instruments = filterUniverse(universe, policy, spot);
  return { instruments, sets: distribute(instruments.map((i) => i.token), maxConnections, maxPerConnection) };
}
