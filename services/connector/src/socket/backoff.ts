/** Capped exponential delay; `attempt` starts at 1. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  const exp = baseMs * Math.pow(2, Math.max(0, attempt - 1));
  return Math.min(maxMs, exp);
}
