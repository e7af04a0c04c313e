/** Calendar date (YYYY-MM-DD) of `epochMs` in the exchange's time zone. */
export function tradeDate(epochMs: number, timeZone: string): string {
  // en-CA formats as ISO year-month-day
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(new Date(epochMs));
}
