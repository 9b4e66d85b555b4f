export const DAY_MS = 1000 * 60 * 60 * 24;

/**
 * Shift an instant by a whole number of fixed-length (24h) days.
 */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Whole days from `from` until `to`, floored. Negative when `to` is in the past.
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / DAY_MS);
}

export function parseDate(value: string | Date): Date {
  const date = typeof value === 'string' ? new Date(value) : value;

  if (isNaN(date.getTime())) {
    throw new Error(`Invalid date: ${value}`);
  }

  return date;
}

/**
 * Deterministic billing-cycle id from a renewal date.
 * Format: YYYYMMDD as a number (e.g., 20260315), always in UTC.
 */
export function generateCycleId(billingDate: Date | string): number {
  const date = parseDate(billingDate);

  const year = date.getUTCFullYear();
  const month = date.getUTCMonth() + 1;
  const day = date.getUTCDate();

  return year * 10000 + month * 100 + day;
}
