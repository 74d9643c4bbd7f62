/**
 * All *_at columns hold unix seconds (matches SQLite's unixepoch()).
 */

/**
 * Current time (or the given date) in unix seconds
 */
export function unixSeconds(date?: Date): number {
  return Math.floor((date ?? new Date()).getTime() / 1000);
}

/**
 * Convert a stored unix-second value back to a Date
 */
export function fromUnixSeconds(value: number): Date {
  return new Date(value * 1000);
}
