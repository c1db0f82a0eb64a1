/**
 * Stored timestamps are "YYYY-MM-DD HH:mm:ss" wall-clock strings in a fixed UTC offset,
 * so lexical order equals chronological order.
 */
export function formatStoreTime(date: Date, utcOffsetHours: number): string {
  const shifted = new Date(date.getTime() + utcOffsetHours * 3_600_000);
  return shifted.toISOString().replace('T', ' ').slice(0, 19);
}

/** Convert a unix timestamp in seconds. Returns null when it does not map to a valid date. */
export function storeTimeFromUnix(seconds: number, utcOffsetHours: number): string | null {
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) return null;
  return formatStoreTime(date, utcOffsetHours);
}
