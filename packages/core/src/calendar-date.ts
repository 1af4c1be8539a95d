/**
 * Calendar dates as ISO `YYYY-MM-DD` strings.
 *
 * Trading dates carry no time zone; all arithmetic is done on UTC midnights so
 * DST never shifts a day count.
 */

/** `YYYY-MM-DD` */
export type IsoDate = string;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function toUtcMidnight(date: string): number | null {
  const match = ISO_DATE_RE.exec(date);
  if (!match) return null;

  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  // rejects 2025-02-30 and friends, which Date.UTC silently rolls over
  return toIsoDate(new Date(ms)) === date ? ms : null;
}

export function isIsoDate(value: string): value is IsoDate {
  return toUtcMidnight(value) !== null;
}

/**
 * Parse a `YYYY-MM-DD` string into a UTC-midnight Date, or null when the string is not a real date.
 */
export function parseIsoDate(value: string): Date | null {
  const ms = toUtcMidnight(value);
  return ms === null ? null : new Date(ms);
}

/** UTC calendar date of an instant */
export function toIsoDate(instant: Date): IsoDate {
  return instant.toISOString().slice(0, 10);
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  const a = toUtcMidnight(from);
  const b = toUtcMidnight(to);
  if (a === null || b === null) {
    throw new RangeError(`daysBetween expects YYYY-MM-DD dates, got "${from}" and "${to}"`);
  }
  return Math.round((b - a) / MS_PER_DAY);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const base = toUtcMidnight(date);
  if (base === null) {
    throw new RangeError(`addDays expects a YYYY-MM-DD date, got "${date}"`);
  }
  return toIsoDate(new Date(base + days * MS_PER_DAY));
}
