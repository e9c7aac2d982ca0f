import { TimestampOverflowError } from "./errors.js";

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

// ECMAScript Date range: ±100,000,000 days around the epoch.
export const MAX_TIMESTAMP_MS = 8.64e15;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

// Largest |year| a Date can hold (±8.64e15 ms is ±275760 years around 1970).
const MAX_REPRESENTABLE_YEAR = 275_760;

const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?(Z|([+-])(\d{2}):?(\d{2}))?)?$/i;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

// month is zero-based, like Date#getUTCMonth.
export function daysInUtcMonth(year: number, month: number): number {
  if (month === 1 && isLeapYear(year)) return 29;
  const days = DAYS_IN_MONTH[month];
  if (days === undefined) throw new RangeError(`Invalid month index: ${month}`);
  return days;
}

export function isRepresentable(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}

function ensureRepresentable(date: Date, what: string): Date {
  if (!isRepresentable(date)) {
    throw new TimestampOverflowError(`${what} is outside the representable timestamp range`);
  }
  return date;
}

export function addUtcMilliseconds(date: Date, ms: number): Date {
  ensureRepresentable(date, "Base timestamp");
  const next = date.getTime() + ms;
  if (!Number.isFinite(next) || Math.abs(next) > MAX_TIMESTAMP_MS) {
    throw new TimestampOverflowError(`Adding ${ms}ms to ${date.toISOString()} overflows the timestamp range`);
  }
  return new Date(next);
}

export function addUtcDays(date: Date, days: number): Date {
  return addUtcMilliseconds(date, days * MS_PER_DAY);
}

/**
 * Adds calendar months, carrying into the year. A day-of-month that does not
 * exist in the destination month is clamped to its last day (Jan 31 + 1 month
 * is Feb 28 or 29). Time of day is kept.
 */
export function addUtcMonths(date: Date, months: number): Date {
  ensureRepresentable(date, "Base timestamp");
  if (months === 0) return new Date(date.getTime());

  const total = date.getUTCFullYear() * 12 + date.getUTCMonth() + months;
  if (!Number.isSafeInteger(total)) {
    throw new TimestampOverflowError(`Adding ${months} months to ${date.toISOString()} overflows the timestamp range`);
  }
  const month = ((total % 12) + 12) % 12;
  const year = (total - month) / 12;
  if (Math.abs(year) > MAX_REPRESENTABLE_YEAR) {
    throw new TimestampOverflowError(`Adding ${months} months to ${date.toISOString()} overflows the timestamp range`);
  }
  const day = Math.min(date.getUTCDate(), daysInUtcMonth(year, month));

  const out = new Date(date.getTime());
  // setUTCFullYear keeps two-digit years as-is, unlike Date.UTC.
  out.setUTCFullYear(year, month, day);
  return ensureRepresentable(out, `Adding ${months} months to ${date.toISOString()}`);
}

export function addUtcYears(date: Date, years: number): Date {
  return addUtcMonths(date, years * 12);
}

/** `YYYY-MM-DDTHH:mm:ss` in UTC, without fraction or zone designator. */
export function formatTimestamp(date: Date): string {
  ensureRepresentable(date, "Timestamp");
  const iso = date.toISOString();
  const t = iso.indexOf("T");
  return iso.slice(0, t + 9);
}

/**
 * Reads `YYYY-MM-DD` or an ISO date-time. Values without a zone designator are
 * taken as UTC. Fields are range-checked, so `2023-02-30T00:00:00` is rejected
 * rather than rolled over into March.
 */
export function parseTimestamp(text: string): Date {
  const match = TIMESTAMP_RE.exec(text.trim());
  if (!match) throw new Error(`Invalid timestamp: ${text}`);
  const [, y, mo, d, h, mi, sec, frac, zone, offSign, offH, offM] = match;

  const year = Number(y);
  const month = Number(mo) - 1;
  const day = Number(d);
  const hours = Number(h ?? "0");
  const minutes = Number(mi ?? "0");
  const seconds = Number(sec ?? "0");
  const ms = Number((frac ?? "").padEnd(3, "0"));
  if (month < 0 || month > 11 || day < 1 || day > daysInUtcMonth(year, month)) {
    throw new Error(`Invalid timestamp: ${text}`);
  }
  if (hours > 23 || minutes > 59 || seconds > 59) throw new Error(`Invalid timestamp: ${text}`);

  let offsetMinutes = 0;
  if (zone && offSign) {
    const oh = Number(offH);
    const om = Number(offM);
    if (oh > 23 || om > 59) throw new Error(`Invalid timestamp: ${text}`);
    offsetMinutes = (offSign === "-" ? -1 : 1) * (oh * 60 + om);
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hours, minutes, seconds, ms);
  return new Date(date.getTime() - offsetMinutes * MS_PER_MINUTE);
}
