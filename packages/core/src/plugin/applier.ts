import {
  addUtcDays,
  addUtcMilliseconds,
  addUtcMonths,
  addUtcYears,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_SECOND
} from "@reltime/calendar";
import { FormatError, TimestampOverflowError } from "../errors.js";
import type { TimeToken } from "../tokens/token.js";

// Wider than tokenizer output: hand-built tokens may carry an explicit "+".
const SIGNED_INTEGER_RE = /^[+-]?\d+$/;

export function parseMagnitude(text: string): number {
  if (!SIGNED_INTEGER_RE.test(text)) {
    throw new FormatError(`Invalid magnitude "${text}": expected a signed decimal integer`);
  }
  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new TimestampOverflowError(`Magnitude ${text} is outside the supported integer range`);
  }
  // Number("-0") is -0; keep the arithmetic sign-free for zero.
  return value === 0 ? 0 : value;
}

export function applyRelativeToken(token: TimeToken, base: Date): Date {
  if (token.unit === "Unknown") {
    throw new FormatError(`Unrecognised relative time unit "${token.unit}"`);
  }
  const n = parseMagnitude(token.magnitudeText);

  switch (token.unit) {
    case "Seconds":
      return addUtcMilliseconds(base, n * MS_PER_SECOND);
    case "Minutes":
      return addUtcMilliseconds(base, n * MS_PER_MINUTE);
    case "Hours":
      return addUtcMilliseconds(base, n * MS_PER_HOUR);
    case "Days":
      return addUtcDays(base, n);
    case "Weeks":
      return addUtcDays(base, n * 7);
    case "Fortnights":
      return addUtcDays(base, n * 14);
    case "Months":
      return addUtcMonths(base, n);
    case "Years":
      return addUtcYears(base, n);
    default: {
      const unreachable: never = token.unit;
      throw new FormatError(`Unrecognised relative time unit "${String(unreachable)}"`);
    }
  }
}
