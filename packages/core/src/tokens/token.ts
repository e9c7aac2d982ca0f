import type { RelativeTimeUnit } from "../units/units.js";

export type TimeToken = Readonly<{
  sourceKey: string;
  // null for tokens built by hand rather than matched from text.
  rawMatchedText: string | null;
  // Tokenizer output always matches /^-?\d+$/.
  magnitudeText: string;
  unit: RelativeTimeUnit;
}>;

export function createTimeToken(
  sourceKey: string,
  rawMatchedText: string | null,
  magnitudeText: string,
  unit: RelativeTimeUnit
): TimeToken {
  return Object.freeze({ sourceKey, rawMatchedText, magnitudeText, unit });
}

/**
 * Canonical decimal text for a signed digit string: no leading zeros, no `+`,
 * and never `-0`.
 */
export function normalizeMagnitude(digits: string, negative: boolean): string {
  const trimmed = digits.replace(/^0+(?=\d)/, "");
  if (trimmed === "0") return "0";
  return negative ? `-${trimmed}` : trimmed;
}
