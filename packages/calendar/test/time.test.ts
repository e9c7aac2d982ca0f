import { describe, expect, it } from "vitest";
import {
  addUtcDays,
  addUtcMilliseconds,
  addUtcMonths,
  addUtcYears,
  daysInUtcMonth,
  formatTimestamp,
  parseTimestamp,
  TimestampOverflowError
} from "../src/index.js";

const at = (iso: string) => new Date(`${iso}Z`);

describe("daysInUtcMonth", () => {
  it("handles February in leap and common years", () => {
    expect(daysInUtcMonth(2000, 1)).toBe(29);
    expect(daysInUtcMonth(1900, 1)).toBe(28);
    expect(daysInUtcMonth(2024, 1)).toBe(29);
    expect(daysInUtcMonth(2023, 1)).toBe(28);
    expect(daysInUtcMonth(2023, 3)).toBe(30);
  });

  it("rejects month indexes outside 0..11", () => {
    expect(() => daysInUtcMonth(2023, 12)).toThrow(RangeError);
  });
});

describe("addUtcMonths", () => {
  it("clamps Jan 31 + 1 month to the end of February", () => {
    expect(formatTimestamp(addUtcMonths(at("2023-01-31T00:00:00"), 1))).toBe("2023-02-28T00:00:00");
    expect(formatTimestamp(addUtcMonths(at("2024-01-31T00:00:00"), 1))).toBe("2024-02-29T00:00:00");
  });

  it("keeps the time of day", () => {
    expect(formatTimestamp(addUtcMonths(at("2023-03-31T13:45:10"), -1))).toBe("2023-02-28T13:45:10");
  });

  it("carries across year boundaries in both directions", () => {
    expect(formatTimestamp(addUtcMonths(at("2000-01-01T00:00:00"), 42))).toBe("2003-07-01T00:00:00");
    expect(formatTimestamp(addUtcMonths(at("2000-01-01T00:00:00"), -42))).toBe("1996-07-01T00:00:00");
    expect(formatTimestamp(addUtcMonths(at("2000-12-15T00:00:00"), 1))).toBe("2001-01-15T00:00:00");
  });

  it("returns a copy for zero months", () => {
    const base = at("2000-01-01T00:00:00");
    const out = addUtcMonths(base, 0);
    expect(out).not.toBe(base);
    expect(out.getTime()).toBe(base.getTime());
  });

  it("keeps two-digit years literal", () => {
    const base = new Date(0);
    base.setUTCFullYear(50, 0, 31);
    expect(addUtcMonths(base, 1).getUTCFullYear()).toBe(50);
    expect(addUtcMonths(base, 1).getUTCDate()).toBe(28);
  });

  it("throws when the result leaves the representable range", () => {
    expect(() => addUtcMonths(at("2000-01-01T00:00:00"), 4_000_000)).toThrow(TimestampOverflowError);
  });

  it("reports month totals near the safe-integer limit as overflow", () => {
    const base = at("2000-01-01T00:00:00");
    expect(() => addUtcMonths(base, Number.MAX_SAFE_INTEGER - 2000 * 12)).toThrow(TimestampOverflowError);
    expect(() => addUtcMonths(base, -(Number.MAX_SAFE_INTEGER - 2000 * 12))).toThrow(TimestampOverflowError);
  });
});

describe("addUtcYears", () => {
  it("clamps Feb 29 to Feb 28 in a common year", () => {
    expect(formatTimestamp(addUtcYears(at("2024-02-29T06:00:00"), 1))).toBe("2025-02-28T06:00:00");
    expect(formatTimestamp(addUtcYears(at("2024-02-29T06:00:00"), 4))).toBe("2028-02-29T06:00:00");
  });
});

describe("addUtcMilliseconds / addUtcDays", () => {
  it("adds fixed durations", () => {
    expect(formatTimestamp(addUtcDays(at("2000-01-01T00:00:00"), 42))).toBe("2000-02-12T00:00:00");
    expect(formatTimestamp(addUtcMilliseconds(at("2000-01-01T00:00:00"), -42_000))).toBe("1999-12-31T23:59:18");
  });

  it("throws on overflow instead of returning an invalid date", () => {
    expect(() => addUtcDays(at("2000-01-01T00:00:00"), 200_000_000)).toThrow(TimestampOverflowError);
  });

  it("rejects an invalid base", () => {
    expect(() => addUtcDays(new Date(Number.NaN), 1)).toThrow(TimestampOverflowError);
  });
});

describe("parseTimestamp", () => {
  it("reads date-only values as UTC midnight", () => {
    expect(parseTimestamp("2000-01-01").toISOString()).toBe("2000-01-01T00:00:00.000Z");
  });

  it("reads zone-less date-times as UTC", () => {
    expect(parseTimestamp("2000-01-01T10:30:00").toISOString()).toBe("2000-01-01T10:30:00.000Z");
  });

  it("honours an explicit offset", () => {
    expect(parseTimestamp("2000-01-01T10:30:00+02:00").toISOString()).toBe("2000-01-01T08:30:00.000Z");
  });

  it("rejects malformed or impossible dates", () => {
    expect(() => parseTimestamp("yesterday")).toThrow("Invalid timestamp: yesterday");
    expect(() => parseTimestamp("2023-02-29")).toThrow("Invalid timestamp: 2023-02-29");
  });

  it("rejects impossible date-times instead of rolling them over", () => {
    expect(() => parseTimestamp("2023-02-30T00:00:00")).toThrow("Invalid timestamp: 2023-02-30T00:00:00");
    expect(() => parseTimestamp("2023-04-31T12:00:00Z")).toThrow("Invalid timestamp: 2023-04-31T12:00:00Z");
    expect(() => parseTimestamp("2023-01-01T24:00:00")).toThrow("Invalid timestamp: 2023-01-01T24:00:00");
    expect(() => parseTimestamp("2023-13-01T00:00:00")).toThrow("Invalid timestamp: 2023-13-01T00:00:00");
  });

  it("accepts leap days, fractions and compact offsets", () => {
    expect(parseTimestamp("2024-02-29T23:59:59.5").toISOString()).toBe("2024-02-29T23:59:59.500Z");
    expect(parseTimestamp("2000-01-01T00:00-0130").toISOString()).toBe("2000-01-01T01:30:00.000Z");
  });
});
