import { z } from "zod";

export const RELATIVE_TIME_UNITS = [
  "Seconds",
  "Minutes",
  "Hours",
  "Days",
  "Weeks",
  "Fortnights",
  "Months",
  "Years",
  "Unknown"
] as const;

export type RelativeTimeUnit = (typeof RELATIVE_TIME_UNITS)[number];

// Unknown only exists so callers can build a token the applier must refuse.
export type KnownRelativeTimeUnit = Exclude<RelativeTimeUnit, "Unknown">;

export const RelativeTimeUnitSchema = z.enum(RELATIVE_TIME_UNITS);

export const KnownRelativeTimeUnitSchema = RelativeTimeUnitSchema.exclude(["Unknown"]);

