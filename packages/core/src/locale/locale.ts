import { z } from "zod";
import { LocaleResourceError } from "../errors.js";
import { KnownRelativeTimeUnitSchema } from "../units/units.js";
import type { UnitVocabulary } from "../units/vocabulary.js";

export const LocaleResourceSchema = z.object({
  locale: z.string().min(1),
  units: z.record(z.string().regex(/^\S+$/, "unit aliases cannot contain whitespace"), KnownRelativeTimeUnitSchema)
});

export type LocaleResource = z.infer<typeof LocaleResourceSchema>;

/** Validates a locale resource and writes its aliases into `vocabulary`. */
export function applyLocale(vocabulary: UnitVocabulary, resource: unknown): LocaleResource {
  const parsed = LocaleResourceSchema.safeParse(resource);
  if (!parsed.success) {
    throw new LocaleResourceError(`Invalid locale resource: ${parsed.error.message}`);
  }
  for (const [alias, unit] of Object.entries(parsed.data.units)) vocabulary.set(alias, unit);
  return parsed.data;
}
