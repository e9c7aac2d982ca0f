import type { KnownRelativeTimeUnit } from "./units.js";

export type UnitAliasEntry = readonly [alias: string, unit: KnownRelativeTimeUnit];

export const DEFAULT_UNIT_ALIASES: readonly UnitAliasEntry[] = [
  ["sec", "Seconds"],
  ["secs", "Seconds"],
  ["second", "Seconds"],
  ["seconds", "Seconds"],
  ["min", "Minutes"],
  ["mins", "Minutes"],
  ["minute", "Minutes"],
  ["minutes", "Minutes"],
  ["hour", "Hours"],
  ["hours", "Hours"],
  ["day", "Days"],
  ["days", "Days"],
  ["week", "Weeks"],
  ["weeks", "Weeks"],
  ["fortnight", "Fortnights"],
  ["fortnights", "Fortnights"],
  ["month", "Months"],
  ["months", "Months"],
  ["year", "Years"],
  ["years", "Years"]
];

function normalizeAlias(alias: string): string {
  return alias.toLowerCase();
}

/**
 * Case-insensitive alias → unit table owned by a single plugin instance.
 * Seeded with the English GNU aliases unless other entries are passed in.
 */
export class UnitVocabulary {
  private readonly units = new Map<string, KnownRelativeTimeUnit>();

  public constructor(entries: Iterable<UnitAliasEntry> = DEFAULT_UNIT_ALIASES) {
    for (const [alias, unit] of entries) this.set(alias, unit);
  }

  public get size(): number {
    return this.units.size;
  }

  public get(alias: string): KnownRelativeTimeUnit | undefined {
    return this.units.get(normalizeAlias(alias));
  }

  public has(alias: string): boolean {
    return this.units.has(normalizeAlias(alias));
  }

  public set(alias: string, unit: KnownRelativeTimeUnit): this {
    if (!alias || /\s/.test(alias)) {
      throw new TypeError(`Invalid unit alias: "${alias}"`);
    }
    // Also enforced by the type; untyped callers can still get here.
    const name: string = unit;
    if (name === "Unknown") {
      throw new TypeError(`Alias "${alias}" cannot map to the Unknown unit`);
    }
    this.units.set(normalizeAlias(alias), unit);
    return this;
  }

  public clear(): void {
    this.units.clear();
  }

  public entries(): IterableIterator<[string, KnownRelativeTimeUnit]> {
    return this.units.entries();
  }
}
