import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { ArithmeticTimePlugin, applyLocale, type LocaleResource } from "@reltime/core";

export const BUNDLED_LOCALES_DIR = fileURLToPath(new URL("../locales/", import.meta.url));

export function listBundledLocales(dir: string = BUNDLED_LOCALES_DIR): string[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith(".json"))
    .map((f) => f.slice(0, -".json".length))
    .sort();
}

/** `name` is a bundled locale such as `fr`, or a path to a JSON resource. */
export function readLocaleResource(name: string, dir: string = BUNDLED_LOCALES_DIR): unknown {
  const isPath = name.endsWith(".json") || name.includes("/") || name.includes("\\");
  const path = isPath ? name : join(dir, `${name}.json`);
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (e) {
    if (!isPath && e instanceof Error && "code" in e && e.code === "ENOENT") {
      throw new Error(`Unknown locale "${name}". Bundled locales: ${listBundledLocales(dir).join(", ")}`);
    }
    throw e;
  }
  return JSON.parse(raw) as unknown;
}

export function createPlugin(locale?: string): { plugin: ArithmeticTimePlugin; locale: LocaleResource | null } {
  const plugin = new ArithmeticTimePlugin();
  if (!locale) return { plugin, locale: null };
  return { plugin, locale: applyLocale(plugin.supportedUnits, readLocaleResource(locale)) };
}
