import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

export type CliConfig = {
  locale?: string;
  base?: string;
  logDir?: string;
};

export type Env = Record<string, string | undefined>;

const ENV_KEYS: ReadonlyArray<readonly [keyof CliConfig, string]> = [
  ["locale", "RELTIME_LOCALE"],
  ["base", "RELTIME_BASE"],
  ["logDir", "RELTIME_LOG_DIR"]
];

export function loadCliConfigFromEnv(env: Env = process.env): CliConfig {
  const config: CliConfig = {};
  for (const [field, name] of ENV_KEYS) {
    const value = env[name]?.trim();
    if (value) config[field] = value;
  }
  return config;
}

/** Loads the first `.env` found; variables already set in `env` win. */
export function loadDotEnv(dirs: string[], env: Env = process.env): string | null {
  const path = dirs.map((dir) => join(dir, ".env")).find((p) => existsSync(p));
  if (!path) return null;
  for (const [key, value] of Object.entries(parseDotEnv(readFileSync(path, "utf8")))) {
    env[key] ??= value;
  }
  return path;
}

// KEY=value, optionally prefixed with `export`.
const ASSIGNMENT_RE = /^\s*(?:export\s+)?([A-Za-z_][\w.-]*)\s*=\s*(.*?)\s*$/;

const ESCAPES: Record<string, string> = { n: "\n", r: "\r", t: "\t" };

export function parseDotEnv(contents: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of contents.split(/\r?\n/)) {
    const match = ASSIGNMENT_RE.exec(line);
    if (!match) continue;
    const [, key, raw] = match;
    if (!key) continue;
    out[key] = readDotEnvValue(raw ?? "");
  }
  return out;
}

function readDotEnvValue(raw: string): string {
  const quote = raw[0];
  if ((quote === "\"" || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    const inner = raw.slice(1, -1);
    // Single quotes are literal; double quotes take backslash escapes.
    return quote === "'" ? inner : inner.replace(/\\(.)/g, (_m, ch: string) => ESCAPES[ch] ?? ch);
  }
  // An unquoted `#` after whitespace starts a comment.
  return raw.replace(/\s+#.*$/, "");
}
