import { Command, CommanderError } from "commander";
import { z } from "zod";
import { formatTimestamp, parseTimestamp } from "@reltime/calendar";
import { applyTokens, formatTokens, type ArithmeticTimePlugin, type TimeToken } from "@reltime/core";
import { loadCliConfigFromEnv, type Env } from "./config.js";
import { EvaluationLogger, type EvaluationEntry } from "./evaluationLogger.js";
import { createPlugin, listBundledLocales } from "./locales.js";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env?: Env;
  now?: () => Date;
};

export const NOTHING_RECOGNISED = "No relative time expression recognised.";

// Reported as the bare message, with exit code 1.
export class CliFailure extends Error {
  public override readonly name = "CliFailure";
}

const CommonOptsSchema = z.object({
  locale: z.string().min(1).optional(),
  logDir: z.string().min(1).optional()
});

const ApplyOptsSchema = CommonOptsSchema.extend({
  base: z.string().min(1).optional()
});

type Tokenized = {
  plugin: ArithmeticTimePlugin;
  tokens: TimeToken[];
  localeName: string | null;
};

function tokenizeExpression(expression: string, locale: string | undefined): Tokenized {
  const { plugin, locale: resource } = createPlugin(locale);
  return { plugin, tokens: plugin.tokenize(expression), localeName: resource?.locale ?? null };
}

const EXPRESSION_COMMANDS = new Set(["tokenize", "apply"]);

// "-15 years", "-hours", "+2 days": a sign glued to a digit or letter.
function isSignedExpression(arg: string): boolean {
  return arg !== "-h" && /^[+-][^\s-]/.test(arg);
}

/**
 * Moves signed expressions behind `--` so commander reads them as the
 * `<expression>` argument instead of as unknown options.
 */
export function routeSignedExpressions(args: readonly string[]): string[] {
  const [command, ...rest] = args;
  if (command === undefined || !EXPRESSION_COMMANDS.has(command)) return [...args];

  const dashes = rest.indexOf("--");
  const head = dashes < 0 ? rest : rest.slice(0, dashes);
  const tail = dashes < 0 ? [] : rest.slice(dashes + 1);
  const signed = head.filter(isSignedExpression);
  if (signed.length === 0) return [...args];
  return [command, ...head.filter((a) => !isSignedExpression(a)), "--", ...signed, ...tail];
}

export function createProgram(io: CliIo): Command {
  const config = loadCliConfigFromEnv(io.env ?? process.env);
  const now = io.now ?? (() => new Date());

  const logEvaluation = (logDir: string | undefined, entry: EvaluationEntry): void => {
    if (logDir) new EvaluationLogger({ logDir, clock: now }).log(entry);
  };

  const program = new Command();
  program
    .name("reltime")
    .description("Evaluate GNU date-style relative time expressions")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program
    .command("tokenize")
    .argument("<expression>", "Relative time expression, e.g. \"2 weeks 3 days ago\"")
    .option("--locale <name>", "Bundled locale name or path to a locale JSON file", config.locale)
    .option("--log-dir <dir>", "Append evaluations to a JSONL log in this directory", config.logDir)
    .action((expression: string, options: unknown) => {
      const opts = CommonOptsSchema.parse(options);
      const { tokens, localeName } = tokenizeExpression(expression, opts.locale);
      const text = formatTokens(tokens);

      logEvaluation(opts.logDir, { command: "tokenize", expression, locale: localeName, base: null, tokens: text, result: null });

      if (tokens.length === 0) throw new CliFailure(NOTHING_RECOGNISED);
      io.stdout(`${text}\n`);
    });

  program
    .command("apply")
    .argument("<expression>", "Relative time expression, e.g. \"1 month ago\"")
    .option("--base <timestamp>", "Base timestamp (YYYY-MM-DD or ISO date-time, UTC if no zone)", config.base)
    .option("--locale <name>", "Bundled locale name or path to a locale JSON file", config.locale)
    .option("--log-dir <dir>", "Append evaluations to a JSONL log in this directory", config.logDir)
    .action((expression: string, options: unknown) => {
      const opts = ApplyOptsSchema.parse(options);
      const base = opts.base ? parseTimestamp(opts.base) : now();
      const { tokens, localeName, plugin } = tokenizeExpression(expression, opts.locale);
      const result = tokens.length > 0 ? formatTimestamp(applyTokens(plugin, tokens, base)) : null;

      logEvaluation(opts.logDir, {
        command: "apply",
        expression,
        locale: localeName,
        base: formatTimestamp(base),
        tokens: formatTokens(tokens),
        result
      });

      if (result === null) throw new CliFailure(NOTHING_RECOGNISED);
      io.stdout(`${result}\n`);
    });

  program
    .command("locales")
    .description("List bundled locales")
    .action(() => {
      for (const name of listBundledLocales()) io.stdout(`${name}\n`);
    });

  return program;
}

/** Runs one CLI invocation (`args` without node and script) and returns its exit code. */
export async function runCli(args: readonly string[], io: CliIo): Promise<number> {
  try {
    await createProgram(io).parseAsync(routeSignedExpressions(args), { from: "user" });
    return 0;
  } catch (e) {
    // commander has already written its own message.
    if (e instanceof CommanderError) return e.exitCode;
    if (e instanceof CliFailure) io.stderr(`${e.message}\n`);
    else io.stderr(`${e instanceof Error ? `${e.name}: ${e.message}` : String(e)}\n`);
    return 1;
  }
}
