import { FormatError } from "../errors.js";
import type { TimeToken } from "../tokens/token.js";
import type { EvaluationResult, TimePlugin } from "./types.js";

export function applyTokens(plugin: TimePlugin, tokens: readonly TimeToken[], base: Date): Date {
  let current = new Date(base.getTime());
  for (const token of tokens) {
    if (token.sourceKey !== plugin.key) {
      throw new FormatError(`Token from "${token.sourceKey}" cannot be applied by plugin "${plugin.key}"`);
    }
    current = plugin.apply(token, current);
  }
  return current;
}

export function evaluate(plugin: TimePlugin, input: string, base: Date): EvaluationResult {
  const tokens = plugin.tokenize(input);
  if (tokens.length === 0) return { tokens, result: null };
  return { tokens, result: applyTokens(plugin, tokens, base) };
}
