import type { TimeToken } from "./token.js";

export function formatToken(token: TimeToken): string {
  return `[${token.unit}:${token.magnitudeText}]`;
}

export function formatTokens(tokens: readonly TimeToken[]): string {
  return tokens.map(formatToken).join("");
}
