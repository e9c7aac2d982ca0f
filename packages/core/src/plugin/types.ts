import type { TimeToken } from "../tokens/token.js";

/**
 * Contract between a time-parsing plugin and the host that chains plugins
 * over an input. Tokens carry `sourceKey` so the host can route each one back
 * to the plugin that produced it.
 */
export interface TimePlugin {
  readonly key: string;
  tokenize(input: string | null | undefined): TimeToken[];
  apply(token: TimeToken, base: Date): Date;
}

export type EvaluationResult = {
  tokens: TimeToken[];
  result: Date | null;
};
