import type { TimeToken } from "../tokens/token.js";
import { UnitVocabulary } from "../units/vocabulary.js";
import { applyRelativeToken } from "./applier.js";
import { tokenizeRelativeExpression } from "./tokenizer.js";
import type { TimePlugin } from "./types.js";

export type ArithmeticTimePluginOptions = {
  // Replaces the default English vocabulary; pass `new UnitVocabulary([])` for an empty one.
  units?: UnitVocabulary;
};

/**
 * Parses GNU `date`-style relative offsets such as
 * `"15 years -12 months 2 fortnights ago"` and applies them to a timestamp.
 *
 * Localize by writing into {@link ArithmeticTimePlugin.supportedUnits} before the
 * first `tokenize` call. The vocabulary is not synchronised; callers sharing one
 * instance must serialise writes against reads.
 */
export class ArithmeticTimePlugin implements TimePlugin {
  public static readonly key = "arithmetic";

  public readonly key = ArithmeticTimePlugin.key;
  public readonly supportedUnits: UnitVocabulary;

  public constructor(opts: ArithmeticTimePluginOptions = {}) {
    this.supportedUnits = opts.units ?? new UnitVocabulary();
  }

  /** Returns one token per occurrence, or `[]` unless the whole input matches. */
  public tokenize(input: string | null | undefined): TimeToken[] {
    return tokenizeRelativeExpression(input, this.supportedUnits, this.key);
  }

  public apply(token: TimeToken, base: Date): Date {
    return applyRelativeToken(token, base);
  }
}
