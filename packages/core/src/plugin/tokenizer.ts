import { NullInputError } from "../errors.js";
import { createTimeToken, normalizeMagnitude, type TimeToken } from "../tokens/token.js";
import type { KnownRelativeTimeUnit } from "../units/units.js";
import type { UnitVocabulary } from "../units/vocabulary.js";

const AGO_KEYWORD = "ago";

type Occurrence = {
  start: number;
  end: number;
  digits: string;
  negative: boolean;
  unit: KnownRelativeTimeUnit;
};

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

/**
 * Left-to-right scanner for `sign? magnitude? unit-alias ago?` occurrences.
 * Any failure rejects the whole input; there is no partial result.
 */
class RelativeExpressionScanner {
  private readonly text: string;
  private readonly vocabulary: UnitVocabulary;
  private pos = 0;

  public constructor(text: string, vocabulary: UnitVocabulary) {
    this.text = text;
    this.vocabulary = vocabulary;
  }

  public scan(): Occurrence[] | null {
    const occurrences: Occurrence[] = [];
    this.skipWhitespace();
    while (this.pos < this.text.length) {
      const occurrence = this.readOccurrence();
      if (!occurrence) return null;
      occurrences.push(occurrence);
      this.skipWhitespace();
    }
    return occurrences.length > 0 ? occurrences : null;
  }

  private readOccurrence(): Occurrence | null {
    const start = this.pos;
    let negative = false;

    const sign = this.text[this.pos];
    if (sign === "+" || sign === "-") {
      negative = sign === "-";
      this.pos++;
      // The sign binds to what follows it without a gap.
      const next = this.text[this.pos];
      if (next === undefined || isWhitespace(next)) return null;
    }

    const digitsStart = this.pos;
    while (isDigit(this.text[this.pos])) this.pos++;
    const digits = this.text.slice(digitsStart, this.pos);
    if (digits) this.skipWhitespace();

    const alias = this.readWord();
    if (!alias) return null;
    const unit = this.lookupUnit(alias);
    if (!unit) return null;
    let end = this.pos;

    const beforeAgo = this.pos;
    this.skipWhitespace();
    const keyword = this.readWord();
    if (keyword.toLowerCase() === AGO_KEYWORD) {
      negative = !negative;
      end = this.pos;
    } else {
      this.pos = beforeAgo;
    }

    return { start, end, digits: digits || "1", negative, unit };
  }

  private lookupUnit(alias: string): KnownRelativeTimeUnit | undefined {
    const unit = this.vocabulary.get(alias);
    if (unit) return unit;
    // Plural folding: a localized singular also covers its "-s" plural.
    if (alias.length > 1 && /s$/i.test(alias)) return this.vocabulary.get(alias.slice(0, -1));
    return undefined;
  }

  private readWord(): string {
    const start = this.pos;
    while (this.pos < this.text.length && !isWhitespace(this.text[this.pos])) this.pos++;
    return this.text.slice(start, this.pos);
  }

  private skipWhitespace(): void {
    while (isWhitespace(this.text[this.pos])) this.pos++;
  }
}

export function tokenizeRelativeExpression(
  input: string | null | undefined,
  vocabulary: UnitVocabulary,
  sourceKey: string
): TimeToken[] {
  if (input == null) throw new NullInputError("input");

  const text = input.trim();
  const occurrences = new RelativeExpressionScanner(text, vocabulary).scan();
  if (!occurrences) return [];

  return occurrences.map((o) =>
    createTimeToken(sourceKey, text.slice(o.start, o.end), normalizeMagnitude(o.digits, o.negative), o.unit)
  );
}
