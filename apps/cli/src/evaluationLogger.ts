import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";

export type EvaluationEntry = {
  command: "tokenize" | "apply";
  expression: string;
  locale: string | null;
  base: string | null;
  tokens: string;
  result: string | null;
};

export type EvaluationRecord = EvaluationEntry & { createdAt: string };

export type EvaluationLoggerOptions = {
  logDir: string;
  clock?: () => Date;
};

/**
 * Appends CLI evaluations as JSON lines to `evaluations-YYYYMMDD.jsonl`, one file
 * per UTC day of the logger's clock.
 */
export class EvaluationLogger {
  private readonly logDir: string;
  private readonly clock: () => Date;

  public constructor(opts: EvaluationLoggerOptions) {
    this.logDir = opts.logDir;
    this.clock = opts.clock ?? (() => new Date());
  }

  public fileFor(at: Date): string {
    const stamp = at.toISOString().slice(0, 10).replaceAll("-", "");
    return join(this.logDir, `evaluations-${stamp}.jsonl`);
  }

  public log(entry: EvaluationEntry): EvaluationRecord & { file: string } {
    const at = this.clock();
    const record: EvaluationRecord = { createdAt: at.toISOString(), ...entry };
    const file = this.fileFor(at);
    mkdirSync(this.logDir, { recursive: true });
    appendFileSync(file, `${JSON.stringify(record)}\n`, "utf8");
    return { ...record, file };
  }
}
