import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { EvaluationLogger, type EvaluationEntry } from "../src/evaluationLogger.js";

const entry: EvaluationEntry = {
  command: "apply",
  expression: "1 day",
  locale: null,
  base: "2000-01-01T00:00:00",
  tokens: "[Days:1]",
  result: "2000-01-02T00:00:00"
};

describe("EvaluationLogger", () => {
  it("stamps each entry from its clock and appends it to that day's file", () => {
    const logDir = join(mkdtempSync(join(tmpdir(), "reltime-log-")), "nested");
    const times = [new Date("2000-01-02T03:04:05.000Z"), new Date("2000-01-02T23:59:59.000Z")];
    let i = 0;
    const logger = new EvaluationLogger({ logDir, clock: () => times[i++] ?? new Date(0) });

    const first = logger.log(entry);
    const second = logger.log({ ...entry, expression: "2 days" });

    expect(first.file).toBe(join(logDir, "evaluations-20000102.jsonl"));
    expect(second.file).toBe(first.file);
    expect(first.createdAt).toBe("2000-01-02T03:04:05.000Z");

    const lines = readFileSync(first.file, "utf8").trimEnd().split("\n");
    expect(lines.map((l) => JSON.parse(l) as unknown)).toEqual([
      { createdAt: "2000-01-02T03:04:05.000Z", ...entry },
      { createdAt: "2000-01-02T23:59:59.000Z", ...entry, expression: "2 days" }
    ]);
  });

  it("rolls over to a new file on the next UTC day", () => {
    const logger = new EvaluationLogger({ logDir: "logs" });
    expect(logger.fileFor(new Date("2000-01-02T23:59:59.999Z"))).toBe(join("logs", "evaluations-20000102.jsonl"));
    expect(logger.fileFor(new Date("2000-01-03T00:00:00.000Z"))).toBe(join("logs", "evaluations-20000103.jsonl"));
  });
});
