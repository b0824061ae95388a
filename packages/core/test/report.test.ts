import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { RunReportBuilder, formatReport, type StepOutcome } from "../src/report/report.js";
import { RunLogger } from "../src/report/runLogger.js";

function outcome(fields: Partial<StepOutcome> & Pick<StepOutcome, "engine" | "stepIndex" | "status">): StepOutcome {
  return {
    scenario: "0001-cat-indices.yaml",
    scenarioIndex: 0,
    line: 1,
    method: "GET",
    attempts: 1,
    durationMs: 5,
    ...fields
  };
}

function sampleReport() {
  const builder = new RunReportBuilder({ engines: ["quickwit", "elasticsearch"], startedAt: new Date("2026-10-19T08:00:00Z") });
  builder.record(outcome({ engine: "elasticsearch", stepIndex: 0, status: "match" }));
  builder.record(outcome({ engine: "elasticsearch", stepIndex: 1, status: "match" }));
  builder.record(
    outcome({
      engine: "quickwit",
      stepIndex: 0,
      line: 2,
      description: "Cat indices",
      status: "failure",
      request: { url: "http://quickwit.test/_cat/indices", headers: { Authorization: "Basic test-secret" } },
      responseStatus: 200,
      attempts: 2,
      error: {
        kind: "mismatch",
        message: "expected 1 record(s), got 1",
        diff: {
          missing: [{ index: 0, record: { "docs.count": "3", index: "gharchive" } }],
          surplus: [{ index: 0, record: { index: "gharchive", "docs.count": "2" } }],
          fields: [{ expectedIndex: 0, actualIndex: 0, path: "docs.count", expected: "3", actual: "2", reason: "value differs" }]
        }
      }
    })
  );
  builder.record(
    outcome({ engine: "quickwit", stepIndex: 1, status: "skipped", attempts: 0, durationMs: 0, skippedReason: "an earlier step failed" })
  );
  return builder.build(new Date("2026-10-19T08:00:01Z"));
}

describe("RunReportBuilder", () => {
  it("orders outcomes by scenario, step and engine", () => {
    const report = sampleReport();
    expect(report.outcomes.map((o) => `${o.stepIndex} ${o.engine}`)).toEqual([
      "0 quickwit",
      "0 elasticsearch",
      "1 quickwit",
      "1 elasticsearch"
    ]);
    expect(report.totals).toEqual({ match: 2, failure: 1, skipped: 1 });
    expect(report.success).toBe(false);
    expect(report.failures.map((o) => o.engine)).toEqual(["quickwit"]);
    expect(report.startedAt).toBe("2026-10-19T08:00:00.000Z");
    expect(report.finishedAt).toBe("2026-10-19T08:00:01.000Z");
  });

  it("succeeds when every outcome matches", () => {
    const builder = new RunReportBuilder({ engines: ["quickwit"] });
    builder.record(outcome({ engine: "quickwit", stepIndex: 0, status: "match" }));
    expect(builder.build().success).toBe(true);
  });
});

describe("formatReport", () => {
  it("lists failures with their diff", () => {
    const report = sampleReport();
    const lines = formatReport(report).split("\n");
    expect(lines[0]).toBe(`Run ${report.runId} against quickwit, elasticsearch: 4 outcome(s), 2 match, 1 failure, 1 skipped`);
    expect(lines.slice(1)).toEqual([
      "",
      "FAIL 0001-cat-indices.yaml step 0 (line 2) [quickwit GET] Cat indices",
      "  GET http://quickwit.test/_cat/indices (2 attempt(s))",
      "  mismatch: expected 1 record(s), got 1",
      '  missing expected[0]: {"docs.count":"3","index":"gharchive"}',
      '  surplus actual[0]: {"docs.count":"2","index":"gharchive"}',
      '  field docs.count: expected "3", got "2", value differs (expected[0] vs actual[0])',
      "",
      "SKIPPED 1 execution(s) on quickwit after an earlier failure",
      "",
      "Result: FAILED"
    ]);
  });
});

describe("RunLogger", () => {
  it("appends the report as one JSON line with secrets redacted", () => {
    const runsDir = mkdtempSync(join(tmpdir(), "apiconform-runs-"));
    const report = sampleReport();
    const logger = new RunLogger({ runsDir });

    const file = logger.log(report);
    logger.log(report);

    expect(file).toBe(join(runsDir, "runs-20261019.jsonl"));
    const lines = readFileSync(file, "utf8").trim().split("\n");
    expect(lines).toHaveLength(2);

    const logged: unknown = JSON.parse(lines[0] ?? "");
    expect(logged).toMatchObject({ runId: report.runId, success: false });
    expect(logged).not.toHaveProperty("failures");
    expect(logged).toHaveProperty(["outcomes", 0, "request", "headers", "Authorization"], "[REDACTED]");
  });
});
