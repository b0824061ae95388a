import { randomUUID } from "node:crypto";
import type { ConformanceErrorKind } from "../errors.js";
import type { MismatchDiff } from "../matcher/types.js";
import type { HttpMethod } from "../scenarios/types.js";
import { stableStringify } from "../util/json.js";

export type OutcomeStatus = "match" | "failure" | "skipped";

export type OutcomeError = {
  kind: ConformanceErrorKind;
  message: string;
  diff?: MismatchDiff;
};

export type StepOutcome = {
  scenario: string;
  scenarioIndex: number;
  stepIndex: number;
  line: number;
  description?: string;
  engine: string;
  method: HttpMethod;
  status: OutcomeStatus;
  request?: { url: string; headers: Record<string, string> };
  responseStatus?: number;
  attempts: number;
  durationMs: number;
  error?: OutcomeError;
  skippedReason?: string;
};

export type RunReport = {
  runId: string;
  startedAt: string;
  finishedAt: string;
  engines: string[];
  success: boolean;
  totals: Record<OutcomeStatus, number>;
  outcomes: StepOutcome[];
  failures: StepOutcome[];
};

export class RunReportBuilder {
  private readonly runId = randomUUID();
  private readonly startedAt: string;
  private readonly engines: string[];
  private readonly outcomes: StepOutcome[] = [];

  public constructor(opts: { engines: readonly string[]; startedAt?: Date }) {
    this.engines = [...opts.engines];
    this.startedAt = (opts.startedAt ?? new Date()).toISOString();
  }

  public record(outcome: StepOutcome): void {
    this.outcomes.push(outcome);
  }

  public build(finishedAt: Date = new Date()): RunReport {
    const engineOrder = (id: string) => this.engines.indexOf(id);
    // Lanes interleave while running; a stable sort restores scenario order without reordering methods.
    const outcomes = [...this.outcomes].sort(
      (a, b) =>
        a.scenarioIndex - b.scenarioIndex || a.stepIndex - b.stepIndex || engineOrder(a.engine) - engineOrder(b.engine)
    );
    const totals: Record<OutcomeStatus, number> = { match: 0, failure: 0, skipped: 0 };
    for (const o of outcomes) totals[o.status] += 1;

    return {
      runId: this.runId,
      startedAt: this.startedAt,
      finishedAt: finishedAt.toISOString(),
      engines: [...this.engines],
      success: outcomes.every((o) => o.status === "match"),
      totals,
      outcomes,
      failures: outcomes.filter((o) => o.status === "failure")
    };
  }
}

export function formatReport(report: RunReport): string {
  const lines: string[] = [];
  const { match, failure, skipped } = report.totals;
  lines.push(
    `Run ${report.runId} against ${report.engines.join(", ")}: ${report.outcomes.length} outcome(s), ${match} match, ${failure} failure, ${skipped} skipped`
  );

  for (const o of report.failures) {
    lines.push("");
    lines.push(`FAIL ${formatOutcomeHeader(o)}`);
    if (o.request) lines.push(`  ${o.method} ${o.request.url} (${o.attempts} attempt(s))`);
    if (o.error) lines.push(...formatError(o.error).map((l) => `  ${l}`));
  }

  const skippedByLane = new Map<string, number>();
  for (const o of report.outcomes) {
    if (o.status === "skipped") skippedByLane.set(o.engine, (skippedByLane.get(o.engine) ?? 0) + 1);
  }
  if (skippedByLane.size) {
    lines.push("");
    for (const [engine, count] of skippedByLane) lines.push(`SKIPPED ${count} execution(s) on ${engine} after an earlier failure`);
  }

  lines.push("");
  lines.push(report.success ? "Result: PASSED" : "Result: FAILED");
  return lines.join("\n");
}

export function formatOutcomeHeader(o: StepOutcome): string {
  const where = `${o.scenario} step ${o.stepIndex} (line ${o.line})`;
  return `${where} [${o.engine} ${o.method}]${o.description ? ` ${o.description}` : ""}`;
}

function formatError(error: OutcomeError): string[] {
  const lines = [`${error.kind}: ${error.message}`];
  const diff = error.diff;
  if (!diff) return lines;

  if (diff.status) lines.push(`status: expected ${diff.status.expected}, got ${diff.status.actual}`);
  if (diff.body) lines.push(`body: ${diff.body}`);
  for (const m of diff.missing) lines.push(`missing expected[${m.index}]: ${stableStringify(m.record)}`);
  for (const s of diff.surplus) lines.push(`surplus actual[${s.index}]: ${stableStringify(s.record)}`);
  for (const f of diff.fields) {
    const pair = f.expectedIndex !== undefined ? ` (expected[${f.expectedIndex}] vs actual[${f.actualIndex ?? "?"}])` : "";
    lines.push(`field ${f.path}: expected ${stableStringify(f.expected)}, got ${stableStringify(f.actual)}, ${f.reason}${pair}`);
  }
  return lines;
}
