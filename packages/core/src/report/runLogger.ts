import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { redactHeaders } from "../util/redact.js";
import type { RunReport } from "./report.js";

export type RunLoggerOptions = {
  runsDir: string;
};

export class RunLogger {
  private readonly runsDir: string;

  public constructor(opts: RunLoggerOptions) {
    this.runsDir = opts.runsDir;
  }

  public log(report: RunReport): string {
    mkdirSync(this.runsDir, { recursive: true });
    const day = report.startedAt.slice(0, 10).replaceAll("-", "");
    const file = join(this.runsDir, `runs-${day}.jsonl`);
    const outcomes = report.outcomes.map((o) =>
      o.request ? { ...o, request: { ...o.request, headers: redactHeaders(o.request.headers) } } : o
    );
    appendFileSync(file, JSON.stringify({ ...report, outcomes, failures: undefined }) + "\n", "utf8");
    return file;
  }
}
