import { BuildError, ConfigurationError, MismatchError, type ConformanceError } from "../errors.js";
import type { HttpRequest, HttpTransport } from "../http/types.js";
import { matchResponse } from "../matcher/matcher.js";
import { buildRequest, type EngineTarget } from "../request/builder.js";
import { FilePayloadSource, type PayloadSource } from "../request/payload.js";
import { RunReportBuilder, type RunReport, type StepOutcome } from "../report/report.js";
import type { HttpMethod, Scenario, Step } from "../scenarios/types.js";
import { decodeJsonBody } from "../util/json.js";
import { DEFAULT_RETRY_DELAY_MS, executeWithRetry, realSleep, settle, type Sleep } from "./retry.js";

export type DispatcherOptions = {
  engines: readonly EngineTarget[];
  declaredEngines?: readonly string[];
  transport: HttpTransport;
  payloads?: PayloadSource;
  retryDelayMs?: number;
  sleep?: Sleep;
  now?: () => number;
  onOutcome?: (outcome: StepOutcome) => void;
};

// Mutable per (scenario, engine) pass. `api_root` set by a step sticks for the steps after it.
type ExecutionContext = {
  apiRoot: string | undefined;
  aborted: boolean;
};

// Transient bookkeeping for one (step, engine, method) execution.
type ExecutionRecord = {
  startedAt: number;
  attempts: number;
  lastError?: ConformanceError;
};

type PlannedStep = {
  step: Step;
  engines: ReadonlySet<string>;
};

type PlannedScenario = {
  scenario: Scenario;
  scenarioIndex: number;
  steps: PlannedStep[];
};

export class EngineDispatcher {
  private readonly engines: readonly EngineTarget[];
  private readonly declared: ReadonlySet<string>;
  private readonly transport: HttpTransport;
  private readonly payloads: PayloadSource;
  private readonly retryDelayMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly onOutcome: ((outcome: StepOutcome) => void) | undefined;

  public constructor(opts: DispatcherOptions) {
    if (opts.engines.length === 0) throw new ConfigurationError("At least one engine must be configured");
    const ids = opts.engines.map((e) => e.id);
    const duplicate = ids.find((id, i) => ids.indexOf(id) !== i);
    if (duplicate) throw new ConfigurationError(`Engine "${duplicate}" is configured twice`);

    this.engines = opts.engines;
    this.declared = new Set(opts.declaredEngines ?? []);
    this.transport = opts.transport;
    this.payloads = opts.payloads ?? new FilePayloadSource();
    this.retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = opts.sleep ?? realSleep;
    this.now = opts.now ?? (() => Date.now());
    this.onOutcome = opts.onOutcome;
  }

  public async run(scenarios: readonly Scenario[]): Promise<RunReport> {
    // Resolving engine references first means a bad reference fails before any request is sent.
    const plan = scenarios.map((scenario, scenarioIndex) => this.planScenario(scenario, scenarioIndex));
    const report = new RunReportBuilder({ engines: this.engines.map((e) => e.id) });

    await Promise.all(
      this.engines.map((engine) =>
        this.runLane(engine, plan, (outcome) => {
          report.record(outcome);
          this.onOutcome?.(outcome);
        })
      )
    );
    return report.build();
  }

  private planScenario(scenario: Scenario, scenarioIndex: number): PlannedScenario {
    const configured = new Set(this.engines.map((e) => e.id));
    const known = new Set([...configured, ...this.declared]);
    const checkKnown = (ids: readonly string[], where: string) => {
      const unknown = ids.filter((id) => !known.has(id));
      if (unknown.length) {
        throw new ConfigurationError(
          `${where} references unknown engine(s) ${unknown.join(", ")}; known engines: ${[...known].join(", ")}`
        );
      }
    };

    if (scenario.engines) checkKnown(scenario.engines, scenario.name);
    const steps = scenario.steps.map((step) => {
      const where = `${scenario.name} step ${step.index} (line ${step.line})`;
      if (step.engines) checkKnown(step.engines, where);
      const targets = [...(step.engines ?? known)].filter((id) => !scenario.engines || scenario.engines.includes(id));
      if (targets.length === 0) {
        throw new ConfigurationError(`${where} applies to no engine: its engines do not intersect the file's engines`);
      }
      return { step, engines: new Set(targets.filter((id) => configured.has(id))) };
    });
    return { scenario, scenarioIndex, steps };
  }

  private async runLane(engine: EngineTarget, plan: readonly PlannedScenario[], record: (o: StepOutcome) => void): Promise<void> {
    let setupFailed = false;

    for (const planned of plan) {
      const { scenario } = planned;
      const ctx: ExecutionContext = { apiRoot: undefined, aborted: false };
      if (setupFailed && scenario.role !== "teardown") ctx.aborted = true;

      for (const { step, engines } of planned.steps) {
        if (!engines.has(engine.id)) continue;
        if (step.apiRoot) ctx.apiRoot = step.apiRoot;

        for (const method of step.methods) {
          if (ctx.aborted) {
            record(this.skipped(planned, step, engine, method, setupFailed ? "a setup step failed" : "an earlier step failed"));
            continue;
          }
          const outcome = await this.execute(planned, step, engine, method, ctx);
          record(outcome);
          if (outcome.status === "failure" && step.status.kind !== "any") ctx.aborted = true;
        }
      }

      if (ctx.aborted && scenario.role === "setup") setupFailed = true;
    }
  }

  private async execute(
    planned: PlannedScenario,
    step: Step,
    engine: EngineTarget,
    method: HttpMethod,
    ctx: ExecutionContext
  ): Promise<StepOutcome> {
    const exec: ExecutionRecord = { startedAt: this.now(), attempts: 0 };
    const base = this.outcomeBase(planned, step, engine, method);
    const finish = (fields: Partial<StepOutcome> & Pick<StepOutcome, "status">): StepOutcome => ({
      ...base,
      ...fields,
      attempts: exec.attempts,
      durationMs: this.now() - exec.startedAt,
      ...(exec.lastError
        ? {
            error: {
              kind: exec.lastError.kind,
              message: exec.lastError.message,
              ...(exec.lastError instanceof MismatchError ? { diff: exec.lastError.diff } : {})
            }
          }
        : {})
    });

    let request: HttpRequest;
    try {
      request = await buildRequest(step, method, {
        apiRoot: ctx.apiRoot,
        engine,
        payloads: this.payloads,
        ...(planned.scenario.baseDir ? { baseDir: planned.scenario.baseDir } : {})
      });
    } catch (e) {
      if (!(e instanceof BuildError)) throw e;
      exec.lastError = e;
      return finish({ status: "failure" });
    }
    const requestInfo = { url: request.url, headers: request.headers };

    const { result, attempts } = await executeWithRetry(request, {
      transport: this.transport,
      numRetries: step.numRetries,
      status: step.status,
      delayMs: this.retryDelayMs,
      sleep: this.sleep
    });
    exec.attempts = attempts;

    if (result.kind === "transport-error") {
      exec.lastError = result.error;
      return finish({ status: "failure", request: requestInfo });
    }

    const { response } = result;
    const match = matchResponse({ status: response.status, body: decodeJsonBody(response.body) }, step);
    if (!match.ok) {
      exec.lastError = match.error;
      return finish({ status: "failure", request: requestInfo, responseStatus: response.status });
    }

    await settle(step.sleepAfterSeconds, this.sleep);
    return finish({ status: "match", request: requestInfo, responseStatus: response.status });
  }

  private skipped(planned: PlannedScenario, step: Step, engine: EngineTarget, method: HttpMethod, reason: string): StepOutcome {
    return { ...this.outcomeBase(planned, step, engine, method), status: "skipped", attempts: 0, durationMs: 0, skippedReason: reason };
  }

  private outcomeBase(
    planned: PlannedScenario,
    step: Step,
    engine: EngineTarget,
    method: HttpMethod
  ): Pick<StepOutcome, "scenario" | "scenarioIndex" | "stepIndex" | "line" | "description" | "engine" | "method"> {
    return {
      scenario: planned.scenario.name,
      scenarioIndex: planned.scenarioIndex,
      stepIndex: step.index,
      line: step.line,
      ...(step.description ? { description: step.description } : {}),
      engine: engine.id,
      method
    };
  }
}

// The single entry point consumed by outer layers: run one scenario against the engine set.
export async function runScenario(scenario: Scenario, opts: DispatcherOptions): Promise<RunReport> {
  return new EngineDispatcher(opts).run([scenario]);
}
