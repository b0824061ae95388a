import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "../src/http/types.js";
import type { EngineTarget } from "../src/request/builder.js";
import { EngineDispatcher, runScenario, type DispatcherOptions } from "../src/runner/dispatcher.js";
import type { StepOutcome } from "../src/report/report.js";
import { parseScenario } from "../src/scenarios/parser.js";
import type { Scenario, ScenarioRole } from "../src/scenarios/types.js";
import { encodeJson } from "../src/util/json.js";

type Answer = { status: number; body?: unknown };

class StubTransport implements HttpTransport {
  public readonly name = "stub";
  public readonly requests: HttpRequest[] = [];
  private readonly answer: (request: HttpRequest) => Answer;

  public constructor(answer: (request: HttpRequest) => Answer = () => ({ status: 200, body: {} })) {
    this.answer = answer;
  }

  public async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const { status, body } = this.answer(request);
    return { status, headers: {}, body: body === undefined ? new Uint8Array() : encodeJson(body) };
  }
}

const quickwit: EngineTarget = { id: "quickwit", baseUrl: "http://quickwit.test/api/v1" };
const elasticsearch: EngineTarget = { id: "elasticsearch", baseUrl: "http://elasticsearch.test" };

function scenario(name: string, lines: string[], opts: { role?: ScenarioRole; engines?: string[] } = {}): Scenario {
  return parseScenario(lines.join("\n"), { name, ...opts });
}

function dispatcher(transport: HttpTransport, overrides: Partial<DispatcherOptions> = {}): EngineDispatcher {
  return new EngineDispatcher({
    engines: [quickwit, elasticsearch],
    transport,
    retryDelayMs: 0,
    sleep: async () => {},
    ...overrides
  });
}

const summary = (o: StepOutcome) => `${o.scenario}#${o.stepIndex} ${o.engine} ${o.method} ${o.status}`;

describe("EngineDispatcher", () => {
  it("runs every step on every engine unless restricted", async () => {
    const transport = new StubTransport();
    const s = scenario("lanes.yaml", [
      "method: [GET, POST]",
      "endpoint: a",
      "---",
      "method: GET",
      "engines: [quickwit]",
      "endpoint: b"
    ]);

    const report = await dispatcher(transport).run([s]);

    expect(report.success).toBe(true);
    expect(report.outcomes.map(summary)).toEqual([
      "lanes.yaml#0 quickwit GET match",
      "lanes.yaml#0 quickwit POST match",
      "lanes.yaml#0 elasticsearch GET match",
      "lanes.yaml#0 elasticsearch POST match",
      "lanes.yaml#1 quickwit GET match"
    ]);
    expect(transport.requests.map((r) => `${r.method} ${r.url}`).sort()).toEqual([
      "GET http://elasticsearch.test/a",
      "GET http://quickwit.test/api/v1/a",
      "GET http://quickwit.test/api/v1/b",
      "POST http://elasticsearch.test/a",
      "POST http://quickwit.test/api/v1/a"
    ]);
  });

  it("stops a lane after a failure and leaves other lanes running", async () => {
    const transport = new StubTransport((r) => ({ status: r.url.startsWith("http://quickwit.test") && r.url.endsWith("/a") ? 500 : 200 }));
    const s = scenario("fail-fast.yaml", ["method: GET", "endpoint: a", "---", "method: GET", "endpoint: b"]);

    const report = await dispatcher(transport).run([s]);

    expect(report.success).toBe(false);
    expect(report.outcomes.map(summary)).toEqual([
      "fail-fast.yaml#0 quickwit GET failure",
      "fail-fast.yaml#0 elasticsearch GET match",
      "fail-fast.yaml#1 quickwit GET skipped",
      "fail-fast.yaml#1 elasticsearch GET match"
    ]);
    expect(report.outcomes[2]?.skippedReason).toBe("an earlier step failed");
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]?.error?.kind).toBe("mismatch");
    expect(report.failures[0]?.responseStatus).toBe(500);
    expect(report.totals).toEqual({ match: 2, failure: 1, skipped: 1 });
  });

  it("keeps going after a step that accepts any status", async () => {
    const transport = new StubTransport((r) => ({ status: r.url.endsWith("/gone") ? 404 : 200 }));
    const s = scenario("cleanup.yaml", ["method: DELETE", "endpoint: gone", "status_code: null", "---", "method: GET", "endpoint: b"]);
    const report = await dispatcher(transport, { engines: [quickwit] }).run([s]);
    expect(report.outcomes.map((o) => o.status)).toEqual(["match", "match"]);
  });

  it("carries api_root forward within a scenario only", async () => {
    const transport = new StubTransport();
    const first = scenario("first.yaml", [
      "method: GET",
      "api_root: http://root.test/v2/",
      "endpoint: a",
      "---",
      "method: GET",
      "endpoint: b"
    ]);
    const second = scenario("second.yaml", ["method: GET", "endpoint: c"]);

    await dispatcher(transport, { engines: [quickwit] }).run([first, second]);

    expect(transport.requests.map((r) => r.url)).toEqual([
      "http://root.test/v2/a",
      "http://root.test/v2/b",
      "http://quickwit.test/api/v1/c"
    ]);
  });

  it("skips the tests of a lane whose setup failed but still tears down", async () => {
    const transport = new StubTransport((r) => ({ status: r.url.endsWith("/setup") ? 503 : 200 }));
    const scenarios = [
      scenario("_setup.yaml", ["method: POST", "endpoint: setup"], { role: "setup" }),
      scenario("0001.yaml", ["method: GET", "endpoint: test"]),
      scenario("_teardown.yaml", ["method: DELETE", "endpoint: teardown"], { role: "teardown" })
    ];

    const report = await dispatcher(transport, { engines: [quickwit] }).run(scenarios);

    expect(report.outcomes.map(summary)).toEqual([
      "_setup.yaml#0 quickwit POST failure",
      "0001.yaml#0 quickwit GET skipped",
      "_teardown.yaml#0 quickwit DELETE match"
    ]);
    expect(report.outcomes[1]?.skippedReason).toBe("a setup step failed");
  });

  it("honours file-level engines", async () => {
    const transport = new StubTransport();
    const s = scenario("_setup.quickwit.yaml", ["method: GET", "endpoint: a"], { role: "setup", engines: ["quickwit"] });
    const report = await dispatcher(transport).run([s]);
    expect(report.outcomes.map(summary)).toEqual(["_setup.quickwit.yaml#0 quickwit GET match"]);
  });

  it("skips steps meant for declared engines that are not running", async () => {
    const transport = new StubTransport();
    const s = scenario("declared.yaml", ["method: GET", "engines: [elasticsearch]", "endpoint: a"]);
    const report = await dispatcher(transport, { engines: [quickwit], declaredEngines: ["elasticsearch"] }).run([s]);
    expect(report.outcomes).toEqual([]);
    expect(report.success).toBe(true);
  });

  it("rejects unknown engine references before sending anything", async () => {
    const transport = new StubTransport();
    const scenarios = [
      scenario("ok.yaml", ["method: GET", "endpoint: a"]),
      scenario("typo.yaml", ["method: GET", "engines: [quickwitt]", "endpoint: a"])
    ];
    await expect(dispatcher(transport).run(scenarios)).rejects.toThrow(ConfigurationError);
    await expect(dispatcher(transport).run(scenarios)).rejects.toThrow("typo.yaml step 0 (line 1) references unknown engine(s) quickwitt");
    expect(transport.requests).toEqual([]);
  });

  it("rejects a step whose engines miss the file's engines", async () => {
    const s = scenario("narrow.yaml", ["method: GET", "engines: [elasticsearch]", "endpoint: a"], { engines: ["quickwit"] });
    await expect(dispatcher(new StubTransport()).run([s])).rejects.toThrow(/applies to no engine/);
  });

  it("records a build failure without a request", async () => {
    const transport = new StubTransport();
    const s = scenario("template.yaml", ["method: GET", "endpoint: ${index}/_search"]);
    const report = await dispatcher(transport, { engines: [quickwit] }).run([s]);
    const [outcome] = report.outcomes;
    expect(outcome?.status).toBe("failure");
    expect(outcome?.error?.kind).toBe("build");
    expect(outcome?.request).toBeUndefined();
    expect(outcome?.attempts).toBe(0);
    expect(transport.requests).toEqual([]);
  });

  it("resolves engine variables per lane", async () => {
    const transport = new StubTransport();
    const s = scenario("vars.yaml", ["method: GET", "endpoint: ${index}/_search"]);
    await dispatcher(transport, {
      engines: [
        { ...quickwit, variables: { index: "qw-logs" } },
        { ...elasticsearch, variables: { index: "es-logs" } }
      ]
    }).run([s]);
    expect(transport.requests.map((r) => r.url).sort()).toEqual([
      "http://elasticsearch.test/es-logs/_search",
      "http://quickwit.test/api/v1/qw-logs/_search"
    ]);
  });

  it("retries and waits the configured delays", async () => {
    let calls = 0;
    const transport = new StubTransport(() => ({ status: ++calls < 3 ? 503 : 200 }));
    const sleeps: number[] = [];
    const s = scenario("retry.yaml", ["method: GET", "endpoint: a", "num_retries: 5", "sleep_after: 2"]);

    const report = await dispatcher(transport, {
      engines: [quickwit],
      retryDelayMs: 10,
      sleep: async (ms) => {
        sleeps.push(ms);
      }
    }).run([s]);

    expect(report.outcomes[0]?.attempts).toBe(3);
    expect(sleeps).toEqual([10, 10, 2000]);
  });

  it("reports each outcome as it happens", async () => {
    const seen: string[] = [];
    const s = scenario("progress.yaml", ["method: GET", "endpoint: a"]);
    await dispatcher(new StubTransport(), { onOutcome: (o) => seen.push(o.engine) }).run([s]);
    expect(seen.sort()).toEqual(["elasticsearch", "quickwit"]);
  });

  it("rejects an empty or duplicated engine list", () => {
    expect(() => dispatcher(new StubTransport(), { engines: [] })).toThrow(ConfigurationError);
    expect(() => dispatcher(new StubTransport(), { engines: [quickwit, quickwit] })).toThrow('Engine "quickwit" is configured twice');
  });
});

describe("runScenario", () => {
  it("matches the response body", async () => {
    const transport = new StubTransport(() => ({ status: 200, body: [{ index: "gharchive", "docs.count": "2" }] }));
    const s = scenario("body.yaml", ["method: GET", "endpoint: _cat/indices", "expected:", "- index: gharchive", "  docs.count: '3'"]);

    const report = await runScenario(s, { engines: [quickwit], transport, retryDelayMs: 0 });

    expect(report.success).toBe(false);
    const diff = report.failures[0]?.error?.diff;
    expect(diff?.fields.map((f) => f.path)).toEqual(["docs.count"]);
    expect(report.failures[0]?.request?.url).toBe("http://quickwit.test/api/v1/_cat/indices");
  });
});
