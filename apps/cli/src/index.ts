import { Command } from "commander";
import { readFileSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  ConfigurationError,
  ConformanceError,
  EngineDispatcher,
  FakeEngineTransport,
  FetchTransport,
  FilePayloadSource,
  RunLogger,
  formatOutcomeHeader,
  formatReport,
  loadRunnerConfigFile,
  loadRunnerConfigFromEnv,
  loadScenarioFile,
  loadSuite,
  selectEngines,
  type HttpTransport,
  type RunnerConfig,
  type Scenario,
  type StepOutcome
} from "@apiconform/core";

const program = new Command();
program.name("apiconform").description("Cross-engine HTTP conformance runner for search-engine REST APIs").version("0.1.0");

const REPO_ROOT = fileURLToPath(new URL("../../..", import.meta.url));

loadDotEnvFromRepoRoot();

const MOCK_ENGINES = "quickwit=http://quickwit.mock:7280/api/v1/_elastic,elasticsearch=http://elasticsearch.mock:9200";

const RunOptsSchema = z.object({
  config: z.string().optional(),
  engine: z.string().optional(),
  test: z.string().optional(),
  mockEngine: z.boolean().default(false),
  runsDir: z.string().default("runs"),
  log: z.boolean().default(true)
});

program
  .command("run")
  .description("Run a scenario file or a suite directory against the configured engines")
  .argument("<path>", "Scenario YAML file or suite directory")
  .option("--config <file>", "Engine config file (JSON or YAML); defaults to APICONFORM_* env vars")
  .option("--engine <ids>", "Comma-separated subset of configured engines to run")
  .option("--test <substring>", "Only run suite test files whose name contains this substring")
  .option("--mock-engine", "Run against the in-process fake engine", false)
  .option("--runs-dir <dir>", "Directory for JSONL run logs", "runs")
  .option("--no-log", "Do not write a run log")
  .action(async (path: string, raw: unknown) => {
    const options = RunOptsSchema.parse(raw);
    const config = await resolveConfig(options);
    const scenarios = await loadScenarios(path, options.test);

    const transport: HttpTransport = options.mockEngine
      ? new FakeEngineTransport()
      : new FetchTransport({ timeoutMs: config.timeoutMs });
    const dispatcher = new EngineDispatcher({
      engines: config.engines,
      declaredEngines: config.declaredEngines,
      transport,
      payloads: new FilePayloadSource(),
      retryDelayMs: config.retryDelayMs,
      onOutcome: printOutcome
    });

    const report = await dispatcher.run(scenarios);
    process.stdout.write("\n" + formatReport(report) + "\n");

    if (options.log) {
      const file = new RunLogger({ runsDir: resolve(options.runsDir) }).log(report);
      process.stdout.write(`Run log: ${file}\n`);
    }
    if (!report.success) process.exitCode = 1;
  });

program
  .command("list")
  .description("Print the steps of a scenario file or suite directory")
  .argument("<path>", "Scenario YAML file or suite directory")
  .option("--test <substring>", "Only list suite test files whose name contains this substring")
  .action(async (path: string, raw: unknown) => {
    const options = z.object({ test: z.string().optional() }).parse(raw);
    for (const scenario of await loadScenarios(path, options.test)) {
      const scope = scenario.engines ? ` (${scenario.engines.join(", ")} only)` : "";
      process.stdout.write(`${scenario.name} [${scenario.role}]${scope}\n`);
      for (const step of scenario.steps) {
        const engines = step.engines ? ` engines=${step.engines.join(",")}` : "";
        const desc = step.description ? `  # ${step.description}` : "";
        process.stdout.write(`  ${step.index}: ${step.methods.join("|")} ${step.endpoint}${engines}${desc}\n`);
      }
      for (const w of scenario.warnings) process.stdout.write(`  warning (line ${w.line}): ${w.message}\n`);
    }
  });

try {
  await program.parseAsync(process.argv);
} catch (e) {
  if (!(e instanceof ConformanceError)) throw e;
  process.stderr.write(`${e.name}: ${e.message}\n`);
  process.exitCode = 2;
}

async function resolveConfig(options: z.infer<typeof RunOptsSchema>): Promise<RunnerConfig> {
  const config = options.mockEngine
    ? mockConfig()
    : options.config
      ? await loadRunnerConfigFile(options.config)
      : loadRunnerConfigFromEnv();
  if (!config) {
    throw new ConfigurationError("No engines configured. Set APICONFORM_ENGINES, pass --config <file>, or use --mock-engine.");
  }
  if (!options.engine) return config;
  return selectEngines(config, options.engine.split(",").map((s) => s.trim()).filter(Boolean));
}

function mockConfig(): RunnerConfig | null {
  return loadRunnerConfigFromEnv({ APICONFORM_ENGINES: MOCK_ENGINES, APICONFORM_RETRY_DELAY_MS: "0" });
}

async function loadScenarios(path: string, filter: string | undefined): Promise<Scenario[]> {
  const full = resolveExistingPath(path, [process.cwd(), REPO_ROOT]);
  if (statSync(full).isDirectory()) {
    const suite = await loadSuite(full, filter ? { filter } : {});
    return suite.scenarios;
  }
  return [await loadScenarioFile(full)];
}

function printOutcome(o: StepOutcome): void {
  const tag = o.status === "match" ? "ok  " : o.status === "failure" ? "FAIL" : "skip";
  process.stdout.write(`${tag} ${formatOutcomeHeader(o)}${o.attempts > 1 ? ` after ${o.attempts} attempts` : ""}\n`);
}

function resolveExistingPath(path: string, baseDirs: string[]): string {
  if (path.startsWith("/") || path.match(/^[A-Za-z]:\\/)) return path;
  for (const base of baseDirs) {
    const candidate = join(base, path);
    if (exists(candidate)) return candidate;
  }
  return path;
}

function loadDotEnvFromRepoRoot(): void {
  const candidates = [join(REPO_ROOT, ".env"), join(process.cwd(), ".env")];
  for (const path of candidates) {
    if (!exists(path)) continue;
    applyDotEnv(readFileSync(path, "utf8"));
    return;
  }
}

function exists(path: string): boolean {
  try {
    statSync(path);
    return true;
  } catch {
    return false;
  }
}

function applyDotEnv(contents: string): void {
  for (const line of contents.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const noExport = trimmed.startsWith("export ") ? trimmed.slice("export ".length).trimStart() : trimmed;
    const eq = noExport.indexOf("=");
    if (eq <= 0) continue;

    const key = noExport.slice(0, eq).trim();
    if (!key || process.env[key] != null) continue;
    process.env[key] = unquote(noExport.slice(eq + 1).trim());
  }
}

function unquote(value: string): string {
  if (value.length >= 2 && (value.startsWith("\"") || value.startsWith("'")) && value.endsWith(value[0] ?? "")) {
    return value.slice(1, -1);
  }
  const hash = value.indexOf(" #");
  return hash >= 0 ? value.slice(0, hash).trimEnd() : value;
}
