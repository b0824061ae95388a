import { readdir, readFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import YAML from "yaml";
import { ParseError } from "../errors.js";
import { parseScenario } from "./parser.js";
import type { Scenario, ScenarioRole } from "./types.js";

const YAML_EXT_RE = /\.ya?ml$/;
// _setup.yaml, _setup.quickwit.yaml, _teardown.elasticsearch.yml
const LIFECYCLE_RE = /^_(setup|teardown)(?:\.([A-Za-z0-9_-]+))?\.ya?ml$/;
const CONTEXT_FILE_RE = /^_ctx\.ya?ml$/;

export type Suite = {
  name: string;
  dir: string;
  scenarios: Scenario[];
};

export async function loadScenarioFile(
  path: string,
  opts: { role?: ScenarioRole; engines?: readonly string[]; defaults?: Record<string, unknown>; name?: string } = {}
): Promise<Scenario> {
  const sourcePath = resolve(path);
  const text = await readFile(sourcePath, "utf8");
  return parseScenario(text, {
    name: opts.name ?? basename(sourcePath),
    sourcePath,
    baseDir: dirname(sourcePath),
    ...(opts.role ? { role: opts.role } : {}),
    ...(opts.engines ? { engines: opts.engines } : {}),
    ...(opts.defaults ? { defaults: opts.defaults } : {})
  });
}

export async function loadSuite(dir: string, opts: { filter?: string } = {}): Promise<Suite> {
  const root = resolve(dir);
  const files = (await readdir(root)).filter((f) => YAML_EXT_RE.test(f)).sort();

  const contextFile = files.find((f) => CONTEXT_FILE_RE.test(f));
  const defaults = contextFile ? await loadContext(join(root, contextFile)) : undefined;
  const shared = defaults ? { defaults } : {};

  const setups: Scenario[] = [];
  const tests: Scenario[] = [];
  const teardowns: Scenario[] = [];

  for (const file of files) {
    if (CONTEXT_FILE_RE.test(file)) continue;
    const path = join(root, file);
    const lifecycle = file.match(LIFECYCLE_RE);
    if (lifecycle) {
      const role: ScenarioRole = lifecycle[1] === "setup" ? "setup" : "teardown";
      const engine = lifecycle[2];
      const scenario = await loadScenarioFile(path, { role, ...(engine ? { engines: [engine] } : {}), ...shared });
      (role === "setup" ? setups : teardowns).push(scenario);
      continue;
    }
    if (file.startsWith("_")) continue;
    if (opts.filter && !file.includes(opts.filter)) continue;
    tests.push(await loadScenarioFile(path, { role: "test", ...shared }));
  }

  return { name: basename(root), dir: root, scenarios: [...setups, ...tests, ...teardowns] };
}

async function loadContext(path: string): Promise<Record<string, unknown>> {
  const text = await readFile(path, "utf8");
  const doc = YAML.parseDocument(text);
  const error = doc.errors[0];
  if (error) throw new ParseError(error.message, { documentIndex: 0, source: path, cause: error });
  const raw: unknown = doc.toJS();
  if (raw === null || raw === undefined) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ParseError("a context file must be a mapping of step defaults", { documentIndex: 0, source: path });
  }
  return Object.fromEntries(Object.entries(raw));
}
