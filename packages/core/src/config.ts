import { readFile } from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_TIMEOUT_MS } from "./http/fetchTransport.js";
import type { EngineTarget } from "./request/builder.js";
import { DEFAULT_RETRY_DELAY_MS } from "./runner/retry.js";

export type EngineConfig = EngineTarget;

export type RunnerConfig = {
  engines: EngineConfig[];
  // Engines the fixtures may name that are not part of this run.
  declaredEngines: string[];
  retryDelayMs: number;
  timeoutMs: number;
};

const EngineIdSchema = z.string().regex(/^[A-Za-z0-9_-]+$/, "engine ids are letters, digits, '_' and '-'");

const ConfigFileSchema = z
  .object({
    engines: z.record(
      EngineIdSchema,
      z.object({ baseUrl: z.string().url(), variables: z.record(z.string()).optional() }).strict()
    ),
    declaredEngines: z.array(EngineIdSchema).optional(),
    retryDelayMs: z.number().int().nonnegative().optional(),
    timeoutMs: z.number().int().positive().optional()
  })
  .strict();

const EnvNumberSchema = z.coerce.number().int().nonnegative();

// APICONFORM_ENGINES="quickwit=http://localhost:7280/api/v1/_elastic,elasticsearch=http://localhost:9200"
export function parseEngineList(value: string): EngineConfig[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((entry) => {
      const eq = entry.indexOf("=");
      const id = eq > 0 ? entry.slice(0, eq).trim() : "";
      const baseUrl = eq > 0 ? entry.slice(eq + 1).trim() : "";
      if (!EngineIdSchema.safeParse(id).success || !URL.canParse(baseUrl)) {
        throw new ConfigurationError(`Invalid engine entry "${entry}". Expected <id>=<base url>`);
      }
      return { id, baseUrl };
    });
}

export function loadRunnerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): RunnerConfig | null {
  const engines = env.APICONFORM_ENGINES;
  if (!engines) return null;
  const declared = env.APICONFORM_DECLARED_ENGINES;
  return validateRunnerConfig({
    engines: parseEngineList(engines),
    declaredEngines: declared ? declared.split(",").map((s) => s.trim()).filter(Boolean) : [],
    retryDelayMs: envNumber(env, "APICONFORM_RETRY_DELAY_MS") ?? DEFAULT_RETRY_DELAY_MS,
    timeoutMs: envNumber(env, "APICONFORM_TIMEOUT_MS") ?? DEFAULT_TIMEOUT_MS
  });
}

export function parseRunnerConfig(text: string, source = "config"): RunnerConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (e) {
    throw new ConfigurationError(`${source}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new ConfigurationError(`${source}${where}: ${issue?.message ?? parsed.error.message}`);
  }
  return validateRunnerConfig({
    engines: Object.entries(parsed.data.engines).map(([id, e]) => ({
      id,
      baseUrl: e.baseUrl,
      ...(e.variables ? { variables: e.variables } : {})
    })),
    declaredEngines: parsed.data.declaredEngines ?? [],
    retryDelayMs: parsed.data.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    timeoutMs: parsed.data.timeoutMs ?? DEFAULT_TIMEOUT_MS
  });
}

export async function loadRunnerConfigFile(path: string): Promise<RunnerConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    throw new ConfigurationError(`Cannot read config file ${path}`, { cause: e });
  }
  return parseRunnerConfig(text, path);
}

// Keeps only the selected engines running; the others stay known so fixtures naming them still validate.
export function selectEngines(config: RunnerConfig, ids: readonly string[]): RunnerConfig {
  const unknown = ids.filter((id) => !config.engines.some((e) => e.id === id));
  if (unknown.length) {
    throw new ConfigurationError(
      `Unknown engine(s): ${unknown.join(", ")}. Configured: ${config.engines.map((e) => e.id).join(", ")}`
    );
  }
  const selected = config.engines.filter((e) => ids.includes(e.id));
  const dropped = config.engines.filter((e) => !ids.includes(e.id)).map((e) => e.id);
  return validateRunnerConfig({
    ...config,
    engines: selected,
    declaredEngines: [...new Set([...config.declaredEngines, ...dropped])]
  });
}

export function validateRunnerConfig(config: RunnerConfig): RunnerConfig {
  if (config.engines.length === 0) throw new ConfigurationError("At least one engine must be configured");
  const seen = new Set<string>();
  for (const engine of config.engines) {
    if (seen.has(engine.id)) throw new ConfigurationError(`Engine "${engine.id}" is configured twice`);
    seen.add(engine.id);
  }
  return {
    ...config,
    declaredEngines: config.declaredEngines.filter((id) => !seen.has(id))
  };
}

function envNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = EnvNumberSchema.safeParse(value);
  if (!parsed.success) throw new ConfigurationError(`${key} must be a non-negative integer, got "${value}"`);
  return parsed.data;
}
