import { BuildError } from "../errors.js";
import type { HttpRequest } from "../http/types.js";
import type { HttpMethod, Step } from "../scenarios/types.js";
import { serializeNdjson } from "./ndjson.js";
import type { PayloadSource } from "./payload.js";

export type EngineTarget = {
  id: string;
  baseUrl: string;
  variables?: Readonly<Record<string, string>>;
};

export type BuildContext = {
  // api_root carried forward from this or an earlier step of the lane.
  apiRoot: string | undefined;
  engine: EngineTarget;
  payloads: PayloadSource;
  baseDir?: string;
};

const PLACEHOLDER_RE = /\$\{([A-Za-z0-9_.-]+)\}/g;

export async function buildRequest(step: Step, method: HttpMethod, ctx: BuildContext): Promise<HttpRequest> {
  const base = resolveTemplate(ctx.apiRoot ?? ctx.engine.baseUrl, ctx.engine);
  const endpoint = resolveTemplate(step.endpoint, ctx.engine);
  const url = appendParams(joinUrl(base, endpoint), step.params);
  if (!URL.canParse(url)) throw new BuildError(`invalid request URL: ${url}`);

  const headers: Record<string, string> = { ...step.headers };
  const body = await buildBody(step, ctx, headers);
  return { method, url, headers, ...(body !== undefined ? { body } : {}) };
}

async function buildBody(step: Step, ctx: BuildContext, headers: Record<string, string>): Promise<string | Uint8Array | undefined> {
  switch (step.body.kind) {
    case "none":
      return undefined;
    case "json":
      setDefaultHeader(headers, "content-type", "application/json");
      return JSON.stringify(step.body.value);
    case "ndjson":
      setDefaultHeader(headers, "content-type", "application/x-ndjson");
      return serializeNdjson(step.body.records);
    case "file": {
      const decompress = !/\bgzip\b/i.test(findHeader(headers, "content-encoding") ?? "");
      try {
        return await ctx.payloads.read(step.body.path, {
          decompress,
          ...(ctx.baseDir ? { baseDir: ctx.baseDir } : {})
        });
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new BuildError(`cannot read body_from_file "${step.body.path}": ${reason}`, { cause: e });
      }
    }
  }
}

export function resolveTemplate(template: string, engine: EngineTarget): string {
  return template.replace(PLACEHOLDER_RE, (_match, name: string) => {
    if (name === "engine") return engine.id;
    const value = engine.variables?.[name];
    if (value === undefined) throw new BuildError(`unresolved placeholder \${${name}} for engine "${engine.id}"`);
    return value;
  });
}

export function joinUrl(base: string, endpoint: string): string {
  if (/^https?:\/\//i.test(endpoint)) return endpoint;
  return `${base.replace(/\/+$/, "")}/${endpoint.replace(/^\/+/, "")}`;
}

function appendParams(url: string, params: Readonly<Record<string, string>>): string {
  const query = new URLSearchParams(Object.entries(params)).toString();
  if (!query) return url;
  return `${url}${url.includes("?") ? "&" : "?"}${query}`;
}

export function findHeader(headers: Readonly<Record<string, string>>, name: string): string | undefined {
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name);
  return key === undefined ? undefined : headers[key];
}

function setDefaultHeader(headers: Record<string, string>, name: string, value: string): void {
  if (findHeader(headers, name) === undefined) headers[name] = value;
}
