import { gunzipSync } from "node:zlib";
import { findHeader } from "../request/builder.js";
import { parseNdjson } from "../request/ndjson.js";
import type { JsonValue } from "../scenarios/types.js";
import { bytesToText, encodeJson, safeJsonParse } from "../util/json.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "./types.js";

export type FakeEngineOptions = {
  // Documents silently discarded from each bulk request while still reported as indexed.
  dropDocuments?: number;
};

type FakeIndex = {
  id: string;
  ordinal: number;
  docs: JsonValue[];
  bytes: number;
};

type FakeEngineState = {
  indexes: Map<string, FakeIndex>;
  created: number;
};

const CAT_PARAMS = new Set(["format", "h", "health"]);
const HEALTH_VALUES = new Set(["green", "yellow", "red"]);

// A deterministic in-process stand-in for a search engine's index, bulk and `_cat` endpoints.
// Each URL host gets its own isolated state, so one transport can serve several engine lanes.
export class FakeEngineTransport implements HttpTransport {
  public readonly name = "fake";
  public readonly requests: HttpRequest[] = [];
  private readonly states = new Map<string, FakeEngineState>();
  private readonly defaults: FakeEngineOptions;
  private readonly hostOptions: Record<string, FakeEngineOptions>;

  public constructor(opts: { defaults?: FakeEngineOptions; hosts?: Record<string, FakeEngineOptions> } = {}) {
    this.defaults = opts.defaults ?? {};
    this.hostOptions = opts.hosts ?? {};
  }

  public async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const url = new URL(request.url);
    const state = this.stateFor(url.host);
    const options = { ...this.defaults, ...this.hostOptions[url.host] };
    const path = url.pathname.replace(/\/+$/, "");

    if (request.method === "POST" && /\/indexes$/.test(path)) return createIndex(state, request);

    const indexPath = path.match(/\/indexes\/([^/]+)$/);
    if (indexPath?.[1] && request.method === "DELETE") return deleteIndex(state, decodeURIComponent(indexPath[1]));

    const bulkPath = path.match(/(?:\/([^/_][^/]*))?\/_bulk$/);
    if (bulkPath && (request.method === "POST" || request.method === "PUT")) {
      return bulk(state, request, options, bulkPath[1] ? decodeURIComponent(bulkPath[1]) : undefined);
    }

    const catPath = path.match(/\/_cat\/indices(?:\/([^/]+))?$/);
    if (catPath && request.method === "GET") {
      return catIndices(state, url.searchParams, catPath[1] ? decodeURIComponent(catPath[1]) : undefined);
    }

    return respond(404, { error: `no route for ${request.method} ${url.pathname}` });
  }

  public documentCount(host: string, index: string): number {
    return this.states.get(host)?.indexes.get(index)?.docs.length ?? 0;
  }

  private stateFor(host: string): FakeEngineState {
    let state = this.states.get(host);
    if (!state) {
      state = { indexes: new Map(), created: 0 };
      this.states.set(host, state);
    }
    return state;
  }
}

function createIndex(state: FakeEngineState, request: HttpRequest): HttpResponse {
  const parsed = safeJsonParse<unknown>(bytesToText(request.body ?? ""));
  const config = parsed.ok ? parsed.value : null;
  const id = isRecord(config) && typeof config.index_id === "string" ? config.index_id : null;
  if (!id) return respond(400, { message: "index config must contain a string `index_id`" });
  if (state.indexes.has(id)) return respond(400, { message: `index \`${id}\` already exists` });

  state.created += 1;
  state.indexes.set(id, { id, ordinal: state.created, docs: [], bytes: 0 });
  return respond(200, { index_config: { index_id: id } });
}

function deleteIndex(state: FakeEngineState, id: string): HttpResponse {
  if (!state.indexes.delete(id)) return respond(404, { message: `index \`${id}\` not found` });
  return respond(200, []);
}

function bulk(state: FakeEngineState, request: HttpRequest, options: FakeEngineOptions, pathIndex: string | undefined): HttpResponse {
  const raw = request.body ?? "";
  const gzipped = /\bgzip\b/i.test(findHeader(request.headers, "content-encoding") ?? "");
  const text = gzipped && typeof raw !== "string" ? bytesToText(gunzipSync(raw)) : bytesToText(raw);

  let lines: JsonValue[];
  try {
    lines = parseNdjson(text);
  } catch (e) {
    return respond(400, { error: e instanceof Error ? e.message : String(e) });
  }

  const pending: Array<{ index: FakeIndex; doc: JsonValue }> = [];
  for (let i = 0; i < lines.length; i += 2) {
    const action = lines[i];
    const target = isRecord(action) ? (action.index ?? action.create) : undefined;
    const targetIndex = isRecord(target) && typeof target._index === "string" ? target._index : pathIndex;
    if (!targetIndex) return respond(400, { error: `bulk action at line ${i + 1} names no index` });
    const index = state.indexes.get(targetIndex);
    if (!index) return respond(404, { error: "index_not_found", index: targetIndex });
    const doc = lines[i + 1];
    if (doc === undefined) return respond(400, { error: `bulk action at line ${i + 1} has no document` });
    pending.push({ index, doc });
  }

  const kept = pending.slice(0, Math.max(0, pending.length - (options.dropDocuments ?? 0)));
  for (const { index, doc } of kept) {
    index.docs.push(doc);
    index.bytes += JSON.stringify(doc).length;
  }

  return respond(200, {
    took: 1,
    errors: false,
    items: pending.map(({ index }) => ({ index: { _index: index.id, status: 201 } }))
  });
}

function catIndices(state: FakeEngineState, params: URLSearchParams, pattern: string | undefined): HttpResponse {
  if (params.get("format") !== "json") return respond(400, { error: "only format=json is supported" });
  for (const key of params.keys()) {
    if (!CAT_PARAMS.has(key)) return respond(400, { error: `unsupported parameter \`${key}\`` });
  }
  const health = params.get("health");
  if (health !== null && !HEALTH_VALUES.has(health)) return respond(400, { error: `invalid health \`${health}\`` });

  const patterns = (pattern ?? "*").split(",").filter(Boolean);
  for (const p of patterns) {
    if (!p.includes("*") && !state.indexes.has(p)) return respond(404, { error: "index_not_found_exception", index: p });
  }
  const matchers = patterns.map(wildcardToRegExp);
  const columns = params.get("h")?.split(",").filter(Boolean);

  const rows = [...state.indexes.values()]
    .filter((index) => matchers.some((re) => re.test(index.id)))
    // every fake index is green
    .filter(() => health === null || health === "green")
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((index) => project(catRecord(index), columns));

  return respond(200, rows);
}

function catRecord(index: FakeIndex): Record<string, string> {
  const size = formatKb(index.bytes);
  return {
    health: "green",
    status: "open",
    index: index.id,
    uuid: `${index.id}:${String(index.ordinal).padStart(26, "0")}`,
    pri: "1",
    rep: "1",
    "docs.count": String(index.docs.length),
    "docs.deleted": "0",
    "store.size": size,
    "pri.store.size": size,
    "dataset.size": size
  };
}

function project(record: Record<string, string>, columns: string[] | undefined): Record<string, string> {
  if (!columns) return record;
  const out: Record<string, string> = {};
  for (const column of columns) {
    const value = record[column];
    if (value !== undefined) out[column] = value;
  }
  return out;
}

function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern.split("*").map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"));
  return new RegExp(`^${escaped.join(".*")}$`);
}

function formatKb(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)}kb`;
}

function respond(status: number, body: unknown): HttpResponse {
  return { status, headers: { "content-type": "application/json" }, body: encodeJson(body) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
