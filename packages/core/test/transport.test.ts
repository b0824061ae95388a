import { gzipSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import { TransportFailure } from "../src/errors.js";
import { FakeEngineTransport } from "../src/http/fake.js";
import { FetchTransport } from "../src/http/fetchTransport.js";
import type { HttpRequest } from "../src/http/types.js";
import { decodeJsonBody } from "../src/util/json.js";

const root = "http://engine.test/api/v1";

async function call(transport: FakeEngineTransport, request: Omit<HttpRequest, "headers"> & { headers?: Record<string, string> }) {
  const response = await transport.send({ headers: {}, ...request });
  return { status: response.status, body: decodeJsonBody(response.body) };
}

async function withIndexes(...ids: string[]): Promise<FakeEngineTransport> {
  const transport = new FakeEngineTransport();
  for (const id of ids) await call(transport, { method: "POST", url: `${root}/indexes`, body: JSON.stringify({ index_id: id }) });
  return transport;
}

describe("FakeEngineTransport", () => {
  it("creates and deletes indexes", async () => {
    const transport = await withIndexes("gharchive");
    expect((await call(transport, { method: "POST", url: `${root}/indexes`, body: '{"index_id":"gharchive"}' })).status).toBe(400);
    expect(await call(transport, { method: "DELETE", url: `${root}/indexes/gharchive` })).toEqual({ status: 200, body: [] });
    expect((await call(transport, { method: "DELETE", url: `${root}/indexes/gharchive` })).status).toBe(404);
  });

  it("ingests gzipped bulk requests into the index named by the path", async () => {
    const transport = await withIndexes("gharchive");
    const body = gzipSync('{"index":{}}\n{"a":1}\n{"create":{}}\n{"a":2}\n');
    const response = await call(transport, {
      method: "PUT",
      url: `${root}/gharchive/_bulk`,
      headers: { "content-encoding": "gzip" },
      body: new Uint8Array(body)
    });
    expect(response).toEqual({
      status: 200,
      body: {
        took: 1,
        errors: false,
        items: [{ index: { _index: "gharchive", status: 201 } }, { index: { _index: "gharchive", status: 201 } }]
      }
    });
    expect(transport.documentCount("engine.test", "gharchive")).toBe(2);
  });

  it("refuses a bulk request for a missing index", async () => {
    const transport = await withIndexes();
    const response = await call(transport, { method: "POST", url: `${root}/_bulk`, body: '{"index":{"_index":"nope"}}\n{}\n' });
    expect(response).toEqual({ status: 404, body: { error: "index_not_found", index: "nope" } });
  });

  it("lists indexes by pattern with selected columns", async () => {
    const transport = await withIndexes("otel-logs", "gharchive", "otel-traces");
    const response = await call(transport, { method: "GET", url: `${root}/_cat/indices/otel-*?format=json&h=index,uuid` });
    expect(response).toEqual({
      status: 200,
      body: [
        { index: "otel-logs", uuid: "otel-logs:00000000000000000000000001" },
        { index: "otel-traces", uuid: "otel-traces:00000000000000000000000003" }
      ]
    });
  });

  it("validates cat parameters", async () => {
    const transport = await withIndexes("gharchive");
    const cat = (query: string) => call(transport, { method: "GET", url: `${root}/_cat/indices${query}` });
    expect((await cat("")).status).toBe(400);
    expect((await cat("?format=json&v=true")).status).toBe(400);
    expect((await cat("?format=json&health=blue")).status).toBe(400);
    expect(await cat("?format=json&health=yellow")).toEqual({ status: 200, body: [] });
    expect((await cat("/missing?format=json")).status).toBe(404);
  });

  it("keeps engines on different hosts apart", async () => {
    const transport = await withIndexes("gharchive");
    const other = await call(transport, { method: "GET", url: "http://other.test/_cat/indices/gharchive?format=json" });
    expect(other.status).toBe(404);
  });
});

describe("FetchTransport", () => {
  it("converts the fetch response", async () => {
    const seen: Array<{ url: string; method: string | undefined }> = [];
    const fetchImpl: typeof fetch = async (input, init) => {
      seen.push({ url: String(input), method: init?.method });
      return new Response('{"ok":true}', { status: 201, headers: { "content-type": "application/json" } });
    };
    const response = await new FetchTransport({ fetchImpl }).send({ method: "POST", url: "http://engine.test/x", headers: {}, body: "{}" });

    expect(seen).toEqual([{ url: "http://engine.test/x", method: "POST" }]);
    expect(response.status).toBe(201);
    expect(response.headers["content-type"]).toBe("application/json");
    expect(decodeJsonBody(response.body)).toEqual({ ok: true });
  });

  it("turns a rejected fetch into a transport failure", async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const send = new FetchTransport({ fetchImpl }).send({ method: "GET", url: "http://engine.test/x", headers: {} });
    await expect(send).rejects.toBeInstanceOf(TransportFailure);
    await expect(send).rejects.toThrow("Request failed: http://engine.test/x: fetch failed");
  });
});
