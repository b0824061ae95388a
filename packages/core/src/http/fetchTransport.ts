import { toTransportFailure } from "../errors.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;

export class FetchTransport implements HttpTransport {
  public readonly name = "fetch";
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  public constructor(opts: { timeoutMs?: number; fetchImpl?: typeof fetch } = {}) {
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  public async send(request: HttpRequest): Promise<HttpResponse> {
    try {
      const res = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        ...(request.body !== undefined ? { body: request.body } : {}),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      const body = new Uint8Array(await res.arrayBuffer());
      const headers: Record<string, string> = {};
      res.headers.forEach((value, key) => {
        headers[key] = value;
      });
      return { status: res.status, headers, body };
    } catch (e) {
      throw toTransportFailure(e, request.url);
    }
  }
}
