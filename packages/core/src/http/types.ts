import type { HttpMethod } from "../scenarios/types.js";

export type HttpRequest = {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
};

export type HttpResponse = {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
};

// Rejecting means the request never produced an HTTP response (refused, reset, timed out).
export interface HttpTransport {
  readonly name: string;
  send(request: HttpRequest): Promise<HttpResponse>;
}
