import { setTimeout as delay } from "node:timers/promises";
import { toTransportFailure, type TransportFailure } from "../errors.js";
import type { HttpRequest, HttpResponse, HttpTransport } from "../http/types.js";
import { statusSatisfied } from "../matcher/matcher.js";
import type { StatusExpectation } from "../scenarios/types.js";

export const DEFAULT_RETRY_DELAY_MS = 500;

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = async (ms) => {
  if (ms > 0) await delay(ms);
};

export type AttemptResult =
  | { kind: "response"; response: HttpResponse }
  | { kind: "transport-error"; error: TransportFailure };

export type RetryOptions = {
  transport: HttpTransport;
  numRetries: number;
  status: StatusExpectation;
  // Fixed pause between attempts: fixtures wait for an index to settle, not for congestion to clear.
  delayMs?: number;
  sleep?: Sleep;
  onAttempt?: (attempt: number, result: AttemptResult) => void;
};

export async function executeWithRetry(
  request: HttpRequest,
  opts: RetryOptions
): Promise<{ result: AttemptResult; attempts: number }> {
  const sleep = opts.sleep ?? realSleep;
  const maxAttempts = Math.max(0, opts.numRetries) + 1;
  let attempt = 0;

  while (true) {
    attempt += 1;
    let result: AttemptResult;
    try {
      result = { kind: "response", response: await opts.transport.send(request) };
    } catch (e) {
      result = { kind: "transport-error", error: toTransportFailure(e, request.url) };
    }
    opts.onAttempt?.(attempt, result);

    if (attempt >= maxAttempts || !needsRetry(result, opts.status)) return { result, attempts: attempt };
    await sleep(opts.delayMs ?? DEFAULT_RETRY_DELAY_MS);
  }
}

export function needsRetry(result: AttemptResult, status: StatusExpectation): boolean {
  if (result.kind === "transport-error") return true;
  return !statusSatisfied(result.response.status, status);
}

export async function settle(seconds: number, sleep: Sleep = realSleep): Promise<void> {
  if (seconds > 0) await sleep(seconds * 1000);
}
