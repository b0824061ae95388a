import type { MismatchDiff } from "./matcher/types.js";

export type ConformanceErrorKind = "parse" | "configuration" | "build" | "transport" | "mismatch";

export abstract class ConformanceError extends Error {
  public abstract readonly kind: ConformanceErrorKind;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// Malformed scenario document. Fatal: raised before anything reaches an engine.
export class ParseError extends ConformanceError {
  public readonly kind = "parse";
  public readonly documentIndex: number;
  public readonly line: number | undefined;
  public readonly field: string | undefined;
  public readonly source: string | undefined;

  public constructor(
    message: string,
    details: { documentIndex: number; line?: number; field?: string; source?: string; cause?: unknown }
  ) {
    const where = [
      details.source,
      `document ${details.documentIndex}`,
      details.line != null ? `line ${details.line}` : null,
      details.field ? `field "${details.field}"` : null
    ]
      .filter((part): part is string => Boolean(part))
      .join(", ");
    super(`${where}: ${message}`, { cause: details.cause });
    this.name = "ParseError";
    this.documentIndex = details.documentIndex;
    this.line = details.line;
    this.field = details.field;
    this.source = details.source;
  }
}

export class ConfigurationError extends ConformanceError {
  public readonly kind = "configuration";

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class BuildError extends ConformanceError {
  public readonly kind = "build";

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BuildError";
  }
}

export class TransportFailure extends ConformanceError {
  public readonly kind = "transport";
  public readonly url: string;

  public constructor(message: string, details: { url: string; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.name = "TransportFailure";
    this.url = details.url;
  }
}

export class MismatchError extends ConformanceError {
  public readonly kind = "mismatch";
  public readonly diff: MismatchDiff;

  public constructor(message: string, diff: MismatchDiff) {
    super(message);
    this.name = "MismatchError";
    this.diff = diff;
  }
}

export function toTransportFailure(error: unknown, url: string): TransportFailure {
  if (error instanceof TransportFailure) return error;
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new TransportFailure(`Request timed out: ${url}`, { url, cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransportFailure(`Request failed: ${url}: ${reason}`, { url, cause: error });
}
