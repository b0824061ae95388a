import YAML from "yaml";
import type { ZodIssue } from "zod";
import { ParseError } from "../errors.js";
import { scanIgnoredFields } from "./comments.js";
import {
  StepDocumentSchema,
  type BodyExpectation,
  type BodySource,
  type ParseWarning,
  type Scenario,
  type ScenarioRole,
  type StatusExpectation,
  type Step,
  type StepDocument
} from "./types.js";

const DELIMITER_RE = /^---(?:\s+#\s?(.*?))?\s*$/;

export type ParseOptions = {
  name?: string;
  sourcePath?: string;
  baseDir?: string;
  role?: ScenarioRole;
  engines?: readonly string[];
  // Step defaults shared by every document (a suite's `_ctx.yaml`).
  defaults?: Record<string, unknown>;
};

type DocumentChunk = {
  index: number;
  firstLine: number;
  lines: string[];
  delimiterComment?: string;
};

export function splitDocuments(text: string): DocumentChunk[] {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
  const chunks: DocumentChunk[] = [{ index: 0, firstLine: 1, lines: [] }];

  lines.forEach((line, i) => {
    const m = line.match(DELIMITER_RE);
    if (m) {
      const comment = m[1]?.trim();
      chunks.push({
        index: chunks.length,
        firstLine: i + 2,
        lines: [],
        ...(comment ? { delimiterComment: comment } : {})
      });
      return;
    }
    chunks[chunks.length - 1]?.lines.push(line);
  });

  return chunks;
}

export function parseScenario(text: string, opts: ParseOptions = {}): Scenario {
  const steps: Step[] = [];
  const warnings: ParseWarning[] = [];

  for (const chunk of splitDocuments(text)) {
    if (chunk.lines.every((l) => l.trim() === "" || l.trimStart().startsWith("#"))) continue;
    const { step, warnings: docWarnings } = parseDocument(chunk, opts);
    steps.push(step);
    warnings.push(...docWarnings);
  }

  return {
    name: opts.name ?? opts.sourcePath ?? "inline",
    ...(opts.sourcePath ? { sourcePath: opts.sourcePath } : {}),
    ...(opts.baseDir ? { baseDir: opts.baseDir } : {}),
    role: opts.role ?? "test",
    ...(opts.engines ? { engines: [...opts.engines] } : {}),
    steps,
    warnings
  };
}

function parseDocument(chunk: DocumentChunk, opts: ParseOptions): { step: Step; warnings: ParseWarning[] } {
  const fail = (message: string, details: { line?: number; field?: string; cause?: unknown } = {}): never => {
    throw new ParseError(message, {
      documentIndex: chunk.index,
      line: details.line ?? chunk.firstLine,
      ...(details.field ? { field: details.field } : {}),
      ...(opts.sourcePath ? { source: opts.sourcePath } : {}),
      cause: details.cause
    });
  };

  const doc = YAML.parseDocument(chunk.lines.join("\n"));
  const yamlError = doc.errors[0];
  if (yamlError) {
    const offset = yamlError.linePos?.[0]?.line;
    fail(yamlError.message, { ...(offset != null ? { line: chunk.firstLine + offset - 1 } : {}), cause: yamlError });
  }

  const raw: unknown = doc.toJS();
  if (!isPlainObject(raw)) return fail("a step document must be a mapping");

  const parsed = StepDocumentSchema.safeParse(mergeDefaults(opts.defaults, raw));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail(issue ? describeIssue(issue) : parsed.error.message, { field: issueField(issue) });
  }

  const ignored = scanIgnoredFields(chunk.lines, { documentIndex: chunk.index, firstLine: chunk.firstLine });
  const description = parsed.data.description ?? chunk.delimiterComment ?? leadingComment(chunk.lines);

  const step = toStep(parsed.data, {
    index: chunk.index,
    line: firstContentLine(chunk),
    ...(description ? { description } : {}),
    expected: toBodyExpectation(parsed.data, ignored)
  });
  return { step, warnings: ignored.warnings };
}

function toStep(
  doc: StepDocument,
  extra: { index: number; line: number; description?: string; expected: BodyExpectation | undefined }
): Step {
  const methods = Array.isArray(doc.method) ? [...new Set(doc.method)] : [doc.method];
  return {
    index: extra.index,
    line: extra.line,
    ...(extra.description ? { description: extra.description } : {}),
    methods,
    ...(doc.api_root ? { apiRoot: doc.api_root } : {}),
    endpoint: doc.endpoint,
    headers: doc.headers ?? {},
    params: doc.params ?? {},
    body: toBodySource(doc),
    numRetries: doc.num_retries ?? 0,
    sleepAfterSeconds: doc.sleep_after ?? 0,
    ...(doc.engines ? { engines: [...new Set(doc.engines)] } : {}),
    status: toStatusExpectation(doc.status_code),
    ...(extra.expected ? { expected: extra.expected } : {})
  };
}

function toBodySource(doc: StepDocument): BodySource {
  if (doc.json !== undefined) return { kind: "json", value: doc.json };
  if (doc.ndjson !== undefined) return { kind: "ndjson", records: doc.ndjson };
  if (doc.body_from_file !== undefined) return { kind: "file", path: doc.body_from_file };
  return { kind: "none" };
}

function toStatusExpectation(code: number | null | undefined): StatusExpectation {
  if (code === undefined) return { kind: "success" };
  if (code === null) return { kind: "any" };
  return { kind: "exact", code };
}

function toBodyExpectation(
  doc: StepDocument,
  ignored: ReturnType<typeof scanIgnoredFields>
): BodyExpectation | undefined {
  const expected = doc.expected;
  if (expected === undefined) return undefined;
  if (Array.isArray(expected)) {
    return {
      kind: "records",
      ordered: doc.ordered ?? false,
      records: expected.map((value, i) => ({ value, ignoredFields: ignored.records.get(i) ?? [] }))
    };
  }
  return { kind: "object", record: { value: expected, ignoredFields: ignored.object } };
}

function mergeDefaults(defaults: Record<string, unknown> | undefined, doc: Record<string, unknown>): Record<string, unknown> {
  if (!defaults) return doc;
  const merged: Record<string, unknown> = { ...defaults, ...doc };
  for (const key of ["headers", "params"]) {
    const base = defaults[key];
    const own = doc[key];
    if (isPlainObject(base) && isPlainObject(own)) merged[key] = { ...base, ...own };
  }
  return merged;
}

function describeIssue(issue: ZodIssue): string {
  if (issue.code === "unrecognized_keys") return `unknown field(s): ${issue.keys.join(", ")}`;
  if (issue.code === "invalid_type" && issue.received === "undefined") return "required field is missing";
  return issue.message;
}

function issueField(issue: ZodIssue | undefined): string | undefined {
  if (!issue) return undefined;
  if (issue.code === "unrecognized_keys") return issue.keys[0];
  return issue.path.length ? issue.path.join(".") : undefined;
}

function leadingComment(lines: readonly string[]): string | undefined {
  const out: string[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed === "" && out.length === 0) continue;
    if (!trimmed.startsWith("#")) break;
    out.push(trimmed.replace(/^#+\s?/, ""));
  }
  const text = out.join(" ").trim();
  return text.length ? text : undefined;
}

function firstContentLine(chunk: DocumentChunk): number {
  const i = chunk.lines.findIndex((l) => l.trim() !== "" && !l.trimStart().startsWith("#"));
  return chunk.firstLine + Math.max(0, i);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
