import { z } from "zod";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "HEAD", "PATCH"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);

const MethodSchema = z.preprocess(
  (v) => (typeof v === "string" ? v.trim().toUpperCase() : v),
  z.enum(HTTP_METHODS)
);

// YAML happily turns `refresh: true` into a boolean; headers and params are strings on the wire.
const StringMapSchema = z.record(z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v)));

export const BODY_SOURCE_KEYS = ["json", "ndjson", "body_from_file"] as const;

export const StepDocumentSchema = z
  .object({
    description: z.string().optional(),
    method: z.union([MethodSchema, z.array(MethodSchema).min(1)]),
    api_root: z.string().min(1).optional(),
    endpoint: z.string(),
    headers: StringMapSchema.optional(),
    params: StringMapSchema.optional(),
    json: JsonValueSchema.optional(),
    ndjson: z.array(JsonValueSchema).optional(),
    body_from_file: z.string().min(1).optional(),
    num_retries: z.number().int().nonnegative().optional(),
    sleep_after: z.number().nonnegative().optional(),
    engines: z.array(z.string().min(1)).min(1).optional(),
    status_code: z.number().int().min(100).max(599).nullable().optional(),
    expected: z.union([z.array(JsonValueSchema), JsonObjectSchema]).optional(),
    ordered: z.boolean().optional()
  })
  .strict()
  .superRefine((doc, ctx) => {
    const sources = BODY_SOURCE_KEYS.filter((key) => doc[key] !== undefined);
    if (sources.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [sources[1] ?? "json"],
        message: `only one body source may be set, found: ${sources.join(", ")}`
      });
    }
    if (doc.expected !== undefined && doc.status_code !== undefined) {
      const code = doc.status_code;
      if (code === null || code < 200 || code > 299) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["status_code"],
          message: `a step with an expected body must expect a success status, got ${String(code)}`
        });
      }
    }
    if (doc.ordered !== undefined && !Array.isArray(doc.expected)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ordered"],
        message: "ordered only applies to a sequence of expected records"
      });
    }
  });

export type StepDocument = z.infer<typeof StepDocumentSchema>;

export type BodySource =
  | { kind: "none" }
  | { kind: "json"; value: JsonValue }
  | { kind: "ndjson"; records: readonly JsonValue[] }
  | { kind: "file"; path: string };

export type StatusExpectation = { kind: "success" } | { kind: "any" } | { kind: "exact"; code: number };

export type ExpectedRecord = {
  value: JsonValue;
  ignoredFields: readonly string[];
};

export type BodyExpectation =
  | { kind: "records"; records: readonly ExpectedRecord[]; ordered: boolean }
  | { kind: "object"; record: ExpectedRecord };

export type Step = {
  readonly index: number;
  readonly line: number;
  readonly description?: string;
  readonly methods: readonly HttpMethod[];
  readonly apiRoot?: string;
  readonly endpoint: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly params: Readonly<Record<string, string>>;
  readonly body: BodySource;
  readonly numRetries: number;
  readonly sleepAfterSeconds: number;
  readonly engines?: readonly string[];
  readonly status: StatusExpectation;
  readonly expected?: BodyExpectation;
};

export type ScenarioRole = "setup" | "test" | "teardown";

export type ParseWarning = {
  documentIndex: number;
  line: number;
  message: string;
};

export type Scenario = {
  readonly name: string;
  readonly sourcePath?: string;
  readonly baseDir?: string;
  readonly role: ScenarioRole;
  readonly engines?: readonly string[];
  readonly steps: readonly Step[];
  readonly warnings: readonly ParseWarning[];
};
