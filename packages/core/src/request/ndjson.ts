import type { JsonValue } from "../scenarios/types.js";
import { safeJsonParse } from "../util/json.js";

// Bulk-ingest wire format: one compact JSON value per line, newline terminated.
export function serializeNdjson(records: readonly JsonValue[]): string {
  return records.map((r) => JSON.stringify(r) + "\n").join("");
}

export function parseNdjson(text: string): JsonValue[] {
  const out: JsonValue[] = [];
  text.split("\n").forEach((line, i) => {
    if (line.trim() === "") return;
    const parsed = safeJsonParse<JsonValue>(line);
    if (!parsed.ok) throw new Error(`invalid ndjson at line ${i + 1}: ${parsed.error.message}`);
    out.push(parsed.value);
  });
  return out;
}
