export function safeJsonParse<T>(value: string): { ok: true; value: T } | { ok: false; error: Error } {
  try {
    return { ok: true, value: JSON.parse(value) as T };
  } catch (e) {
    return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
  }
}

export function stableStringify(value: unknown): string {
  if (value === undefined) return "undefined";
  return JSON.stringify(value, (_k, v: unknown) => {
    if (v && typeof v === "object" && !Array.isArray(v)) {
      return Object.entries(v)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .reduce<Record<string, unknown>>((acc, [key, item]) => {
          acc[key] = item;
          return acc;
        }, {});
    }
    return v;
  });
}

const decoder = new TextDecoder();

export function bytesToText(body: string | Uint8Array): string {
  return typeof body === "string" ? body : decoder.decode(body);
}

// Engines answer errors with plain text now and then; such bodies come back as strings.
export function decodeJsonBody(body: Uint8Array): unknown {
  const text = decoder.decode(body);
  if (text.trim() === "") return undefined;
  const parsed = safeJsonParse<unknown>(text);
  return parsed.ok ? parsed.value : text;
}

export function encodeJson(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}
