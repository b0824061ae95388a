import { MismatchError } from "../errors.js";
import type { BodyExpectation, ExpectedRecord, StatusExpectation, Step } from "../scenarios/types.js";
import type { FieldDiff, MismatchDiff } from "./types.js";
import { compareValue, describeType } from "./values.js";

export type ActualResponse = {
  status: number;
  body: unknown;
};

export type MatchResult = { ok: true } | { ok: false; error: MismatchError };

export function statusSatisfied(status: number, expectation: StatusExpectation): boolean {
  switch (expectation.kind) {
    case "any":
      return true;
    case "exact":
      return status === expectation.code;
    case "success":
      return status >= 200 && status <= 299;
  }
}

export function describeStatus(expectation: StatusExpectation): string {
  switch (expectation.kind) {
    case "any":
      return "any";
    case "exact":
      return String(expectation.code);
    case "success":
      return "2xx";
  }
}

export function matchResponse(actual: ActualResponse, step: Pick<Step, "status" | "expected">): MatchResult {
  if (!statusSatisfied(actual.status, step.status)) {
    const expected = describeStatus(step.status);
    return mismatch(`status ${actual.status} does not satisfy expected status ${expected}`, {
      status: { expected, actual: actual.status },
      missing: [],
      surplus: [],
      fields: []
    });
  }
  if (!step.expected) return { ok: true };

  const diff = compareBody(actual.body, step.expected);
  return diff ? mismatch(summarize(diff, step.expected, actual.body), diff) : { ok: true };
}

export function compareBody(body: unknown, expectation: BodyExpectation): MismatchDiff | null {
  if (expectation.kind === "object") {
    const { value, ignoredFields } = expectation.record;
    const fields = compareValue(body, value, "", ignoredFields);
    return fields.length ? { missing: [], surplus: [], fields } : null;
  }

  const { records } = expectation;
  if (!Array.isArray(body)) {
    return {
      body: `expected a JSON array of ${records.length} record(s), got ${describeType(body)}`,
      missing: records.map((r, index) => ({ index, record: r.value })),
      surplus: [],
      fields: []
    };
  }

  const pairing = expectation.ordered ? positionalPairing(body, records) : maximumPairing(body, records);
  const missing = records.flatMap((r, index) => (pairing.partnerOf[index] === undefined ? [{ index, record: r.value }] : []));
  const surplus = body.flatMap((record: unknown, index) => (pairing.pairedActual.has(index) ? [] : [{ index, record }]));
  if (missing.length === 0 && surplus.length === 0) return null;

  return { missing, surplus, fields: closestFieldDiffs(body, records, missing, surplus, expectation.ordered) };
}

type Pairing = {
  // expected index -> actual index
  partnerOf: Array<number | undefined>;
  pairedActual: Set<number>;
};

function positionalPairing(actual: readonly unknown[], records: readonly ExpectedRecord[]): Pairing {
  const partnerOf = records.map((r, i) =>
    i < actual.length && compareValue(actual[i], r.value, "", r.ignoredFields).length === 0 ? i : undefined
  );
  return { partnerOf, pairedActual: new Set(partnerOf.filter((i): i is number => i !== undefined)) };
}

// Maximum bipartite matching (augmenting paths) so the outcome never depends on record order
// and duplicate expectations each need their own actual record.
function maximumPairing(actual: readonly unknown[], records: readonly ExpectedRecord[]): Pairing {
  const compatible = records.map((r) => actual.map((a) => compareValue(a, r.value, "", r.ignoredFields).length === 0));
  const ownerOf: Array<number | undefined> = actual.map(() => undefined);

  const assign = (e: number, visited: boolean[]): boolean => {
    const row = compatible[e] ?? [];
    for (let a = 0; a < actual.length; a++) {
      if (!row[a] || visited[a]) continue;
      visited[a] = true;
      const owner = ownerOf[a];
      if (owner === undefined || assign(owner, visited)) {
        ownerOf[a] = e;
        return true;
      }
    }
    return false;
  };

  records.forEach((_r, e) => assign(e, actual.map(() => false)));

  const partnerOf: Array<number | undefined> = records.map(() => undefined);
  const pairedActual = new Set<number>();
  ownerOf.forEach((e, a) => {
    if (e === undefined) return;
    partnerOf[e] = a;
    pairedActual.add(a);
  });
  return { partnerOf, pairedActual };
}

function closestFieldDiffs(
  actual: readonly unknown[],
  records: readonly ExpectedRecord[],
  missing: ReadonlyArray<{ index: number }>,
  surplus: ReadonlyArray<{ index: number }>,
  ordered: boolean
): FieldDiff[] {
  const out: FieldDiff[] = [];
  const free = new Set(surplus.map((s) => s.index));

  for (const { index: expectedIndex } of missing) {
    const record = records[expectedIndex];
    if (!record) continue;
    const candidates = ordered ? [expectedIndex].filter((i) => free.has(i)) : [...free];

    let best: { actualIndex: number; diffs: ReturnType<typeof compareValue> } | undefined;
    for (const actualIndex of candidates) {
      const diffs = compareValue(actual[actualIndex], record.value, "", record.ignoredFields);
      if (!best || diffs.length < best.diffs.length) best = { actualIndex, diffs };
    }
    if (!best) continue;

    free.delete(best.actualIndex);
    for (const d of best.diffs) out.push({ expectedIndex, actualIndex: best.actualIndex, ...d });
  }
  return out;
}

function summarize(diff: MismatchDiff, expectation: BodyExpectation, body: unknown): string {
  if (diff.body) return diff.body;
  if (expectation.kind === "object") {
    return `body differs at ${diff.fields.map((f) => f.path).join(", ")}`;
  }
  const actualCount = Array.isArray(body) ? body.length : 0;
  const parts = [`expected ${expectation.records.length} record(s), got ${actualCount}`];
  if (diff.missing.length) parts.push(`${diff.missing.length} expected record(s) unmatched`);
  if (diff.surplus.length) parts.push(`${diff.surplus.length} actual record(s) surplus`);
  const paths = [...new Set(diff.fields.map((f) => f.path))];
  if (paths.length) parts.push(`differing field(s): ${paths.join(", ")}`);
  return parts.join("; ");
}

function mismatch(message: string, diff: MismatchDiff): MatchResult {
  return { ok: false, error: new MismatchError(message, diff) };
}
