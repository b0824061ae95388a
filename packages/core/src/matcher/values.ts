import type { JsonValue } from "../scenarios/types.js";

export type ValueDiff = {
  path: string;
  expected: unknown;
  actual: unknown;
  reason: string;
};

type ExpectationOperator = { op: "anyOf"; alternatives: JsonValue[] } | { op: "absent" };

/**
 * Subset comparison of an actual JSON value against an expected one.
 *
 * Objects only check the keys the expectation names; extra actual keys are fine.
 * Arrays nested below the top level are compared positionally. An expected string
 * also accepts an actual number with the same decimal rendering (`"100"` vs `100`),
 * which is how `_cat` style APIs differ between engines.
 *
 * Two operators are recognised in expectations:
 * - `{ $anyOf: [a, b] }` passes when any alternative matches;
 * - `{ $absent: true }` as a key's value requires the key to be missing.
 *
 * Returns an empty list on a match.
 */
export function compareValue(
  actual: unknown,
  expected: JsonValue,
  path = "",
  ignoredFields: readonly string[] = []
): ValueDiff[] {
  const operator = asOperator(expected);
  if (operator?.op === "anyOf") {
    if (operator.alternatives.some((alt) => compareValue(actual, alt, path).length === 0)) return [];
    return [diff(path, expected, actual, `matches none of ${operator.alternatives.length} alternatives`)];
  }
  if (operator?.op === "absent") {
    return actual === undefined ? [] : [diff(path, expected, actual, "expected field to be absent")];
  }

  if (expected === null) return actual === null ? [] : [diff(path, expected, actual, "expected null")];

  if (typeof expected === "string") {
    if (actual === expected) return [];
    if (typeof actual === "number" && String(actual) === expected) return [];
    return [diff(path, expected, actual, "value differs")];
  }

  if (typeof expected === "number" || typeof expected === "boolean") {
    return actual === expected ? [] : [diff(path, expected, actual, "value differs")];
  }

  if (Array.isArray(expected)) {
    if (!Array.isArray(actual)) return [diff(path, expected, actual, `expected an array, got ${describeType(actual)}`)];
    if (actual.length !== expected.length) {
      return [diff(path, expected, actual, `expected ${expected.length} items, got ${actual.length}`)];
    }
    return expected.flatMap((item, i) => compareValue(actual[i], item, `${path}[${i}]`));
  }

  if (!isPlainObject(actual)) return [diff(path, expected, actual, `expected an object, got ${describeType(actual)}`)];

  const diffs: ValueDiff[] = [];
  for (const [key, value] of Object.entries(expected)) {
    if (key.startsWith("#") || ignoredFields.includes(key)) continue;
    const childPath = path ? `${path}.${key}` : key;
    const present = Object.hasOwn(actual, key);
    if (asOperator(value)?.op === "absent") {
      if (present) diffs.push(diff(childPath, value, actual[key], "expected field to be absent"));
      continue;
    }
    if (!present) {
      diffs.push(diff(childPath, value, undefined, "missing field"));
      continue;
    }
    diffs.push(...compareValue(actual[key], value, childPath));
  }
  return diffs;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function describeType(value: unknown): string {
  if (value === undefined) return "empty body";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function asOperator(value: JsonValue): ExpectationOperator | null {
  if (!isPlainObject(value)) return null;
  const keys = Object.keys(value);
  if (keys.length !== 1) return null;
  const anyOf = value.$anyOf;
  if (keys[0] === "$anyOf" && Array.isArray(anyOf)) return { op: "anyOf", alternatives: anyOf };
  if (keys[0] === "$absent" && value.$absent === true) return { op: "absent" };
  return null;
}

function diff(path: string, expected: unknown, actual: unknown, reason: string): ValueDiff {
  return { path: path || "$", expected, actual, reason };
}
