import type { ParseWarning } from "./types.js";

// `#uuid: gharchive:01H...` inside an expected record disables that key instead of deleting it.
const FIELD_COMMENT_RE = /^(\s*)#\s*(["']?)([^\s:#"'][^\s:"']*)\2\s*:(?:\s|$)/;
const EXPECTED_KEY_RE = /^expected\s*:(.*)$/;
const SEQ_ITEM_RE = /^(\s*)-(\s+|$)/;

export type IgnoredFields = {
  records: Map<number, string[]>;
  object: string[];
  warnings: ParseWarning[];
};

type FieldComment = {
  key: string;
  indent: number;
  line: number;
  recordIndex: number;
  keyIndent: number | undefined;
};

export function scanIgnoredFields(
  lines: readonly string[],
  opts: { documentIndex: number; firstLine: number }
): IgnoredFields {
  const result: IgnoredFields = { records: new Map(), object: [], warnings: [] };

  const start = lines.findIndex((l) => EXPECTED_KEY_RE.test(l));
  if (start < 0) return result;
  const inline = stripTrailingComment(lines[start]?.match(EXPECTED_KEY_RE)?.[1] ?? "");
  if (inline.length > 0) return result;

  let mode: "records" | "object" | undefined;
  let seqIndent: number | undefined;
  let keyIndent: number | undefined;
  let recordIndex = -1;
  const comments: FieldComment[] = [];

  for (let i = start + 1; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (line.trim() === "") continue;
    const indent = line.length - line.trimStart().length;
    const trimmed = line.trimStart();

    if (trimmed.startsWith("#")) {
      const m = line.match(FIELD_COMMENT_RE);
      if (m?.[3]) comments.push({ key: m[3], indent, line: opts.firstLine + i, recordIndex, keyIndent });
      continue;
    }
    // The next top-level key closes the block; sequences may sit at column 0 under `expected:`.
    if (indent === 0 && !trimmed.startsWith("-")) break;

    const item = line.match(SEQ_ITEM_RE);
    if (mode === undefined) {
      mode = item ? "records" : "object";
      if (item) seqIndent = indent;
    }

    if (mode === "records" && item && indent === seqIndent) {
      recordIndex++;
      const rest = line.slice((item[0] ?? "").length);
      keyIndent = rest.trim() === "" || rest.trimStart().startsWith("#") ? undefined : (item[0] ?? "").length;
      continue;
    }
    keyIndent ??= indent;
  }

  for (const c of comments) {
    if (mode === "records" && c.recordIndex >= 0 && c.keyIndent !== undefined && c.indent === c.keyIndent) {
      const fields = result.records.get(c.recordIndex) ?? [];
      fields.push(c.key);
      result.records.set(c.recordIndex, fields);
    } else if (mode === "object" && c.indent === keyIndent) {
      result.object.push(c.key);
    } else {
      result.warnings.push({
        documentIndex: opts.documentIndex,
        line: c.line,
        message: `commented field "${c.key}" is not aligned with an expected record's keys; it is not treated as an ignored field`
      });
    }
  }

  return result;
}

function stripTrailingComment(value: string): string {
  const hash = value.search(/(^|\s)#/);
  return (hash >= 0 ? value.slice(0, hash) : value).trim();
}
