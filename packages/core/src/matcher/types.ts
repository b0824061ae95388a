export type FieldDiff = {
  expectedIndex?: number;
  actualIndex?: number;
  path: string;
  expected: unknown;
  actual: unknown;
  reason: string;
};

export type UnpairedRecord = {
  index: number;
  record: unknown;
};

export type MismatchDiff = {
  status?: { expected: string; actual: number };
  body?: string;
  // Expected records that found no actual partner.
  missing: UnpairedRecord[];
  // Actual records left over once every possible pairing was made.
  surplus: UnpairedRecord[];
  fields: FieldDiff[];
};
