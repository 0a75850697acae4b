// packages/decision/src/codec.ts
import { DecisionRecordSchema, RECORD_FIELDS, type DecisionRecord } from "./record.js";

export type DecodeRecordResult =
  | { ok: true; record: DecisionRecord }
  | { ok: false; error: string };

/**
 * One record -> one JSON line (no trailing newline). Field order follows RECORD_FIELDS.
 */
export function encodeRecordLine(record: DecisionRecord): string {
  const ordered: Record<string, unknown> = {};
  for (const field of RECORD_FIELDS) {
    const v = record[field];
    if (v !== undefined) ordered[field] = v;
  }
  return JSON.stringify(ordered);
}

export function decodeRecordLine(line: string): DecodeRecordResult {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (e) {
    return { ok: false, error: `invalid JSON: ${e instanceof Error ? e.message : String(e)}` };
  }

  const parsed = DecisionRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return { ok: false, error: `invalid record: ${issues.join("; ")}` };
  }

  return { ok: true, record: parsed.data };
}
