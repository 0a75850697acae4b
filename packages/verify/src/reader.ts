// packages/verify/src/reader.ts
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errorMessage, type SqliteDecisionExporter } from "@decision-trace/decision";

/**
 * A record as read back from a sink. Only the fields the graph needs are checked here;
 * the rest is left to the verification rules.
 */
export type TraceRecord = {
  decision_id: string;
  lineage: string[];
  [field: string]: unknown;
};

export type LoadedRecord = {
  record: TraceRecord;
  source: string;
  // 1-based line in a JSONL file, seq in a SQLite sink, index in memory
  line: number;
};

/**
 * A line that could not become a graph node. The line is excluded and reported.
 */
export type GraphLoadError = {
  source: string;
  line: number;
  message: string;
  raw: string;
};

export type ReadResult = {
  records: LoadedRecord[];
  errors: GraphLoadError[];
};

const LINEAGE_MESSAGE = "lineage must be an array of strings";

const LoadedShapeSchema = z
  .object(
    {
      decision_id: z
        .string({ required_error: "decision_id is missing", invalid_type_error: "decision_id must be a string" })
        .refine((v) => v.trim().length > 0, { message: "decision_id is empty" }),
      lineage: z.array(z.string({ invalid_type_error: LINEAGE_MESSAGE }), {
        required_error: "lineage is missing",
        invalid_type_error: LINEAGE_MESSAGE,
      }),
    },
    { invalid_type_error: "record must be a JSON object" }
  )
  .passthrough();

function rawText(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function loadRecordValue(
  value: unknown,
  at: { source: string; line: number; raw?: string }
): { ok: true; loaded: LoadedRecord } | { ok: false; error: GraphLoadError } {
  const parsed = LoadedShapeSchema.safeParse(value);
  if (!parsed.success) {
    const messages = [...new Set(parsed.error.issues.map((i) => i.message))];
    return {
      ok: false,
      error: { source: at.source, line: at.line, message: messages.join("; "), raw: at.raw ?? rawText(value) },
    };
  }
  return { ok: true, loaded: { record: parsed.data, source: at.source, line: at.line } };
}

/**
 * Loads in-memory values (records from an exporter, decoded JSON, ...).
 */
export function loadRecords(values: readonly unknown[], source = "memory"): ReadResult {
  const out: ReadResult = { records: [], errors: [] };
  values.forEach((value, i) => {
    const r = loadRecordValue(value, { source, line: i + 1 });
    if (r.ok) out.records.push(r.loaded);
    else out.errors.push(r.error);
  });
  return out;
}

export function parseRecordLines(text: string, opts: { source?: string } = {}): ReadResult {
  const source = opts.source ?? "<text>";
  const out: ReadResult = { records: [], errors: [] };

  text.split(/\r?\n/).forEach((raw, i) => {
    if (raw.trim().length === 0) return;
    const line = i + 1;

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (e) {
      out.errors.push({ source, line, message: `invalid JSON: ${errorMessage(e)}`, raw });
      return;
    }

    const r = loadRecordValue(value, { source, line, raw });
    if (r.ok) out.records.push(r.loaded);
    else out.errors.push(r.error);
  });

  return out;
}

/**
 * Reads a JSONL sink. An unreadable file is reported as a load error on line 0.
 */
export async function readRecordsFile(path: string): Promise<ReadResult> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    return { records: [], errors: [{ source: path, line: 0, message: `cannot read file: ${errorMessage(e)}`, raw: "" }] };
  }
  return parseRecordLines(text, { source: path });
}

export function readRecordsFromSqlite(
  exporter: SqliteDecisionExporter,
  scope: { tenant_id?: string; environment?: string } = {}
): ReadResult {
  const out: ReadResult = { records: [], errors: [] };

  for (const row of exporter.listRows(scope)) {
    let value: unknown;
    try {
      value = JSON.parse(row.record_json);
    } catch (e) {
      out.errors.push({ source: exporter.name, line: row.seq, message: `invalid JSON: ${errorMessage(e)}`, raw: row.record_json });
      continue;
    }

    const r = loadRecordValue(value, { source: exporter.name, line: row.seq, raw: row.record_json });
    if (r.ok) out.records.push(r.loaded);
    else out.errors.push(r.error);
  }

  return out;
}
