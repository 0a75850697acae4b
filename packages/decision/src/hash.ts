// packages/decision/src/hash.ts
import { createHash } from "node:crypto";
import type { DecisionRecord } from "./record.js";

/**
 * Stable (canonical) JSON stringify:
 * - object keys are sorted
 * - arrays preserve order
 * - undefined is omitted in objects (like JSON.stringify)
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function canonicalize(value: unknown): unknown {
  if (value === null) return null;

  const t = typeof value;

  if (t === "string" || t === "boolean") return value;
  if (t === "number") return Number.isFinite(value) ? value : null;

  if (Array.isArray(value)) return value.map(canonicalize);

  if (typeof value === "object" && value !== null) {
    const out: Record<string, unknown> = {};
    const entries: Array<[string, unknown]> = Object.entries(value);
    for (const [k, v] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (typeof v === "undefined") continue;
      out[k] = canonicalize(v);
    }
    return out;
  }

  // functions/symbols/bigints are not representable in JSON
  return null;
}

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

/**
 * Content hash over every field of a record (or a record-shaped object read back from a sink).
 */
export function computeRecordHash(record: DecisionRecord | Record<string, unknown>): string {
  return sha256Hex(canonicalJson(record));
}

/**
 * Full-field equality, independent of key order.
 */
export function recordsEqual(a: unknown, b: unknown): boolean {
  return canonicalJson(a) === canonicalJson(b);
}
