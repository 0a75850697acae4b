import { describe, it, expect } from "vitest";
import { decodeRecordLine, encodeRecordLine } from "../src/codec.js";
import { canonicalJson, computeRecordHash, recordsEqual } from "../src/hash.js";
import { buildDecisionRecord, isIsoTimestampWithZone, RECORD_FIELDS } from "../src/record.js";
import { agent, policyPayload } from "./_helpers/fixtures.js";

const record = buildDecisionRecord({
  decision_id: "dec-codec-1",
  decision_type: "PLAN_EVALUATED_POLICY",
  timestamp: "2026-01-19T08:30:00.000Z",
  tenant_id: "tenant-test",
  environment: "test",
  actor: agent,
  payload: { ...policyPayload, lineage: ["dec-codec-0"] },
});

describe("codec: JSON lines", () => {
  it("writes fields in sink order on one line", () => {
    const line = encodeRecordLine(record);

    expect(line).not.toContain("\n");
    expect(Object.keys(JSON.parse(line))).toEqual([...RECORD_FIELDS]);
  });

  it("omits an absent confidence", () => {
    const { confidence: _omit, ...payload } = policyPayload;
    const bare = buildDecisionRecord({
      decision_id: "dec-codec-2",
      decision_type: "PLAN_PROPOSED",
      timestamp: "2026-01-19T08:30:01.000Z",
      tenant_id: "tenant-test",
      environment: "test",
      actor: agent,
      payload: { ...payload, lineage: [] },
    });

    expect(Object.keys(JSON.parse(encodeRecordLine(bare)))).not.toContain("confidence");
  });

  it("reads back every field", () => {
    const decoded = decodeRecordLine(encodeRecordLine(record));

    expect(decoded.ok).toBe(true);
    if (decoded.ok) expect(recordsEqual(decoded.record, record)).toBe(true);
  });

  it("reports malformed JSON", () => {
    const decoded = decodeRecordLine("{not json");

    expect(decoded.ok).toBe(false);
    if (!decoded.ok) expect(decoded.error.startsWith("invalid JSON: ")).toBe(true);
  });

  it("reports a record missing required fields", () => {
    const decoded = decodeRecordLine(JSON.stringify({ decision_id: "dec-x" }));

    expect(decoded.ok).toBe(false);
    if (!decoded.ok) {
      expect(decoded.error.startsWith("invalid record: ")).toBe(true);
      expect(decoded.error).toContain("decision_type");
    }
  });

  it("rejects a timestamp without a zone", () => {
    const decoded = decodeRecordLine(JSON.stringify({ ...record, timestamp: "2026-01-19T08:30:00" }));

    expect(decoded.ok).toBe(false);
    if (!decoded.ok) expect(decoded.error).toContain("timestamp must be ISO-8601 with timezone");
  });

  it("rejects a timestamp finer than milliseconds", () => {
    const decoded = decodeRecordLine(JSON.stringify({ ...record, timestamp: "2026-01-19T08:30:00.0001Z" }));

    expect(decoded.ok).toBe(false);
    expect(isIsoTimestampWithZone("2026-01-19T08:30:00.123+02:00")).toBe(true);
    expect(isIsoTimestampWithZone("2026-01-19T08:30:00.1234Z")).toBe(false);
  });
});

describe("hash: canonical form", () => {
  it("sorts keys and keeps array order", () => {
    expect(canonicalJson({ b: 1, a: [2, 1] })).toBe('{"a":[2,1],"b":1}');
  });

  it("maps non-finite numbers to null and drops undefined", () => {
    expect(canonicalJson({ x: Number.NaN, y: undefined, z: Infinity })).toBe('{"x":null,"z":null}');
  });

  it("compares records independently of key order", () => {
    const reordered = JSON.parse(JSON.stringify(Object.assign({ outcome: record.outcome }, record)));

    expect(recordsEqual(reordered, record)).toBe(true);
    expect(computeRecordHash(reordered)).toBe(computeRecordHash(record));
    expect(computeRecordHash(record)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("distinguishes records that differ in one nested value", () => {
    const changed = { ...record, outcome: { policy_status: "REJECT" } };
    expect(recordsEqual(changed, record)).toBe(false);
  });
});
