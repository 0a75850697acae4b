import { describe, it, expect } from "vitest";
import { verifyRecords } from "../src/engine.js";
import { quiet, validRecord, violationsOf } from "./_helpers/records.js";

const CANONICAL = [
  "schema_completeness",
  "actor_explicitness",
  "non_trivial_logic",
  "outcome_clarity",
  "lineage_integrity",
  "acyclicity",
  "duplicate_identifiers",
  "duplicate_emission",
  "timestamp_monotonicity",
];

describe("verify: canonical rules", () => {
  it("passes a clean lineage chain", () => {
    const report = verifyRecords(
      [
        validRecord("A", { timestamp: "2026-01-19T09:00:00Z" }),
        validRecord("B", { timestamp: "2026-01-19T09:01:00Z", lineage: ["A"] }),
        validRecord("C", { timestamp: "2026-01-19T11:02:00+01:00", lineage: ["B"] }),
      ],
      quiet
    );

    expect(report.ok).toBe(true);
    expect(report.results.map((r) => r.rule)).toEqual(CANONICAL);
    expect(report.results.every((r) => r.passed)).toBe(true);
    expect(report.records_checked).toBe(3);
    expect(report.load_errors).toEqual([]);
  });

  it("fails non-trivial logic for empty reason_codes and names the record", () => {
    const report = verifyRecords([validRecord("X", { logic: { reason_codes: [] } })], quiet);

    expect(report.ok).toBe(false);
    expect(violationsOf(report, "non_trivial_logic")).toEqual([
      { rule: "non_trivial_logic", decision_id: "X", detail: "logic has no reason artifacts" },
    ]);
    expect(violationsOf(report, "schema_completeness")).toEqual([]);
  });

  it("fails non-trivial logic when every explanation is blank", () => {
    const report = verifyRecords(
      [validRecord("X", { logic: { checks: [{ code: "C1", message: " " }, ""] } })],
      quiet
    );

    expect(violationsOf(report, "non_trivial_logic")).toEqual([
      { rule: "non_trivial_logic", decision_id: "X", detail: "every reason artifact has an empty explanation" },
    ]);
  });

  it("uses the first non-empty explanation of an artifact", () => {
    const report = verifyRecords(
      [validRecord("X", { logic: { reason_codes: [{ code: "R1", explain: "", message: "Rent is fixed." }] } })],
      quiet
    );
    expect(violationsOf(report, "non_trivial_logic")).toEqual([]);
  });

  it("accepts a rationale as the only reason artifact", () => {
    const report = verifyRecords([validRecord("X", { logic: { rationale: "Lowest projected risk." } })], quiet);
    expect(violationsOf(report, "non_trivial_logic")).toEqual([]);
  });

  it("names the child and the missing parent for a dangling reference", () => {
    const report = verifyRecords([validRecord("B", { lineage: ["A"] })], quiet);

    expect(violationsOf(report, "lineage_integrity")).toEqual([
      { rule: "lineage_integrity", decision_id: "B", detail: 'lineage references unknown decision_id "A"', related_ids: ["A"] },
    ]);
  });

  it("fails timestamp monotonicity for a record earlier than its ancestor", () => {
    const report = verifyRecords(
      [
        validRecord("A", { timestamp: "2026-01-19T10:00:00Z" }),
        validRecord("C", { timestamp: "2026-01-19T09:00:00Z", lineage: ["A"] }),
      ],
      quiet
    );

    expect(violationsOf(report, "timestamp_monotonicity")).toEqual([
      { rule: "timestamp_monotonicity", decision_id: "C", detail: "timestamp precedes ancestor(s) A", related_ids: ["A"] },
    ]);
  });

  it("checks monotonicity against every ancestor, not only the parent", () => {
    const report = verifyRecords(
      [
        validRecord("A", { timestamp: "2026-01-19T10:00:00Z" }),
        validRecord("B", { timestamp: "2026-01-19T08:00:00Z", lineage: ["A"] }),
        validRecord("C", { timestamp: "2026-01-19T09:00:00Z", lineage: ["B"] }),
      ],
      quiet
    );

    expect(violationsOf(report, "timestamp_monotonicity").map((v) => [v.decision_id, v.related_ids])).toEqual([
      ["B", ["A"]],
      ["C", ["A"]],
    ]);
  });

  it("reports every member of a cycle, including a self-reference", () => {
    const report = verifyRecords(
      [
        validRecord("A", { lineage: ["B"] }),
        validRecord("B", { lineage: ["A"] }),
        validRecord("S", { lineage: ["S"] }),
      ],
      quiet
    );

    expect(violationsOf(report, "acyclicity")).toEqual([
      { rule: "acyclicity", decision_id: "A", detail: "lineage cycle through A, B", related_ids: ["A", "B"] },
      { rule: "acyclicity", decision_id: "B", detail: "lineage cycle through A, B", related_ids: ["A", "B"] },
      { rule: "acyclicity", decision_id: "S", detail: "lineage lists its own decision_id", related_ids: ["S"] },
    ]);
    expect(violationsOf(report, "lineage_integrity")).toEqual([]);
  });

  it("collapses an identical re-emission into one duplicate_emission finding", () => {
    const a = validRecord("A", { logic: { reason_codes: [] } });
    const report = verifyRecords([a, { ...a }], quiet);

    expect(violationsOf(report, "duplicate_emission")).toEqual([
      { rule: "duplicate_emission", decision_id: "A", detail: "identical record emitted 2 times" },
    ]);
    expect(violationsOf(report, "non_trivial_logic")).toHaveLength(1);
    expect(violationsOf(report, "duplicate_identifiers")).toEqual([]);
  });

  it("reports a reused id with different content as a structural conflict", () => {
    const report = verifyRecords(
      [
        validRecord("A"),
        validRecord("A", { outcome: { policy_status: "REJECT" } }),
        validRecord("B", { lineage: ["A"] }),
      ],
      quiet
    );

    expect(violationsOf(report, "duplicate_identifiers")).toEqual([
      {
        rule: "duplicate_identifiers",
        decision_id: "A",
        detail: "2 different records share this decision_id (memory:1, memory:2)",
      },
    ]);
    expect(report.conflicts.map((c) => c.decision_id)).toEqual(["A"]);
    // the excluded id is reported once, not again as dangling
    expect(violationsOf(report, "lineage_integrity")).toEqual([]);
  });

  it("lists each schema problem of a record in one violation", () => {
    const report = verifyRecords(
      [validRecord("X", { context: {}, timestamp: "2026-01-19 10:00", confidence: 2 })],
      quiet
    );

    expect(violationsOf(report, "schema_completeness")).toEqual([
      {
        rule: "schema_completeness",
        decision_id: "X",
        detail:
          'missing or empty: context; timestamp "2026-01-19 10:00" is not ISO-8601 with timezone and millisecond precision; confidence must be a number in [0, 1]',
      },
    ]);
  });

  it("rejects sub-millisecond timestamps instead of ordering them at millisecond precision", () => {
    const report = verifyRecords(
      [
        validRecord("A", { timestamp: "2026-01-19T10:00:00.0009Z" }),
        validRecord("C", { timestamp: "2026-01-19T10:00:00.0001Z", lineage: ["A"] }),
      ],
      quiet
    );

    expect(violationsOf(report, "schema_completeness")).toEqual([
      {
        rule: "schema_completeness",
        decision_id: "A",
        detail: 'timestamp "2026-01-19T10:00:00.0009Z" is not ISO-8601 with timezone and millisecond precision',
      },
      {
        rule: "schema_completeness",
        decision_id: "C",
        detail: 'timestamp "2026-01-19T10:00:00.0001Z" is not ISO-8601 with timezone and millisecond precision',
      },
    ]);
    expect(report.ok).toBe(false);
  });

  it("flags a non-object logic block", () => {
    const report = verifyRecords([validRecord("X", { logic: "looked fine" })], quiet);
    expect(violationsOf(report, "schema_completeness")[0]?.detail).toBe("not an object: logic");
  });

  it("requires an explicit actor", () => {
    const report = verifyRecords(
      [validRecord("X", { actor: { id: "", name: "PolicyGuardAgent" } }), validRecord("Y", { actor: "someone" })],
      quiet
    );

    expect(violationsOf(report, "actor_explicitness")).toEqual([
      { rule: "actor_explicitness", decision_id: "X", detail: "actor.id is empty; actor.type is absent" },
      { rule: "actor_explicitness", decision_id: "Y", detail: "actor is missing" },
    ]);
  });

  it("requires a decision or status field in the outcome", () => {
    const report = verifyRecords(
      [
        validRecord("bare", { outcome: { amount: 120 } }),
        validRecord("bool", { outcome: { decision: false } }),
        validRecord("blank", { outcome: { status: "" } }),
        validRecord("typed", { outcome: { risk_status: "LOW" } }),
      ],
      quiet
    );

    expect(violationsOf(report, "outcome_clarity").map((v) => v.decision_id)).toEqual(["bare", "blank"]);
  });
});
