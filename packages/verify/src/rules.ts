// packages/verify/src/rules.ts
import { REQUIRED_RECORD_FIELDS } from "@decision-trace/decision";
import { timestampMs, type LineageGraph } from "./lineage-graph.js";
import type { LoadedRecord } from "./reader.js";

export type Violation = {
  rule: string;
  // null for set-level findings (e.g. a missing decision_type count)
  decision_id: string | null;
  detail: string;
  related_ids?: string[];
};

export type RuleContext = {
  // one entry per distinct (decision_id, content); duplicate emissions collapsed
  records: readonly LoadedRecord[];
  graph: LineageGraph;
};

/**
 * A pure check over one verification pass. Rules never see each other's output.
 */
export type VerificationRule = {
  name: string;
  description: string;
  evaluate(ctx: RuleContext): Violation[];
};

// -------------------------
// Field helpers
// -------------------------
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

const STRING_FIELDS = new Set<string>(["decision_id", "decision_type", "timestamp"]);

const EXPLANATION_KEYS = ["explain", "explanation", "message", "reason"] as const;
const ARTIFACT_LISTS = ["reason_codes", "checks", "reasons"] as const;

/**
 * Explanations of every reason artifact in a logic block.
 */
export function reasonArtifacts(logic: unknown): string[] {
  if (!isPlainObject(logic)) return [];
  const out: string[] = [];

  for (const key of ARTIFACT_LISTS) {
    const list = logic[key];
    if (!Array.isArray(list)) continue;
    for (const entry of list) {
      if (typeof entry === "string") {
        out.push(entry);
      } else if (isPlainObject(entry)) {
        const texts = EXPLANATION_KEYS.map((name) => entry[name]).filter((v): v is string => typeof v === "string");
        out.push(texts.find((t) => t.trim().length > 0) ?? "");
      }
    }
  }

  if (typeof logic.rationale === "string") out.push(logic.rationale);
  return out;
}

export function isStatusField(key: string, value: unknown): boolean {
  const named = key === "decision" || key === "status" || key.endsWith("_status");
  return named && (nonEmptyString(value) || typeof value === "boolean");
}

function violation(rule: string, decision_id: string | null, detail: string, related_ids?: string[]): Violation {
  return { rule, decision_id, detail, ...(related_ids !== undefined && { related_ids }) };
}

// -------------------------
// Canonical battery
// -------------------------
export const schemaCompleteness: VerificationRule = {
  name: "schema_completeness",
  description: "Required fields are present and non-empty; timestamp is zoned ISO-8601; confidence is within [0, 1].",
  evaluate({ records }) {
    const out: Violation[] = [];

    for (const { record } of records) {
      const missing: string[] = [];
      const wrongType: string[] = [];

      for (const field of REQUIRED_RECORD_FIELDS) {
        const v = record[field];
        if (STRING_FIELDS.has(field)) {
          if (!nonEmptyString(v)) missing.push(field);
        } else if (v === undefined || v === null) {
          missing.push(field);
        } else if (!isPlainObject(v)) {
          wrongType.push(field);
        } else if (Object.keys(v).length === 0) {
          missing.push(field);
        }
      }

      const problems: string[] = [];
      if (missing.length > 0) problems.push(`missing or empty: ${missing.join(", ")}`);
      if (wrongType.length > 0) problems.push(`not an object: ${wrongType.join(", ")}`);
      if (nonEmptyString(record.timestamp) && timestampMs(record.timestamp) === null) {
        problems.push(`timestamp "${record.timestamp}" is not ISO-8601 with timezone and millisecond precision`);
      }

      const c = record.confidence;
      if (c !== undefined && c !== null && (typeof c !== "number" || !(c >= 0 && c <= 1))) {
        problems.push("confidence must be a number in [0, 1]");
      }

      if (problems.length > 0) out.push(violation("schema_completeness", record.decision_id, problems.join("; ")));
    }
    return out;
  },
};

export const actorExplicitness: VerificationRule = {
  name: "actor_explicitness",
  description: "Every record names its actor with id, name and type.",
  evaluate({ records }) {
    const out: Violation[] = [];

    for (const { record } of records) {
      const actor = record.actor;
      if (!isPlainObject(actor)) {
        out.push(violation("actor_explicitness", record.decision_id, "actor is missing"));
        continue;
      }

      const problems: string[] = [];
      if (!nonEmptyString(actor.id)) problems.push("actor.id is empty");
      if (!nonEmptyString(actor.name)) problems.push("actor.name is empty");
      if (!nonEmptyString(actor.type)) problems.push("actor.type is absent");
      if (problems.length > 0) out.push(violation("actor_explicitness", record.decision_id, problems.join("; ")));
    }
    return out;
  },
};

export const nonTrivialLogic: VerificationRule = {
  name: "non_trivial_logic",
  description: "logic holds at least one reason artifact with a non-empty explanation.",
  evaluate({ records }) {
    const out: Violation[] = [];

    for (const { record } of records) {
      const artifacts = reasonArtifacts(record.logic);
      if (artifacts.length === 0) {
        out.push(violation("non_trivial_logic", record.decision_id, "logic has no reason artifacts"));
      } else if (artifacts.every((a) => a.trim().length === 0)) {
        out.push(violation("non_trivial_logic", record.decision_id, "every reason artifact has an empty explanation"));
      }
    }
    return out;
  },
};

export const outcomeClarity: VerificationRule = {
  name: "outcome_clarity",
  description: "outcome carries a decision or status field.",
  evaluate({ records }) {
    const out: Violation[] = [];

    for (const { record } of records) {
      const outcome = record.outcome;
      const clear = isPlainObject(outcome) && Object.entries(outcome).some(([k, v]) => isStatusField(k, v));
      if (!clear) out.push(violation("outcome_clarity", record.decision_id, "outcome has no decision or status field"));
    }
    return out;
  },
};

export const lineageIntegrity: VerificationRule = {
  name: "lineage_integrity",
  description: "Every lineage entry resolves to a known record.",
  evaluate({ graph }) {
    return graph
      .danglingReferences()
      .map((ref) => violation("lineage_integrity", ref.decision_id, `lineage references unknown decision_id "${ref.parent}"`, [ref.parent]));
  },
};

export const acyclicity: VerificationRule = {
  name: "acyclicity",
  description: "No decision is its own ancestor.",
  evaluate({ graph }) {
    const out: Violation[] = [];

    for (const cycle of graph.findCycles()) {
      for (const id of cycle) {
        const detail = cycle.length === 1 ? "lineage lists its own decision_id" : `lineage cycle through ${cycle.join(", ")}`;
        out.push(violation("acyclicity", id, detail, cycle));
      }
    }
    return out;
  },
};

export const duplicateIdentifiers: VerificationRule = {
  name: "duplicate_identifiers",
  description: "A decision_id is never shared by structurally different records.",
  evaluate({ graph }) {
    return graph.conflicts().map((c) => {
      const where = c.occurrences.map((o) => `${o.source}:${o.line}`).join(", ");
      return violation("duplicate_identifiers", c.decision_id, `${c.hashes.length} different records share this decision_id (${where})`);
    });
  },
};

export const duplicateEmission: VerificationRule = {
  name: "duplicate_emission",
  description: "An identical record is emitted once.",
  evaluate({ graph }) {
    return graph.duplicates().map((d) => violation("duplicate_emission", d.decision_id, `identical record emitted ${d.count} times`));
  },
};

export const timestampMonotonicity: VerificationRule = {
  name: "timestamp_monotonicity",
  description: "No record is timestamped before any of its ancestors.",
  evaluate({ graph }) {
    const out: Violation[] = [];

    for (const id of graph.ids()) {
      const own = timestampMs(graph.get(id)?.record.timestamp);
      if (own === null) continue;

      const later = graph
        .ancestorsOf(id)
        .filter((a) => {
          const t = timestampMs(graph.get(a)?.record.timestamp);
          return t !== null && own < t;
        })
        .sort();

      if (later.length > 0) {
        out.push(violation("timestamp_monotonicity", id, `timestamp precedes ancestor(s) ${later.join(", ")}`, later));
      }
    }
    return out;
  },
};

export const CANONICAL_RULES: readonly VerificationRule[] = Object.freeze([
  schemaCompleteness,
  actorExplicitness,
  nonTrivialLogic,
  outcomeClarity,
  lineageIntegrity,
  acyclicity,
  duplicateIdentifiers,
  duplicateEmission,
  timestampMonotonicity,
]);
