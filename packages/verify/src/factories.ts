// packages/verify/src/factories.ts
// Configurable rules for run-level expectations on top of the canonical battery.
import { isPlainObject, type VerificationRule, type Violation } from "./rules.js";

export const DEFAULT_PLACEHOLDER_TOKENS: readonly string[] = Object.freeze([
  "Plan A",
  "Plan B",
  "Plan C",
  "Option 1",
  "Option 2",
  "Option 3",
]);

/**
 * Fails when a decision_type does not occur exactly the expected number of times
 * (counted over distinct decision_ids).
 */
export function expectDecisionTypeCounts(counts: Readonly<Record<string, number>>): VerificationRule {
  return {
    name: "decision_type_counts",
    description: "Each listed decision_type occurs the expected number of times.",
    evaluate({ records }) {
      const byType = new Map<string, Set<string>>();
      for (const { record } of records) {
        if (typeof record.decision_type !== "string") continue;
        const ids = byType.get(record.decision_type) ?? new Set<string>();
        ids.add(record.decision_id);
        byType.set(record.decision_type, ids);
      }

      const out: Violation[] = [];
      for (const [type, expected] of Object.entries(counts).sort(([a], [b]) => (a < b ? -1 : 1))) {
        const ids = [...(byType.get(type) ?? [])].sort();
        if (ids.length !== expected) {
          out.push({
            rule: "decision_type_counts",
            decision_id: null,
            detail: `expected ${expected} ${type} record(s), found ${ids.length}`,
            related_ids: ids,
          });
        }
      }
      return out;
    },
  };
}

function findTokens(value: unknown, tokens: readonly string[], path: string, hits: string[]): void {
  if (typeof value === "string") {
    for (const t of tokens) if (value.includes(t)) hits.push(`"${t}" at ${path}`);
  } else if (Array.isArray(value)) {
    value.forEach((v, i) => findTokens(v, tokens, `${path}[${i}]`, hits));
  } else if (isPlainObject(value)) {
    for (const [k, v] of Object.entries(value)) findTokens(v, tokens, path ? `${path}.${k}` : k, hits);
  }
}

/**
 * Fails any record whose string values contain a placeholder label.
 */
export function forbidPlaceholderTokens(tokens: readonly string[] = DEFAULT_PLACEHOLDER_TOKENS): VerificationRule {
  return {
    name: "no_placeholder_tokens",
    description: "Record values never carry placeholder labels.",
    evaluate({ records }) {
      const out: Violation[] = [];
      for (const { record } of records) {
        const hits: string[] = [];
        findTokens(record, tokens, "", hits);
        if (hits.length > 0) {
          out.push({ rule: "no_placeholder_tokens", decision_id: record.decision_id, detail: `placeholder ${hits.join(", ")}` });
        }
      }
      return out;
    },
  };
}

function isEmptyValue(v: unknown): boolean {
  if (v === undefined || v === null) return true;
  if (typeof v === "string") return v.trim().length === 0;
  if (Array.isArray(v)) return v.length === 0;
  if (isPlainObject(v)) return Object.keys(v).length === 0;
  return false;
}

/**
 * Per decision_type, logic keys that must be present and non-empty,
 * e.g. `{ FINAL_PLAN_SELECTED: ["rationale", "tie_breakers_applied"] }`.
 */
export function requireLogicFields(byType: Readonly<Record<string, readonly string[]>>): VerificationRule {
  return {
    name: "required_logic_fields",
    description: "Typed records carry the logic fields their type requires.",
    evaluate({ records }) {
      const out: Violation[] = [];
      for (const { record } of records) {
        if (typeof record.decision_type !== "string") continue;
        const required = byType[record.decision_type];
        if (required === undefined) continue;

        const logic = isPlainObject(record.logic) ? record.logic : {};
        const missing = required.filter((k) => isEmptyValue(logic[k]));
        if (missing.length > 0) {
          out.push({
            rule: "required_logic_fields",
            decision_id: record.decision_id,
            detail: `logic missing or empty: ${missing.join(", ")}`,
          });
        }
      }
      return out;
    },
  };
}
