// packages/verify/src/report.ts
import type { StructuralConflict } from "./lineage-graph.js";
import type { GraphLoadError } from "./reader.js";
import type { Violation } from "./rules.js";
import type { VerificationReport } from "./engine.js";

export type ReportMapping = {
  ok: boolean;
  rules: Record<string, Violation[]>;
  load_errors: GraphLoadError[];
  conflicts: StructuralConflict[];
  out_of_scope: number;
};

/**
 * Consumption shape: rule name -> violations (empty when the rule passed).
 */
export function toReportMapping(report: VerificationReport): ReportMapping {
  const rules: Record<string, Violation[]> = {};
  for (const r of report.results) rules[r.rule] = r.violations.map((v) => ({ ...v }));

  return {
    ok: report.ok,
    rules,
    load_errors: report.load_errors.map((e) => ({ ...e })),
    conflicts: report.conflicts.map((c) => ({ ...c })),
    out_of_scope: report.out_of_scope,
  };
}

export function failedRules(report: VerificationReport): string[] {
  return report.results.filter((r) => !r.passed).map((r) => r.rule);
}
