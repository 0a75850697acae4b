// packages/verify/src/engine.ts
import {
  computeRecordHash,
  createLogger,
  errorMessage,
  loadTraceConfig,
  type LineageScope,
  type Logger,
  type TraceConfig,
} from "@decision-trace/decision";
import { buildLineageGraph, type StructuralConflict } from "./lineage-graph.js";
import { loadRecords, readRecordsFile, type GraphLoadError, type LoadedRecord, type ReadResult } from "./reader.js";
import { CANONICAL_RULES, type VerificationRule, type Violation } from "./rules.js";

export type VerificationOptions = {
  // scope filter: records of another tenant/environment are counted, not verified
  tenant_id?: string;
  environment?: string;
  lineage_scope?: LineageScope;
  known_ids?: Iterable<string>;
  /** Appended to the canonical battery. */
  rules?: readonly VerificationRule[];
  logger?: Logger;
};

export type RuleResult = {
  rule: string;
  description: string;
  passed: boolean;
  violations: Violation[];
};

export type VerificationReport = {
  ok: boolean;
  results: RuleResult[];
  load_errors: GraphLoadError[];
  conflicts: StructuralConflict[];
  records_checked: number;
  out_of_scope: number;
};

/**
 * Lineage scope and log level from environment configuration.
 */
export function verificationOptionsFromConfig(config: TraceConfig = loadTraceConfig()): VerificationOptions {
  return {
    lineage_scope: config.lineage_scope,
    logger: createLogger({ level: config.log_level, component: "decision-trace.verify" }),
  };
}

export function compareViolations(a: Violation, b: Violation): number {
  const ka = [a.decision_id ?? "", a.detail, (a.related_ids ?? []).join(",")];
  const kb = [b.decision_id ?? "", b.detail, (b.related_ids ?? []).join(",")];
  for (let i = 0; i < ka.length; i++) {
    const x = ka[i] ?? "";
    const y = kb[i] ?? "";
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}

function compareLoadErrors(a: GraphLoadError, b: GraphLoadError): number {
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  return a.line - b.line;
}

// first occurrence of each distinct (decision_id, content)
function distinctRecords(records: readonly LoadedRecord[]): LoadedRecord[] {
  const seen = new Set<string>();
  const out: LoadedRecord[] = [];
  for (const r of records) {
    const key = `${r.record.decision_id}\u0000${computeRecordHash(r.record)}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(r);
  }
  return out;
}

/**
 * Runs the rule battery over one closed record set. Every call builds a fresh graph
 * and report; verify() always returns a report, even when a rule throws.
 */
export class VerificationEngine {
  readonly rules: readonly VerificationRule[];
  private readonly log: Logger;
  // materialized once so every pass sees the same ids, even from a one-shot iterator
  private readonly known: ReadonlySet<string> | undefined;

  constructor(private readonly opts: VerificationOptions = {}) {
    this.rules = [...CANONICAL_RULES, ...(opts.rules ?? [])];
    this.known = opts.known_ids === undefined ? undefined : new Set(opts.known_ids);
    this.log = opts.logger ?? createLogger({ component: "decision-trace.verify" });
  }

  private inScope(r: LoadedRecord): boolean {
    const { tenant_id, environment } = this.opts;
    if (tenant_id !== undefined && r.record.tenant_id !== tenant_id) return false;
    if (environment !== undefined && r.record.environment !== environment) return false;
    return true;
  }

  verify(input: ReadResult | readonly LoadedRecord[]): VerificationReport {
    const loaded: ReadResult = "records" in input ? input : { records: [...input], errors: [] };

    const inScope = loaded.records.filter((r) => this.inScope(r));
    const graph = buildLineageGraph(inScope, {
      on_conflict: "exclude",
      ...(this.opts.lineage_scope !== undefined && { lineage_scope: this.opts.lineage_scope }),
      ...(this.known !== undefined && { known_ids: this.known }),
    });
    const ctx = { records: distinctRecords(inScope), graph };

    const results: RuleResult[] = this.rules.map((rule) => {
      let violations: Violation[];
      try {
        violations = rule.evaluate(ctx);
      } catch (e) {
        this.log.error({ rule: rule.name, err: e }, "verification rule threw");
        violations = [{ rule: rule.name, decision_id: null, detail: `rule failed to evaluate: ${errorMessage(e)}` }];
      }
      const sorted = [...violations].sort(compareViolations);
      return { rule: rule.name, description: rule.description, passed: sorted.length === 0, violations: sorted };
    });

    const load_errors = [...loaded.errors].sort(compareLoadErrors);
    const report: VerificationReport = {
      ok: results.every((r) => r.passed) && load_errors.length === 0,
      results,
      load_errors,
      conflicts: graph.conflicts(),
      records_checked: inScope.length,
      out_of_scope: loaded.records.length - inScope.length,
    };

    this.log.info(
      {
        ok: report.ok,
        records: report.records_checked,
        out_of_scope: report.out_of_scope,
        load_errors: load_errors.length,
        failed_rules: results.filter((r) => !r.passed).map((r) => r.rule),
      },
      "verification complete"
    );
    return report;
  }
}

/**
 * Verifies in-memory values (exporter records, decoded JSON). Values that cannot
 * be graph nodes become load errors with source "memory".
 */
export function verifyRecords(records: readonly unknown[], opts: VerificationOptions = {}): VerificationReport {
  return new VerificationEngine(opts).verify(loadRecords(records));
}

export async function verifyFile(path: string, opts: VerificationOptions = {}): Promise<VerificationReport> {
  return new VerificationEngine(opts).verify(await readRecordsFile(path));
}
