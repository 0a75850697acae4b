// packages/decision/src/in-memory-exporter.ts
import { ExportError } from "./errors.js";
import type { DecisionExporter, ExportResult } from "./exporter.js";
import type { DecisionRecord } from "./record.js";

/**
 * Keeps appended records in process. Used by tests and by in-process consumers
 * that verify a run without touching disk.
 */
export class InMemoryDecisionExporter implements DecisionExporter {
  private readonly records: DecisionRecord[] = [];
  private closed = false;

  constructor(readonly name = "memory") {}

  async append(record: DecisionRecord): Promise<ExportResult> {
    if (this.closed) {
      return {
        ok: false,
        error: new ExportError(this.name, record.decision_id, "CLOSED", "exporter is closed"),
      };
    }
    // records are frozen; no clone needed
    this.records.push(record);
    return { ok: true };
  }

  async flush(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }

  getRecords(): readonly DecisionRecord[] {
    return [...this.records];
  }
}
