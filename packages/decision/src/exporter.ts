// packages/decision/src/exporter.ts
import { ExportError, errorMessage } from "./errors.js";
import type { DecisionRecord } from "./record.js";

export type ExportResult = { ok: true } | { ok: false; error: ExportError };

/**
 * Append-only decision sink.
 * - append() resolves once the record is durable (or reports why it is not)
 * - concurrent append() calls are serialized by the exporter itself
 */
export type DecisionExporter = {
  readonly name: string;
  append(record: DecisionRecord): Promise<ExportResult>;
  flush(): Promise<void>;
  close(): Promise<void>;
};

/**
 * Critical section for async work: tasks run one at a time, in call order.
 * A failing task does not break the chain for the next one.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const next = this.tail.then(task, task);
    this.tail = next.catch(() => undefined);
    return next;
  }

  /** Resolves after every task queued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}

export type DispatchResult = {
  delivered: string[];
  failures: ExportError[];
};

/**
 * Hands one record to every exporter. Exporters are independent:
 * a failure (returned or thrown) is collected and the remaining exporters still run.
 */
export async function dispatchToExporters(
  record: DecisionRecord,
  exporters: readonly DecisionExporter[]
): Promise<DispatchResult> {
  const settled = await Promise.all(
    exporters.map(async (exporter): Promise<ExportResult> => {
      try {
        return await exporter.append(record);
      } catch (e) {
        return {
          ok: false,
          error: new ExportError(exporter.name, record.decision_id, "THREW", errorMessage(e), { cause: e }),
        };
      }
    })
  );

  const delivered: string[] = [];
  const failures: ExportError[] = [];
  settled.forEach((r, i) => {
    const exporter = exporters[i];
    if (!exporter) return;
    if (r.ok) delivered.push(exporter.name);
    else failures.push(r.error);
  });

  return { delivered, failures };
}
