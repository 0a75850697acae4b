// packages/decision/__tests__/_helpers/fixtures.ts
import { ExportError } from "../../src/errors.js";
import type { DecisionExporter, ExportResult } from "../../src/exporter.js";
import { InMemoryDecisionExporter } from "../../src/in-memory-exporter.js";
import { silentLogger } from "../../src/logger.js";
import { createDecisionTracer, type DecisionTracer } from "../../src/recorder.js";
import type { DecisionRecord } from "../../src/record.js";

export const agent = { id: "policy-guard", name: "PolicyGuardAgent", type: "agent" };

/** Clock that advances one second per call, starting at 2026-01-19T00:00:00Z. */
export function steppingClock(startMs = Date.parse("2026-01-19T00:00:00.000Z")): () => Date {
  let t = startMs;
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

export function memoryTracer(extra: DecisionExporter[] = []): {
  tracer: DecisionTracer;
  memory: InMemoryDecisionExporter;
} {
  const memory = new InMemoryDecisionExporter();
  const tracer = createDecisionTracer({
    exporters: [memory, ...extra],
    tenant_id: "tenant-test",
    environment: "test",
    logger: silentLogger(),
    now: steppingClock(),
  });
  return { tracer, memory };
}

/** Exporter that always reports a failed append. */
export class FailingExporter implements DecisionExporter {
  attempts = 0;

  constructor(readonly name = "failing") {}

  async append(record: DecisionRecord): Promise<ExportResult> {
    this.attempts++;
    return {
      ok: false,
      error: new ExportError(this.name, record.decision_id, "APPEND_FAILED", "disk full"),
    };
  }

  async flush(): Promise<void> {}
  async close(): Promise<void> {}
}

/** Exporter whose append() throws instead of returning a result. */
export class ThrowingExporter implements DecisionExporter {
  constructor(readonly name = "throwing") {}

  async append(_record: DecisionRecord): Promise<ExportResult> {
    throw new Error("socket closed");
  }

  async flush(): Promise<void> {}
  async close(): Promise<void> {}
}

export const policyPayload = {
  context: { plan_id: "plan-savings-01", constraints_ref: "constraints.yaml#v3" },
  logic: {
    reason_codes: [
      { code: "GROCERY_MINIMUM_MET", status: "PASS", explain: "Groceries stay above the 400 floor." },
    ],
  },
  outcome: { policy_status: "ACCEPT" },
  confidence: 0.9,
};
