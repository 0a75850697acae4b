import { describe, it, expect } from "vitest";
import { ExportError } from "../src/errors.js";
import { dispatchToExporters } from "../src/exporter.js";
import { InMemoryDecisionExporter } from "../src/in-memory-exporter.js";
import { agent, FailingExporter, memoryTracer, policyPayload, ThrowingExporter } from "./_helpers/fixtures.js";

describe("exporters: independent delivery", () => {
  it("reports one ExportError for the failing exporter and confirms delivery to the other", async () => {
    const failing = new FailingExporter("archive");
    const { tracer, memory } = memoryTracer([failing]);

    const { value, emission } = await tracer.decision(
      { decision_type: "PLAN_EVALUATED_RISK", actor: agent, decision_id: "dec-risk-1" },
      async (rec) => {
        rec.action(policyPayload);
        return 42;
      }
    );

    expect(value).toBe(42);
    expect(emission.status).toBe("emitted");
    expect(emission.delivered).toEqual(["memory"]);
    expect(emission.failures).toHaveLength(1);
    expect(emission.failures[0]).toBeInstanceOf(ExportError);
    expect(emission.failures[0]).toMatchObject({ exporter: "archive", decision_id: "dec-risk-1", code: "APPEND_FAILED" });
    expect(emission.fully_traced).toBe(false);

    expect(memory.getRecords().map((r) => r.decision_id)).toEqual(["dec-risk-1"]);
    expect(failing.attempts).toBe(1);
  });

  it("turns a throwing exporter into an ExportError", async () => {
    const memory = new InMemoryDecisionExporter();
    const { tracer } = memoryTracer();
    const rec = tracer.open({ decision_type: "PLAN_PROPOSED", actor: agent });
    rec.action(policyPayload);
    const report = await rec.finalize();
    if (report.status !== "emitted") throw new Error("expected an emitted record");

    const result = await dispatchToExporters(report.record, [new ThrowingExporter("bus"), memory]);

    expect(result.delivered).toEqual(["memory"]);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.code).toBe("THREW");
    expect(result.failures[0]?.message).toBe("socket closed");
    expect(memory.getRecords()).toHaveLength(1);
  });

  it("a closed exporter reports CLOSED instead of dropping the record", async () => {
    const memory = new InMemoryDecisionExporter();
    await memory.close();
    const { tracer } = memoryTracer();
    const rec = tracer.open({ decision_type: "PLAN_PROPOSED", actor: agent });
    rec.action(policyPayload);
    const report = await rec.finalize();
    if (report.status !== "emitted") throw new Error("expected an emitted record");

    const result = await memory.append(report.record);

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("CLOSED");
  });
});
