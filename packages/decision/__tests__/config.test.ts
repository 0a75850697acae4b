import { describe, it, expect } from "vitest";
import { loadTraceConfig } from "../src/config.js";
import { FileJsonlExporter } from "../src/file-exporter.js";
import { InMemoryDecisionExporter } from "../src/in-memory-exporter.js";
import { createTracerFromConfig } from "../src/setup.js";
import { agent, policyPayload, steppingClock } from "./_helpers/fixtures.js";

describe("config: environment", () => {
  it("falls back to defaults", () => {
    expect(loadTraceConfig({})).toEqual({
      tenant_id: "default",
      environment: "local",
      log_level: "info",
      lineage_scope: "run-local",
      fsync: true,
    });
  });

  it("reads every variable", () => {
    const cfg = loadTraceConfig({
      DECISION_TRACE_TENANT_ID: "acme",
      DECISION_TRACE_ENVIRONMENT: "staging",
      DECISION_TRACE_LOG_LEVEL: "debug",
      DECISION_TRACE_LINEAGE_SCOPE: "global",
      DECISION_TRACE_FSYNC: "0",
    });

    expect(cfg).toEqual({
      tenant_id: "acme",
      environment: "staging",
      log_level: "debug",
      lineage_scope: "global",
      fsync: false,
    });
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it("rejects an unknown lineage scope", () => {
    expect(() => loadTraceConfig({ DECISION_TRACE_LINEAGE_SCOPE: "galaxy" })).toThrow(
      /Invalid decision trace configuration: DECISION_TRACE_LINEAGE_SCOPE/
    );
  });

  it("rejects a non-boolean fsync flag", () => {
    expect(() => loadTraceConfig({ DECISION_TRACE_FSYNC: "sometimes" })).toThrow(/expected true\/false/);
  });
});

describe("config: configured tracer", () => {
  it("applies tenant, environment and log level", async () => {
    const memory = new InMemoryDecisionExporter();
    const config = loadTraceConfig({
      DECISION_TRACE_TENANT_ID: "acme",
      DECISION_TRACE_ENVIRONMENT: "staging",
      DECISION_TRACE_LOG_LEVEL: "silent",
    });
    const tracer = createTracerFromConfig({ exporters: [memory], now: steppingClock() }, config);

    await tracer.decision({ decision_type: "PLAN_EVALUATED_POLICY", actor: agent }, (rec) => rec.action(policyPayload));

    expect(tracer.logger.level).toBe("silent");
    expect(memory.getRecords()[0]).toMatchObject({ tenant_id: "acme", environment: "staging" });
  });

  it("builds a JSONL sink from a path", () => {
    const tracer = createTracerFromConfig(
      { jsonl_path: "out/trace.jsonl" },
      loadTraceConfig({ DECISION_TRACE_LOG_LEVEL: "silent", DECISION_TRACE_FSYNC: "false" })
    );

    expect(tracer.exporterNames).toEqual(["jsonl:trace.jsonl"]);
    const [sink] = tracer.exporters;
    expect(sink).toBeInstanceOf(FileJsonlExporter);
    expect(sink instanceof FileJsonlExporter && sink.fsync).toBe(false);
  });

  it("syncs JSONL lines by default", () => {
    const tracer = createTracerFromConfig(
      { jsonl_path: "out/trace.jsonl" },
      loadTraceConfig({ DECISION_TRACE_LOG_LEVEL: "silent" })
    );

    const [sink] = tracer.exporters;
    expect(sink instanceof FileJsonlExporter && sink.fsync).toBe(true);
  });
});
