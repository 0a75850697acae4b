// packages/decision/src/setup.ts
import { loadTraceConfig, type TraceConfig } from "./config.js";
import type { DecisionExporter } from "./exporter.js";
import { FileJsonlExporter } from "./file-exporter.js";
import { createLogger } from "./logger.js";
import { createDecisionTracer, type DecisionTracer } from "./recorder.js";

export type ConfiguredTracerOptions =
  | { exporters: readonly DecisionExporter[]; now?: () => Date }
  | { jsonl_path: string; now?: () => Date };

/**
 * Tracer wired from environment configuration: tenant/environment defaults,
 * log level, and the fsync policy of a JSONL sink.
 */
export function createTracerFromConfig(
  opts: ConfiguredTracerOptions,
  config: TraceConfig = loadTraceConfig()
): DecisionTracer {
  const exporters =
    "jsonl_path" in opts ? [new FileJsonlExporter(opts.jsonl_path, { fsync: config.fsync })] : opts.exporters;

  return createDecisionTracer({
    exporters,
    tenant_id: config.tenant_id,
    environment: config.environment,
    logger: createLogger({ level: config.log_level, component: "decision-trace.recorder" }),
    ...(opts.now !== undefined && { now: opts.now }),
  });
}
