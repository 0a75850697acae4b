// packages/decision/src/config.ts
import { z } from "zod";

export const LineageScopeSchema = z.enum(["run-local", "global"]);
export type LineageScope = z.infer<typeof LineageScopeSchema>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const BooleanFlagSchema = z
  .string()
  .optional()
  .transform((v, ctx) => {
    if (v === undefined || v === "") return true;
    const normalized = v.trim().toLowerCase();
    if (normalized === "true" || normalized === "1") return true;
    if (normalized === "false" || normalized === "0") return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true/false, got "${v}"` });
    return z.NEVER;
  });

const EnvSchema = z.object({
  DECISION_TRACE_TENANT_ID: z.string().trim().min(1).default("default"),
  DECISION_TRACE_ENVIRONMENT: z.string().trim().min(1).default("local"),
  DECISION_TRACE_LOG_LEVEL: LogLevelSchema.default("info"),
  DECISION_TRACE_LINEAGE_SCOPE: LineageScopeSchema.default("run-local"),
  DECISION_TRACE_FSYNC: BooleanFlagSchema,
});

export type TraceConfig = Readonly<{
  tenant_id: string;
  environment: string;
  log_level: LogLevel;
  lineage_scope: LineageScope;
  fsync: boolean;
}>;

/**
 * Reads tracing configuration from the environment. Call once at process start;
 * the result is frozen.
 */
export function loadTraceConfig(env: Record<string, string | undefined> = process.env): TraceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid decision trace configuration: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  return Object.freeze({
    tenant_id: e.DECISION_TRACE_TENANT_ID,
    environment: e.DECISION_TRACE_ENVIRONMENT,
    log_level: e.DECISION_TRACE_LOG_LEVEL,
    lineage_scope: e.DECISION_TRACE_LINEAGE_SCOPE,
    fsync: e.DECISION_TRACE_FSYNC,
  });
}
