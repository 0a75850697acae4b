// packages/decision/src/instrument.ts
import { z } from "zod";
import { getDefaultTracer } from "./default-tracer.js";
import { EmissionContractViolation, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { ActorSchema, ConfidenceSchema } from "./record.js";
import type { DecisionTracer, EmissionReport } from "./recorder.js";

const JsonObjectSchema = z.record(z.string(), z.unknown());

// A bare actor name is an agent.
const TracedActorSchema = z.union([
  z
    .string()
    .trim()
    .min(1)
    .transform((name) => ({ id: name, name, type: "agent" })),
  ActorSchema,
]);

/**
 * Shape a traced task must return. `evidence` is accepted in place of `logic`.
 */
export const TracedDecisionSchema = z
  .object({
    decision_id: z.string().min(1).optional(),
    decision_type: z.string().min(1),
    actor: TracedActorSchema,
    context: JsonObjectSchema,
    logic: JsonObjectSchema.optional(),
    evidence: JsonObjectSchema.optional(),
    outcome: JsonObjectSchema,
    confidence: ConfidenceSchema.optional(),
    lineage: z.array(z.string().min(1)).default([]),
    tenant_id: z.string().min(1).optional(),
    environment: z.string().min(1).optional(),
  })
  .superRefine((v, ctx) => {
    if (v.logic === undefined && v.evidence === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["logic"], message: "logic (or evidence) is required" });
    }
  });
export type TracedDecision = z.input<typeof TracedDecisionSchema>;

/**
 * Tracing an already traced function adds no second emission: the inner wrapper's
 * options apply, and any `policy_id`, `tracer`, `onEmitted` or `onEmissionError`
 * given to the outer call are ignored with a warning.
 */
export type TraceDecisionOptions = {
  /** Added to the emitted record's context when the task did not set one. */
  policy_id?: string;
  /** Defaults to the process-wide default tracer. */
  tracer?: DecisionTracer;
  logger?: Logger;
  onEmitted?: (report: EmissionReport) => void;
  /** Emission problems never reach the task's caller; they land here (and in the log). */
  onEmissionError?: (error: Error, result: unknown) => void;
};

const traced = new WeakSet<object>();

let fallbackLogger: Logger | null = null;
function defaultLogger(): Logger {
  fallbackLogger = fallbackLogger ?? createLogger({ component: "decision-trace.instrument" });
  return fallbackLogger;
}

async function emitTraced(result: unknown, opts: TraceDecisionOptions): Promise<EmissionReport> {
  const tracer = opts.tracer ?? getDefaultTracer();

  const parsed = TracedDecisionSchema.safeParse(result);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new EmissionContractViolation(
      "INVALID_DECISION",
      `Traced task returned an invalid decision: ${issues.join("; ")}`,
      null,
      { cause: parsed.error }
    );
  }

  const d = parsed.data;
  const logic = d.logic ?? d.evidence ?? {};
  const context =
    opts.policy_id !== undefined && !("policy_id" in d.context)
      ? { ...d.context, policy_id: opts.policy_id }
      : d.context;

  // claims the id in the run ledger: a re-emitted id throws here
  const recorder = tracer.open({
    decision_type: d.decision_type,
    actor: d.actor,
    ...(d.decision_id !== undefined && { decision_id: d.decision_id }),
    ...(d.tenant_id !== undefined && { tenant_id: d.tenant_id }),
    ...(d.environment !== undefined && { environment: d.environment }),
  });

  recorder.action({
    context,
    logic,
    outcome: d.outcome,
    lineage: d.lineage,
    ...(d.confidence !== undefined && { confidence: d.confidence }),
  });

  return recorder.finalize("completed");
}

function report(opts: TraceDecisionOptions, log: Logger, error: Error, result: unknown): void {
  try {
    opts.onEmissionError?.(error, result);
  } catch (hookError) {
    log.error({ err: hookError }, "onEmissionError hook threw");
  }
}

/**
 * Wraps a task that returns a record-shaped mapping so each call emits exactly one
 * decision record. The task's value and errors pass through unchanged.
 */
export function traceDecision<A extends unknown[], R>(
  fn: (...args: A) => R | Promise<R>,
  opts: TraceDecisionOptions = {}
): (...args: A) => Promise<R> {
  if (traced.has(fn)) {
    const ignored = (["policy_id", "tracer", "onEmitted", "onEmissionError"] as const).filter(
      (k) => opts[k] !== undefined
    );
    if (ignored.length > 0) {
      const log = opts.logger ?? opts.tracer?.logger ?? defaultLogger();
      log.warn({ ignored }, "function is already traced; outer traceDecision options are ignored");
    }
    const passthrough = async (...args: A): Promise<R> => await fn(...args);
    traced.add(passthrough);
    return passthrough;
  }

  const wrapped = async (...args: A): Promise<R> => {
    const result = await fn(...args);
    const log = opts.logger ?? opts.tracer?.logger ?? defaultLogger();

    try {
      const emission = await emitTraced(result, opts);
      for (const failure of emission.failures) report(opts, log, failure, result);
      opts.onEmitted?.(emission);
    } catch (e) {
      const error = e instanceof Error ? e : new Error(errorMessage(e));
      const code = e instanceof EmissionContractViolation ? e.code : "EMIT_FAILED";
      log.error({ err: error, code }, "traced decision was not emitted");
      report(opts, log, error, result);
    }

    return result;
  };

  traced.add(wrapped);
  return wrapped;
}
