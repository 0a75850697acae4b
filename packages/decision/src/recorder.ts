// packages/decision/src/recorder.ts
import { ZodError } from "zod";
import { EmissionContractViolation, errorMessage, type ExportError } from "./errors.js";
import { dispatchToExporters, type DecisionExporter } from "./exporter.js";
import { createStreamClock, newDecisionId, RunLedger, type StreamClock } from "./ids.js";
import { createLogger, type Logger } from "./logger.js";
import {
  ActionPayloadSchema,
  ActorSchema,
  buildDecisionRecord,
  type ActionPayload,
  type ActionPayloadInput,
  type Actor,
  type DecisionRecord,
} from "./record.js";

// -------------------------
// State machine
// -------------------------
export type RecorderState = "OPEN" | "FINALIZED";

export type ScopeExit = "completed" | "failed" | "cancelled";

export type EmissionStatus =
  | "emitted" // payload supplied, record dispatched
  | "aborted" // task failed before an action was supplied
  | "cancelled" // scope cancelled before an action was supplied
  | "violated"; // contract violation inside the scope; nothing emitted

export type EmissionReport =
  | {
      status: "emitted";
      decision_id: string;
      exit: ScopeExit;
      record: DecisionRecord;
      delivered: string[];
      failures: ExportError[];
      fully_traced: boolean;
    }
  | {
      status: "aborted" | "cancelled" | "violated";
      decision_id: string;
      exit: ScopeExit;
      record: null;
      delivered: string[];
      failures: ExportError[];
      fully_traced: false;
      violation?: EmissionContractViolation;
    };

export type OpenDecisionOptions = {
  decision_type: string;
  actor: Actor;
  decision_id?: string;
  tenant_id?: string;
  environment?: string;
  signal?: AbortSignal;
};

export type DecisionTracerOptions = {
  exporters: readonly DecisionExporter[];
  tenant_id?: string;
  environment?: string;
  logger?: Logger;
  now?: () => Date;
  ledger?: RunLedger;
};

function describeZod(e: ZodError): string {
  return e.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

/**
 * Builds one decision record and emits it at most once.
 *
 *   OPEN --action()--> OPEN(payload) --finalize()--> FINALIZED
 *
 * Nothing is emitted unless exactly one action payload was supplied.
 */
export class DecisionRecorder {
  private state: RecorderState = "OPEN";
  private payload: ActionPayload | null = null;
  private violation: EmissionContractViolation | null = null;
  private report: EmissionReport | null = null;
  private finalizing: Promise<EmissionReport> | null = null;

  constructor(
    readonly decision_id: string,
    private readonly opts: {
      decision_type: string;
      actor: Actor;
      tenant_id: string;
      environment: string;
      exporters: readonly DecisionExporter[];
      clock: StreamClock;
      logger: Logger;
      signal?: AbortSignal;
    }
  ) {}

  get status(): RecorderState {
    return this.state;
  }

  get emission(): EmissionReport | null {
    return this.report;
  }

  get hasAction(): boolean {
    return this.payload !== null;
  }

  /**
   * Supplies the single action payload. A second call (or a call after finalize)
   * throws and poisons the scope so nothing is emitted for it.
   */
  action(input: ActionPayloadInput): void {
    if (this.state === "FINALIZED") {
      throw new EmissionContractViolation(
        "ACTION_AFTER_FINALIZE",
        `Recorder ${this.decision_id} is already finalized.`,
        this.decision_id
      );
    }

    if (this.payload !== null || this.violation !== null) {
      const v = new EmissionContractViolation(
        "DUPLICATE_ACTION_PAYLOAD",
        `Recorder ${this.decision_id} already has an action payload; a retry must open a new decision.`,
        this.decision_id
      );
      this.violation = this.violation ?? v;
      throw v;
    }

    const parsed = ActionPayloadSchema.safeParse(input);
    if (!parsed.success) {
      const v = new EmissionContractViolation(
        "INVALID_ACTION_PAYLOAD",
        `Invalid action payload for ${this.decision_id}: ${describeZod(parsed.error)}`,
        this.decision_id,
        { cause: parsed.error }
      );
      this.violation = v;
      throw v;
    }

    this.payload = parsed.data;
  }

  /**
   * Ends the scope. Idempotent: the first call decides the outcome,
   * later calls return the same report.
   */
  finalize(exit: ScopeExit = "completed"): Promise<EmissionReport> {
    if (!this.finalizing) this.finalizing = this.doFinalize(exit);
    return this.finalizing;
  }

  private async doFinalize(requested: ScopeExit): Promise<EmissionReport> {
    this.state = "FINALIZED";
    const log = this.opts.logger.child({ decision_id: this.decision_id, decision_type: this.opts.decision_type });

    const exit: ScopeExit =
      requested === "completed" && this.opts.signal?.aborted === true && this.payload === null
        ? "cancelled"
        : requested;

    if (this.violation) {
      const report = this.noRecord("violated", exit, this.violation);
      log.error({ code: this.violation.code, exit }, "decision scope violated its emission contract");
      if (exit === "completed") throw this.violation;
      return report;
    }

    if (this.payload === null) {
      if (exit === "completed") {
        const v = new EmissionContractViolation(
          "NO_ACTION_PAYLOAD",
          `Recorder ${this.decision_id} completed without an action payload.`,
          this.decision_id
        );
        this.noRecord("violated", exit, v);
        log.error({ code: v.code }, "decision scope completed without an action");
        throw v;
      }

      const status = exit === "cancelled" ? "cancelled" : "aborted";
      log.warn({ exit }, status === "cancelled" ? "decision cancelled before action; no record" : "decision aborted before action; no record");
      return this.noRecord(status, exit);
    }

    let record: DecisionRecord;
    try {
      record = buildDecisionRecord({
        decision_id: this.decision_id,
        decision_type: this.opts.decision_type,
        timestamp: this.opts.clock(),
        tenant_id: this.opts.tenant_id,
        environment: this.opts.environment,
        actor: this.opts.actor,
        payload: this.payload,
      });
    } catch (e) {
      // e.g. a context value that cannot be cloned
      const v = new EmissionContractViolation(
        "INVALID_ACTION_PAYLOAD",
        `Action payload for ${this.decision_id} cannot be recorded: ${e instanceof ZodError ? describeZod(e) : errorMessage(e)}`,
        this.decision_id,
        { cause: e }
      );
      const report = this.noRecord("violated", exit, v);
      log.error({ code: v.code, exit }, "decision record could not be built");
      if (exit === "completed") throw v;
      return report;
    }

    const { delivered, failures } = await dispatchToExporters(record, this.opts.exporters);

    for (const f of failures) {
      log.warn({ exporter: f.exporter, code: f.code, err: f }, "decision export failed");
    }
    log.debug({ exit, delivered, failed: failures.length }, "decision emitted");

    const report: EmissionReport = {
      status: "emitted",
      decision_id: this.decision_id,
      exit,
      record,
      delivered,
      failures,
      fully_traced: failures.length === 0,
    };
    this.report = report;
    return report;
  }

  private noRecord(
    status: "aborted" | "cancelled" | "violated",
    exit: ScopeExit,
    violation?: EmissionContractViolation
  ): EmissionReport {
    const report: EmissionReport = {
      status,
      decision_id: this.decision_id,
      exit,
      record: null,
      delivered: [],
      failures: [],
      fully_traced: false,
      ...(violation !== undefined && { violation }),
    };
    this.report = report;
    return report;
  }
}

export type DecisionScopeResult<T> = {
  value: T;
  emission: EmissionReport;
};

export type DecisionScopeOptions = OpenDecisionOptions & {
  onFinalized?: (report: EmissionReport) => void;
};

/**
 * One recorder stream: shared defaults, exporters, run ledger and clock.
 * The exporter set is fixed at construction.
 */
export class DecisionTracer {
  readonly tenant_id: string;
  readonly environment: string;
  readonly logger: Logger;
  readonly ledger: RunLedger;
  private readonly sinks: readonly DecisionExporter[];
  private readonly clock: StreamClock;

  constructor(opts: DecisionTracerOptions) {
    if (opts.exporters.length === 0) {
      throw new EmissionContractViolation("NO_EXPORTERS", "A decision tracer needs at least one exporter.");
    }
    this.sinks = Object.freeze([...opts.exporters]);
    this.tenant_id = opts.tenant_id ?? "default";
    this.environment = opts.environment ?? "local";
    this.logger = opts.logger ?? createLogger();
    this.ledger = opts.ledger ?? new RunLedger();
    this.clock = createStreamClock(opts.now);
  }

  get exporters(): readonly DecisionExporter[] {
    return this.sinks;
  }

  get exporterNames(): string[] {
    return this.sinks.map((e) => e.name);
  }

  open(options: OpenDecisionOptions): DecisionRecorder {
    const actor = ActorSchema.safeParse(options.actor);
    if (!actor.success) {
      throw new EmissionContractViolation(
        "INVALID_DECISION",
        `Invalid actor for ${options.decision_type}: ${describeZod(actor.error)}`,
        options.decision_id ?? null,
        { cause: actor.error }
      );
    }
    if (options.decision_type.trim().length === 0) {
      throw new EmissionContractViolation("INVALID_DECISION", "decision_type is required.", options.decision_id ?? null);
    }

    const decision_id = options.decision_id ?? newDecisionId();
    if (decision_id.length === 0) {
      throw new EmissionContractViolation("INVALID_DECISION", "decision_id must not be empty.");
    }
    if (!this.ledger.claim(decision_id)) {
      throw new EmissionContractViolation(
        "DUPLICATE_DECISION_ID",
        `decision_id ${decision_id} was already used in this run; a retry must mint a new id.`,
        decision_id
      );
    }

    return new DecisionRecorder(decision_id, {
      decision_type: options.decision_type,
      actor: actor.data,
      tenant_id: options.tenant_id ?? this.tenant_id,
      environment: options.environment ?? this.environment,
      exporters: this.sinks,
      clock: this.clock,
      logger: this.logger,
      ...(options.signal !== undefined && { signal: options.signal }),
    });
  }

  /**
   * Scoped form: opens a recorder, runs fn, and finalizes on every exit path.
   * The task's own error is rethrown unchanged.
   */
  decision<T>(options: DecisionScopeOptions, fn: (recorder: DecisionRecorder) => Promise<T> | T): Promise<DecisionScopeResult<T>> {
    return withDecision(this, options, fn);
  }

  async flush(): Promise<void> {
    await Promise.all(this.sinks.map((e) => e.flush()));
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map((e) => e.close()));
  }
}

export function createDecisionTracer(opts: DecisionTracerOptions): DecisionTracer {
  return new DecisionTracer(opts);
}

function isAbort(e: unknown, signal: AbortSignal | undefined): boolean {
  if (signal?.aborted) return true;
  return e instanceof Error && e.name === "AbortError";
}

export async function withDecision<T>(
  tracer: DecisionTracer,
  options: DecisionScopeOptions,
  fn: (recorder: DecisionRecorder) => Promise<T> | T
): Promise<DecisionScopeResult<T>> {
  const recorder = tracer.open(options);

  let value: T;
  try {
    value = await fn(recorder);
  } catch (e) {
    try {
      const report = await recorder.finalize(isAbort(e, options.signal) ? "cancelled" : "failed");
      options.onFinalized?.(report);
    } catch (finalizeError) {
      // the task's own failure wins
      tracer.logger.error({ err: finalizeError, decision_id: recorder.decision_id }, "decision finalize failed after task error");
    }
    throw e;
  }

  let emission: EmissionReport;
  try {
    emission = await recorder.finalize("completed");
  } catch (e) {
    if (recorder.emission) options.onFinalized?.(recorder.emission);
    throw e;
  }
  options.onFinalized?.(emission);
  return { value, emission };
}
