// packages/decision/src/errors.ts

export type EmissionViolationCode =
  | "NO_EXPORTERS"
  | "NO_ACTION_PAYLOAD"
  | "DUPLICATE_ACTION_PAYLOAD"
  | "INVALID_ACTION_PAYLOAD"
  | "ACTION_AFTER_FINALIZE"
  | "DUPLICATE_DECISION_ID"
  | "INVALID_DECISION"
  | "NO_DEFAULT_TRACER"
  | "DEFAULT_TRACER_ALREADY_SET";

/**
 * A recorder scope was used against its contract (zero or several action payloads,
 * a reused decision_id, ...). Always raised to the immediate caller.
 */
export class EmissionContractViolation extends Error {
  constructor(
    public readonly code: EmissionViolationCode,
    message: string,
    public readonly decision_id: string | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EmissionContractViolation";
  }
}

export type ExportErrorCode = "APPEND_FAILED" | "DUPLICATE" | "CLOSED" | "THREW";

/**
 * One exporter failed to durably append one record.
 */
export class ExportError extends Error {
  constructor(
    public readonly exporter: string,
    public readonly decision_id: string,
    public readonly code: ExportErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ExportError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
