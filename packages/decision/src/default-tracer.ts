// packages/decision/src/default-tracer.ts
import { EmissionContractViolation } from "./errors.js";
import type { DecisionTracer } from "./recorder.js";

// Set once at process start, read-only afterwards.
let defaultTracer: DecisionTracer | null = null;

export function setDefaultTracer(tracer: DecisionTracer): void {
  if (defaultTracer !== null && defaultTracer !== tracer) {
    throw new EmissionContractViolation(
      "DEFAULT_TRACER_ALREADY_SET",
      "The default decision tracer is already set; pass a tracer explicitly instead of replacing it."
    );
  }
  defaultTracer = tracer;
}

export function getDefaultTracer(): DecisionTracer {
  if (defaultTracer === null) {
    throw new EmissionContractViolation(
      "NO_DEFAULT_TRACER",
      "Default decision tracer is not set. Call setDefaultTracer(tracer) before traced decisions."
    );
  }
  return defaultTracer;
}

export function hasDefaultTracer(): boolean {
  return defaultTracer !== null;
}

/**
 * Ends the default tracer's lifecycle. The owner still closes the tracer itself.
 */
export function clearDefaultTracer(): void {
  defaultTracer = null;
}
