export type { Actor, ActionPayload, ActionPayloadInput, DecisionRecord, ReasonCode, RecordField } from "./record.js";
export {
  ActorSchema,
  ReasonCodeSchema,
  ActionPayloadSchema,
  DecisionRecordSchema,
  ConfidenceSchema,
  TimestampSchema,
  RECORD_FIELDS,
  REQUIRED_RECORD_FIELDS,
  buildDecisionRecord,
  freezeRecord,
  isIsoTimestampWithZone,
} from "./record.js";

export { canonicalJson, sha256Hex, computeRecordHash, recordsEqual } from "./hash.js";
export type { DecodeRecordResult } from "./codec.js";
export { encodeRecordLine, decodeRecordLine } from "./codec.js";

export type { EmissionViolationCode, ExportErrorCode } from "./errors.js";
export { EmissionContractViolation, ExportError, errorMessage } from "./errors.js";

export type { DecisionExporter, ExportResult, DispatchResult } from "./exporter.js";
export { SerialQueue, dispatchToExporters } from "./exporter.js";
export * from "./file-exporter.js";
export * from "./sqlite-exporter.js";
export * from "./in-memory-exporter.js";

export type { StreamClock } from "./ids.js";
export { newDecisionId, createStreamClock, RunLedger } from "./ids.js";

export type {
  RecorderState,
  ScopeExit,
  EmissionStatus,
  EmissionReport,
  OpenDecisionOptions,
  DecisionTracerOptions,
  DecisionScopeOptions,
  DecisionScopeResult,
} from "./recorder.js";
export { DecisionRecorder, DecisionTracer, createDecisionTracer, withDecision } from "./recorder.js";

export type { TraceDecisionOptions, TracedDecision } from "./instrument.js";
export { traceDecision, TracedDecisionSchema } from "./instrument.js";

export { setDefaultTracer, getDefaultTracer, hasDefaultTracer, clearDefaultTracer } from "./default-tracer.js";

export type { TraceConfig, LineageScope, LogLevel } from "./config.js";
export { loadTraceConfig, LineageScopeSchema, LogLevelSchema } from "./config.js";

export type { Logger } from "./logger.js";
export { createLogger, silentLogger } from "./logger.js";

export type { ConfiguredTracerOptions } from "./setup.js";
export { createTracerFromConfig } from "./setup.js";
