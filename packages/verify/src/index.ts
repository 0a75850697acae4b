export type { TraceRecord, LoadedRecord, GraphLoadError, ReadResult } from "./reader.js";
export { loadRecordValue, loadRecords, parseRecordLines, readRecordsFile, readRecordsFromSqlite } from "./reader.js";

export type {
  RecordLocation,
  StructuralConflict,
  DuplicateEmission,
  LineageReference,
  TopologicalResult,
  LineageGraphOptions,
} from "./lineage-graph.js";
export { LineageGraph, buildLineageGraph, timestampMs } from "./lineage-graph.js";
export { StructuralConflictError } from "./errors.js";

export type { Violation, RuleContext, VerificationRule } from "./rules.js";
export {
  CANONICAL_RULES,
  schemaCompleteness,
  actorExplicitness,
  nonTrivialLogic,
  outcomeClarity,
  lineageIntegrity,
  acyclicity,
  duplicateIdentifiers,
  duplicateEmission,
  timestampMonotonicity,
  reasonArtifacts,
  isStatusField,
} from "./rules.js";
export { DEFAULT_PLACEHOLDER_TOKENS, expectDecisionTypeCounts, forbidPlaceholderTokens, requireLogicFields } from "./factories.js";

export type { VerificationOptions, RuleResult, VerificationReport } from "./engine.js";
export { VerificationEngine, verifyRecords, verifyFile, verificationOptionsFromConfig, compareViolations } from "./engine.js";

export type { ReportMapping } from "./report.js";
export { toReportMapping, failedRules } from "./report.js";

export type { TimelineEntry, DecisionTimeline } from "./timeline.js";
export { buildDecisionTimeline } from "./timeline.js";
