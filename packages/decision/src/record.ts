// packages/decision/src/record.ts
import { z } from "zod";

// -------------------------
// Parts
// -------------------------
export const ActorSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  // open set: "agent" | "system" | "human" | ...
  type: z.string().trim().min(1),
});
export type Actor = z.infer<typeof ActorSchema>;

export const ReasonCodeSchema = z.object({
  code: z.string().min(1),
  status: z.string().min(1),
  explain: z.string(),
});
export type ReasonCode = z.infer<typeof ReasonCodeSchema>;

const JsonObjectSchema = z.record(z.string(), z.unknown());

export const ConfidenceSchema = z.number().min(0).max(1);

/**
 * The single "action" a recorder accepts while open.
 */
export const ActionPayloadSchema = z.object({
  context: JsonObjectSchema,
  logic: JsonObjectSchema,
  outcome: JsonObjectSchema,
  confidence: ConfidenceSchema.optional(),
  lineage: z.array(z.string().min(1)).default([]),
});
export type ActionPayloadInput = z.input<typeof ActionPayloadSchema>;
export type ActionPayload = z.infer<typeof ActionPayloadSchema>;

// ISO-8601 with an explicit offset ("Z" or "+hh:mm"); fraction capped at Date.parse resolution
const ISO_WITH_ZONE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{1,3})?(Z|[+-]\d{2}:\d{2})$/;

export function isIsoTimestampWithZone(value: unknown): value is string {
  return typeof value === "string" && ISO_WITH_ZONE.test(value) && Number.isFinite(Date.parse(value));
}

export const TimestampSchema = z
  .string()
  .refine((v) => isIsoTimestampWithZone(v), { message: "timestamp must be ISO-8601 with timezone, at most millisecond precision" });

// -------------------------
// Record
// -------------------------
export const DecisionRecordSchema = z.object({
  decision_id: z.string().min(1),
  decision_type: z.string().min(1),
  timestamp: TimestampSchema,
  tenant_id: z.string(),
  environment: z.string(),
  context: JsonObjectSchema,
  actor: ActorSchema,
  logic: JsonObjectSchema,
  outcome: JsonObjectSchema,
  confidence: ConfidenceSchema.optional(),
  lineage: z.array(z.string().min(1)),
});

export type DecisionRecord = Readonly<z.infer<typeof DecisionRecordSchema>>;

/**
 * Sink field order. Encoders write fields in this order.
 */
export const RECORD_FIELDS = [
  "decision_id",
  "decision_type",
  "timestamp",
  "tenant_id",
  "environment",
  "context",
  "actor",
  "logic",
  "outcome",
  "confidence",
  "lineage",
] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

/**
 * Fields that must be present and non-empty on every record.
 */
export const REQUIRED_RECORD_FIELDS = [
  "decision_id",
  "decision_type",
  "timestamp",
  "context",
  "actor",
  "logic",
  "outcome",
] as const satisfies readonly RecordField[];

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * Deep-freezes a record. Finalized records are never mutated.
 */
export function freezeRecord(record: DecisionRecord): DecisionRecord {
  return deepFreeze(record);
}

export type BuildRecordInput = {
  decision_id: string;
  decision_type: string;
  timestamp: string;
  tenant_id: string;
  environment: string;
  actor: Actor;
  payload: ActionPayload;
};

export function buildDecisionRecord(input: BuildRecordInput): DecisionRecord {
  const { payload } = input;

  // structuredClone detaches the record from caller-owned objects before freezing
  const record: DecisionRecord = {
    decision_id: input.decision_id,
    decision_type: input.decision_type,
    timestamp: input.timestamp,
    tenant_id: input.tenant_id,
    environment: input.environment,
    context: structuredClone(payload.context),
    actor: { ...input.actor },
    logic: structuredClone(payload.logic),
    outcome: structuredClone(payload.outcome),
    ...(payload.confidence !== undefined && { confidence: payload.confidence }),
    lineage: [...payload.lineage],
  };

  return freezeRecord(DecisionRecordSchema.parse(record));
}
