// packages/verify/src/errors.ts
import type { StructuralConflict } from "./lineage-graph.js";

/**
 * Raised by graph construction under `on_conflict: "throw"` when one decision_id
 * carries structurally different records.
 */
export class StructuralConflictError extends Error {
  constructor(readonly conflicts: readonly StructuralConflict[]) {
    super(
      `decision_id reused with different content: ${conflicts.map((c) => c.decision_id).join(", ")}`
    );
    this.name = "StructuralConflictError";
  }
}
