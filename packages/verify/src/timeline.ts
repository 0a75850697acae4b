// packages/verify/src/timeline.ts
import type { LineageGraph } from "./lineage-graph.js";

export type TimelineEntry = {
  position: number;
  decision_id: string;
  decision_type: string | null;
  timestamp: string | null;
  actor_name: string | null;

  // longest parent path back to a root
  depth: number;
  parents: string[];
};

export type DecisionTimeline = { ok: true; entries: TimelineEntry[] } | { ok: false; cyclic_ids: string[] };

function stringField(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

export function buildDecisionTimeline(graph: LineageGraph): DecisionTimeline {
  const order = graph.topologicalOrder();
  if (!order.ok) return { ok: false, cyclic_ids: order.cyclic_ids };

  const depth = new Map<string, number>();
  const entries: TimelineEntry[] = [];

  for (const id of order.order) {
    const parents = graph.parentsOf(id);
    const d = parents.length === 0 ? 0 : 1 + Math.max(...parents.map((p) => depth.get(p) ?? 0));
    depth.set(id, d);

    const record = graph.get(id)?.record;
    const actor = record?.actor;
    entries.push({
      position: entries.length + 1,
      decision_id: id,
      decision_type: stringField(record?.decision_type),
      timestamp: stringField(record?.timestamp),
      actor_name: typeof actor === "object" && actor !== null && "name" in actor ? stringField(actor.name) : null,
      depth: d,
      parents,
    });
  }

  return { ok: true, entries };
}
