// packages/verify/src/lineage-graph.ts
//
// Lineage graph over a closed set of decision records.
// Edges run child -> declared parent. Built once per analysis pass, never mutated.
import { computeRecordHash, isIsoTimestampWithZone, type LineageScope } from "@decision-trace/decision";
import { StructuralConflictError } from "./errors.js";
import type { LoadedRecord } from "./reader.js";

export type RecordLocation = { source: string; line: number };

export type StructuralConflict = {
  decision_id: string;
  // distinct content hashes, first-seen order
  hashes: string[];
  occurrences: RecordLocation[];
};

export type DuplicateEmission = {
  decision_id: string;
  count: number;
  occurrences: RecordLocation[];
};

export type LineageReference = {
  decision_id: string;
  parent: string;
};

export type TopologicalResult = { ok: true; order: string[] } | { ok: false; cyclic_ids: string[] };

export type LineageGraphOptions = {
  on_conflict?: "exclude" | "throw";
  lineage_scope?: LineageScope;
  // decision_ids from prior runs, resolved in global scope
  known_ids?: Iterable<string>;
};

/**
 * Milliseconds for a valid zoned ISO timestamp, null otherwise.
 */
export function timestampMs(value: unknown): number | null {
  return isIsoTimestampWithZone(value) ? Date.parse(value) : null;
}

function byReference(a: LineageReference, b: LineageReference): number {
  if (a.decision_id !== b.decision_id) return a.decision_id < b.decision_id ? -1 : 1;
  if (a.parent !== b.parent) return a.parent < b.parent ? -1 : 1;
  return 0;
}

// Tarjan, iterative so long chains do not exhaust the stack.
function stronglyConnected(ids: readonly string[], successors: (id: string) => readonly string[]): string[][] {
  let counter = 0;
  const index = new Map<string, number>();
  const low = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];

  const visit = (id: string, work: Array<{ id: string; next: number }>) => {
    index.set(id, counter);
    low.set(id, counter);
    counter++;
    stack.push(id);
    onStack.add(id);
    work.push({ id, next: 0 });
  };

  for (const start of ids) {
    if (index.has(start)) continue;
    const work: Array<{ id: string; next: number }> = [];
    visit(start, work);

    while (work.length > 0) {
      const frame = work.at(-1);
      if (frame === undefined) break;

      const edges = successors(frame.id);
      const w = edges[frame.next];
      if (w !== undefined) {
        frame.next++;
        if (!index.has(w)) {
          visit(w, work);
        } else if (onStack.has(w)) {
          low.set(frame.id, Math.min(low.get(frame.id) ?? 0, index.get(w) ?? 0));
        }
        continue;
      }

      work.pop();
      const caller = work.at(-1);
      if (caller !== undefined) {
        low.set(caller.id, Math.min(low.get(caller.id) ?? 0, low.get(frame.id) ?? 0));
      }

      if (low.get(frame.id) === index.get(frame.id)) {
        const component: string[] = [];
        for (;;) {
          const member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
          if (member === frame.id) break;
        }
        components.push(component);
      }
    }
  }

  return components;
}

export class LineageGraph {
  private readonly nodes: ReadonlyMap<string, LoadedRecord>;
  private readonly parents: ReadonlyMap<string, readonly string[]>;
  private readonly children: ReadonlyMap<string, readonly string[]>;
  private readonly dangling: readonly LineageReference[];
  private readonly external: readonly LineageReference[];
  private readonly conflictList: readonly StructuralConflict[];
  private readonly duplicateList: readonly DuplicateEmission[];
  private cycles: string[][] | null = null;

  constructor(parts: {
    nodes: Map<string, LoadedRecord>;
    parents: Map<string, string[]>;
    children: Map<string, string[]>;
    dangling: LineageReference[];
    external: LineageReference[];
    conflicts: StructuralConflict[];
    duplicates: DuplicateEmission[];
  }) {
    this.nodes = parts.nodes;
    this.parents = parts.parents;
    this.children = parts.children;
    this.dangling = parts.dangling;
    this.external = parts.external;
    this.conflictList = parts.conflicts;
    this.duplicateList = parts.duplicates;
  }

  get size(): number {
    return this.nodes.size;
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get(id: string): LoadedRecord | undefined {
    return this.nodes.get(id);
  }

  /** Node ids in first-seen order. */
  ids(): string[] {
    return [...this.nodes.keys()];
  }

  records(): LoadedRecord[] {
    return [...this.nodes.values()];
  }

  /** Resolved parents, in lineage order. */
  parentsOf(id: string): string[] {
    return [...(this.parents.get(id) ?? [])];
  }

  childrenOf(id: string): string[] {
    return [...(this.children.get(id) ?? [])];
  }

  /**
   * Every node reachable through parent edges, nearest first. The node itself is
   * excluded even when it sits on a cycle.
   */
  ancestorsOf(id: string): string[] {
    const seen = new Set<string>([id]);
    const out: string[] = [];
    const queue = [...(this.parents.get(id) ?? [])];

    for (let i = 0; i < queue.length; i++) {
      const cur = queue[i];
      if (cur === undefined || seen.has(cur)) continue;
      seen.add(cur);
      out.push(cur);
      for (const p of this.parents.get(cur) ?? []) if (!seen.has(p)) queue.push(p);
    }
    return out;
  }

  /**
   * Node sets that form a cycle (a self-reference is a cycle of one). Each set is
   * sorted; sets are ordered by their first id.
   */
  findCycles(): string[][] {
    if (this.cycles === null) {
      const successors = (id: string) => this.parents.get(id) ?? [];
      this.cycles = stronglyConnected(this.ids(), successors)
        .filter((c) => {
          const only = c[0];
          return c.length > 1 || (only !== undefined && successors(only).includes(only));
        })
        .map((c) => [...c].sort())
        .sort((a, b) => ((a[0] ?? "") < (b[0] ?? "") ? -1 : 1));
    }
    return this.cycles.map((c) => [...c]);
  }

  isAcyclic(): boolean {
    return this.findCycles().length === 0;
  }

  /**
   * Parents before children (Kahn). Among ready nodes the earlier timestamp goes
   * first, then the smaller decision_id. Records without a valid timestamp sort last.
   */
  topologicalOrder(): TopologicalResult {
    const cycles = this.findCycles();
    if (cycles.length > 0) {
      return { ok: false, cyclic_ids: [...new Set(cycles.flat())].sort() };
    }

    const key = (id: string) => timestampMs(this.nodes.get(id)?.record.timestamp) ?? Number.POSITIVE_INFINITY;
    const before = (a: string, b: string) => {
      const ka = key(a);
      const kb = key(b);
      if (ka !== kb) return ka < kb ? -1 : 1;
      return a < b ? -1 : a > b ? 1 : 0;
    };

    const pending = new Map<string, number>();
    for (const id of this.nodes.keys()) pending.set(id, new Set(this.parents.get(id) ?? []).size);

    const ready = [...pending].filter(([, n]) => n === 0).map(([id]) => id);
    const order: string[] = [];

    while (ready.length > 0) {
      ready.sort(before);
      const next = ready.shift();
      if (next === undefined) break;
      order.push(next);

      for (const child of new Set(this.children.get(next) ?? [])) {
        const left = (pending.get(child) ?? 0) - 1;
        pending.set(child, left);
        if (left === 0) ready.push(child);
      }
    }

    return { ok: true, order };
  }

  /** Lineage entries that resolve to no record, sorted by child then parent. */
  danglingReferences(): LineageReference[] {
    return this.dangling.map((r) => ({ ...r }));
  }

  /** Global-scope references to decisions outside this record set. */
  externalReferences(): LineageReference[] {
    return this.external.map((r) => ({ ...r }));
  }

  conflicts(): StructuralConflict[] {
    return this.conflictList.map((c) => ({ ...c, hashes: [...c.hashes], occurrences: [...c.occurrences] }));
  }

  duplicates(): DuplicateEmission[] {
    return this.duplicateList.map((d) => ({ ...d, occurrences: [...d.occurrences] }));
  }
}

export function buildLineageGraph(records: readonly LoadedRecord[], opts: LineageGraphOptions = {}): LineageGraph {
  const scope = opts.lineage_scope ?? "run-local";
  const known = opts.known_ids === undefined ? null : new Set(opts.known_ids);

  // group by id, then by content
  const groups = new Map<string, Array<{ loaded: LoadedRecord; hash: string }>>();
  for (const loaded of records) {
    const group = groups.get(loaded.record.decision_id) ?? [];
    group.push({ loaded, hash: computeRecordHash(loaded.record) });
    groups.set(loaded.record.decision_id, group);
  }

  const nodes = new Map<string, LoadedRecord>();
  const conflicts: StructuralConflict[] = [];
  const duplicates: DuplicateEmission[] = [];

  for (const [decision_id, group] of groups) {
    const first = group[0];
    if (first === undefined) continue;
    const occurrences = group.map((g) => ({ source: g.loaded.source, line: g.loaded.line }));
    const hashes = [...new Set(group.map((g) => g.hash))];

    if (hashes.length > 1) {
      conflicts.push({ decision_id, hashes, occurrences });
      continue;
    }
    if (group.length > 1) duplicates.push({ decision_id, count: group.length, occurrences });
    nodes.set(decision_id, first.loaded);
  }

  if (conflicts.length > 0 && opts.on_conflict === "throw") {
    throw new StructuralConflictError(conflicts);
  }

  const conflicted = new Set(conflicts.map((c) => c.decision_id));
  const parents = new Map<string, string[]>();
  const children = new Map<string, string[]>();
  const dangling: LineageReference[] = [];
  const external: LineageReference[] = [];

  for (const [id, loaded] of nodes) {
    const resolved: string[] = [];

    for (const parent of new Set(loaded.record.lineage)) {
      if (nodes.has(parent)) {
        resolved.push(parent);
        children.set(parent, [...(children.get(parent) ?? []), id]);
        continue;
      }
      // reported under conflicts
      if (conflicted.has(parent)) continue;

      if (scope === "global" && (known === null || known.has(parent))) {
        external.push({ decision_id: id, parent });
      } else {
        dangling.push({ decision_id: id, parent });
      }
    }

    parents.set(id, resolved);
  }

  return new LineageGraph({
    nodes,
    parents,
    children,
    dangling: dangling.sort(byReference),
    external: external.sort(byReference),
    conflicts,
    duplicates,
  });
}
