// packages/decision/src/ids.ts
import { randomUUID } from "node:crypto";

export function newDecisionId(prefix = "dec"): string {
  return `${prefix}_${randomUUID()}`;
}

export type StreamClock = () => string;

/**
 * ISO clock for one recorder stream: never returns an instant earlier than the previous one,
 * even if the wall clock steps back.
 */
export function createStreamClock(now: () => Date = () => new Date()): StreamClock {
  let last = Number.NEGATIVE_INFINITY;
  return () => {
    const t = Math.max(now().getTime(), last);
    last = t;
    return new Date(t).toISOString();
  };
}

/**
 * decision_ids claimed within one run. An id is claimed once and never released.
 */
export class RunLedger {
  private readonly claimed = new Set<string>();

  claim(decision_id: string): boolean {
    if (this.claimed.has(decision_id)) return false;
    this.claimed.add(decision_id);
    return true;
  }

  has(decision_id: string): boolean {
    return this.claimed.has(decision_id);
  }

  get size(): number {
    return this.claimed.size;
  }
}
