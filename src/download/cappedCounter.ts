import type { StatusCounts } from "../types";

/** Once `capacity` distinct labels are tracked, new labels are dropped; tracked ones keep counting. */
export const CAPPED_COUNTER_OVERFLOW_POLICY = "reject_new_labels" as const;

export const DEFAULT_MAX_STATUS_LABELS = 1000;

export class CappedCounter {
  readonly capacity: number;
  readonly overflowPolicy = CAPPED_COUNTER_OVERFLOW_POLICY;
  private readonly counts = new Map<string, number>();

  constructor(capacity = DEFAULT_MAX_STATUS_LABELS) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new Error(`CappedCounter capacity must be a non-negative integer (got ${capacity})`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.counts.size;
  }

  /** Returns false when the label was rejected by the cap. */
  increment(label: string): boolean {
    const current = this.counts.get(label);
    if (current !== undefined) {
      this.counts.set(label, current + 1);
      return true;
    }
    if (this.counts.size >= this.capacity) {
      return false;
    }
    this.counts.set(label, 1);
    return true;
  }

  snapshot(): StatusCounts {
    return Object.fromEntries(this.counts);
  }
}
