import type { Capability } from "../types/contracts.js";

export type ConcurrencyLimits = Partial<Record<Capability, number>>;

/** Only one file operation may be in flight; the rest are unlimited unless configured. */
export const DEFAULT_CONCURRENCY: ConcurrencyLimits = { file: 1 };

/**
 * Per-capability tokens. A step must hold its capability's token to be
 * dispatched; a limit of 1 makes the token a mutex.
 */
export class CapabilityGate {
  private readonly limits: ConcurrencyLimits;
  private readonly counts = new Map<Capability, number>();

  constructor(limits: ConcurrencyLimits = DEFAULT_CONCURRENCY) {
    for (const [cap, limit] of Object.entries(limits)) {
      if (limit === undefined || limit === Number.POSITIVE_INFINITY) continue;
      if (!Number.isInteger(limit) || limit < 1) {
        throw new Error(`concurrency limit for ${cap} must be a positive integer, got ${limit}`);
      }
    }
    this.limits = limits;
  }

  limit(cap: Capability): number {
    return this.limits[cap] ?? Number.POSITIVE_INFINITY;
  }

  active(cap: Capability): number {
    return this.counts.get(cap) ?? 0;
  }

  tryAcquire(cap: Capability): boolean {
    if (this.active(cap) >= this.limit(cap)) return false;
    this.counts.set(cap, this.active(cap) + 1);
    return true;
  }

  release(cap: Capability): void {
    const n = this.active(cap);
    if (n === 0) throw new Error(`release of ${cap} without a matching acquire`);
    this.counts.set(cap, n - 1);
  }
}
