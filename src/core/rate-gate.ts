import type { UserId } from "../types.js";

export interface RateGateOptions {
  maxRequests: number;
  windowMs: number;
  now?: () => number;
}

/**
 * Per-user sliding-window counter. `allow` prunes, checks and appends in one
 * synchronous step, so callers racing on the same user cannot exceed the
 * ceiling inside any window.
 */
export class RateGate {
  private readonly windows = new Map<UserId, number[]>();
  private readonly now: () => number;

  constructor(private readonly options: RateGateOptions) {
    this.now = options.now ?? Date.now;
  }

  allow(userId: UserId): boolean {
    const now = this.now();
    const timestamps = this.prune(userId, now);

    if (timestamps.length >= this.options.maxRequests) {
      return false;
    }

    timestamps.push(now);
    this.windows.set(userId, timestamps);
    return true;
  }

  /** Milliseconds until the oldest counted request leaves the window. */
  retryAfterMs(userId: UserId): number {
    const now = this.now();
    const timestamps = this.prune(userId, now);
    const oldest = timestamps[0];
    if (oldest === undefined) {
      return 0;
    }

    return Math.max(0, oldest + this.options.windowMs - now);
  }

  count(userId: UserId): number {
    return this.prune(userId, this.now()).length;
  }

  private prune(userId: UserId, now: number): number[] {
    const existing = this.windows.get(userId) ?? [];
    const cutoff = now - this.options.windowMs;
    const pruned = existing.filter((timestamp) => timestamp > cutoff);

    if (pruned.length === 0) {
      this.windows.delete(userId);
    } else {
      this.windows.set(userId, pruned);
    }

    return pruned;
  }
}
