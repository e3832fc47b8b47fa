import type { UserId } from "../types.js";

export interface ActiveDownload {
  userId: UserId;
  url: string;
  startedAt: number;
  controller: AbortController;
}

export class SingleFlightGuard {
  private readonly active = new Map<UserId, ActiveDownload>();

  constructor(private readonly now: () => number = Date.now) {}

  tryAcquire(userId: UserId, url = ""): ActiveDownload | null {
    if (this.active.has(userId)) {
      return null;
    }

    const entry: ActiveDownload = {
      userId,
      url,
      startedAt: this.now(),
      controller: new AbortController(),
    };
    this.active.set(userId, entry);
    return entry;
  }

  release(userId: UserId): void {
    this.active.delete(userId);
  }

  isActive(userId: UserId): boolean {
    return this.active.has(userId);
  }

  get size(): number {
    return this.active.size;
  }

  /** Signals the user's in-flight download; the holder still releases. */
  abort(userId: UserId, reason = "cancelled"): boolean {
    const entry = this.active.get(userId);
    if (!entry || entry.controller.signal.aborted) {
      return false;
    }

    entry.controller.abort(reason);
    return true;
  }

  abortAll(reason = "shutdown"): number {
    let aborted = 0;
    for (const userId of this.active.keys()) {
      if (this.abort(userId, reason)) {
        aborted += 1;
      }
    }
    return aborted;
  }
}
