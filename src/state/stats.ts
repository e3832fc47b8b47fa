import type { StatsRepo, UserId, UserStats } from "../types.js";

function nowIso(now: number): string {
  return new Date(now).toISOString();
}

/** Per-user counters kept for the lifetime of the process. */
export class InMemoryStatsRepo implements StatsRepo {
  private readonly stats = new Map<UserId, UserStats>();

  constructor(private readonly now: () => number = Date.now) {}

  get(userId: UserId): UserStats {
    const existing = this.stats.get(userId);
    if (existing) {
      return { ...existing, platforms: { ...existing.platforms } };
    }

    const seenAt = nowIso(this.now());
    return {
      userId,
      downloads: 0,
      failures: 0,
      totalBytes: 0,
      platforms: {},
      firstSeenAt: seenAt,
      lastSeenAt: seenAt,
    };
  }

  recordSuccess(userId: UserId, platform: string, sizeBytes: number): void {
    const entry = this.touch(userId);
    entry.downloads += 1;
    entry.totalBytes += sizeBytes;
    entry.platforms[platform] = (entry.platforms[platform] ?? 0) + 1;
  }

  recordFailure(userId: UserId): void {
    this.touch(userId).failures += 1;
  }

  private touch(userId: UserId): UserStats {
    const seenAt = nowIso(this.now());
    const entry = this.stats.get(userId) ?? {
      userId,
      downloads: 0,
      failures: 0,
      totalBytes: 0,
      platforms: {},
      firstSeenAt: seenAt,
      lastSeenAt: seenAt,
    };
    entry.lastSeenAt = seenAt;
    this.stats.set(userId, entry);
    return entry;
  }
}
