import { logger } from "./logger.js";
import { cleanupStaleFiles } from "./utils/fs.js";

interface TempJanitorOptions {
  dir: string;
  maxAgeMs: number;
  intervalMs: number;
  now?: () => number;
  /** File name prefixes owned by running jobs. */
  inUse?: () => readonly string[];
}

/** Periodically removes temp files that outlived `maxAgeMs`. */
export class TempJanitor {
  private timer: NodeJS.Timeout | null = null;
  private isRunning = false;

  constructor(private readonly options: TempJanitorOptions) {}

  async runOnce(): Promise<string[]> {
    if (this.isRunning) {
      logger.warn("Skip temp cleanup because previous pass is still in progress");
      return [];
    }

    this.isRunning = true;
    try {
      const now = this.options.now?.() ?? Date.now();
      const removed = await cleanupStaleFiles(
        this.options.dir,
        this.options.maxAgeMs,
        now,
        this.options.inUse?.() ?? [],
      );
      if (removed.length > 0) {
        logger.info({ dir: this.options.dir, removed: removed.length }, "Removed stale temp files");
      }
      return removed;
    } finally {
      this.isRunning = false;
    }
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        logger.error({ err: error, dir: this.options.dir }, "Temp cleanup failed");
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
