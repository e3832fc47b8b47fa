import path from "node:path";

import { z } from "zod";

import type { AppConfig } from "../config/index.js";
import { describeError, isExtractionError } from "../errors.js";
import { logger } from "../logger.js";
import type {
  ErrorKind,
  ExtractedMedia,
  FetchedFile,
  FetchFailure,
  FetchResult,
  MediaExtractor,
  MediaInfo,
  MediaInspector,
  ProgressObserver,
  StatsRepo,
  Transcoder,
  UserId,
} from "../types.js";
import { ensureDir, fileSize, removeByPrefix, removeFileSafe } from "../utils/fs.js";
import { makeJobId, makeRequestId } from "../utils/hash.js";
import { mediaKindFromExtension, mediaKindFromPath, platformFromUrl } from "../utils/media.js";
import type { RateGate } from "./rate-gate.js";
import type { ActiveDownload, SingleFlightGuard } from "./single-flight.js";

export const TIMEOUT_REASON = "timeout";

const UNKNOWN_PLATFORM = "Unknown";

export type OrchestratorConfig = Pick<
  AppConfig,
  | "downloadTmpDir"
  | "maxUploadBytes"
  | "maxDownloadBytes"
  | "operationTimeoutMs"
  | "selectionTtlMs"
>;

interface FetchOrchestratorDeps {
  config: OrchestratorConfig;
  rateGate: RateGate;
  guard: SingleFlightGuard;
  extractor: MediaExtractor;
  inspector: MediaInspector;
  transcoder: Transcoder;
  stats: StatsRepo;
  now?: () => number;
}

/** Receives whole percentages in steps of ten. */
export type ProgressListener = (percent: number) => void;

export interface FetchHooks {
  /** Called once the request passed validation, the rate gate and the guard. */
  onAccepted?: () => void;
  onProgress?: ProgressListener;
}

/** Inspected media waiting for the user to pick a quality. */
export interface QualitySelection {
  requestId: string;
  url: string;
  platform: string;
  info: MediaInfo;
}

export type InspectResult = { ok: true; selection: QualitySelection } | FetchFailure;

interface PendingSelection {
  userId: UserId;
  url: string;
  info: MediaInfo;
  expiresAt: number;
}

interface JobOptions {
  maxHeight?: number;
}

interface JobContext {
  userId: UserId;
  url: string;
  jobId: string;
  platform: string;
  options: JobOptions;
  active: ActiveDownload;
}

type FileDetails = Pick<FetchedFile, "title" | "platform" | "uploader" | "durationSeconds">;

type Admission = { ok: true; url: string } | FetchFailure;

function hasHttpProtocol(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol);
  } catch {
    return false;
  }
}

const urlSchema = z.string().trim().url().refine(hasHttpProtocol);

export function isValidUrl(candidate: string): boolean {
  return urlSchema.safeParse(candidate).success;
}

function failure(kind: ErrorKind, detail: string): FetchFailure {
  return { ok: false, kind, detail };
}

function abortFailure(signal: AbortSignal): FetchFailure {
  return signal.reason === TIMEOUT_REASON
    ? failure("Timeout", "operation deadline exceeded")
    : failure("Cancelled", `aborted: ${String(signal.reason)}`);
}

/** Host-derived platform, else the extractor's own name. */
function resolvePlatform(url: string, extractor: string | null): string {
  const platform = platformFromUrl(url);
  return platform === UNKNOWN_PLATFORM && extractor ? extractor : platform;
}

function notify(hook: (() => void) | undefined): void {
  try {
    hook?.();
  } catch (error) {
    logger.debug({ err: error }, "Fetch hook threw");
  }
}

function progressForwarder(listener: ProgressListener | undefined): ProgressObserver | undefined {
  if (!listener) {
    return undefined;
  }

  let lastStep = 0;
  return ({ downloadedBytes, totalBytes }) => {
    if (!totalBytes || totalBytes <= 0) {
      return;
    }

    const percent = Math.min(100, Math.floor((downloadedBytes / totalBytes) * 100));
    const step = Math.floor(percent / 10) * 10;
    if (step <= lastStep) {
      return;
    }

    lastStep = step;
    notify(() => listener(step));
  };
}

export class FetchOrchestrator {
  private readonly selections = new Map<string, PendingSelection>();
  private readonly jobs = new Set<string>();
  private readonly now: () => number;

  constructor(private readonly deps: FetchOrchestratorDeps) {
    this.now = deps.now ?? Date.now;
  }

  get activeCount(): number {
    return this.deps.guard.size;
  }

  /** Job ids whose temp files are still in use. */
  get activeJobIds(): string[] {
    return [...this.jobs];
  }

  /** Abort hook for a user's in-flight fetch. */
  cancel(userId: UserId, reason = "cancelled"): boolean {
    return this.deps.guard.abort(userId, reason);
  }

  cancelAll(reason = "shutdown"): number {
    return this.deps.guard.abortAll(reason);
  }

  async fetch(
    userId: UserId,
    url: string,
    hooks: FetchHooks = {},
  ): Promise<FetchResult> {
    const admission = this.admit(userId, url);
    if (!admission.ok) {
      return admission;
    }

    return this.runGuarded(userId, admission.url, {}, hooks);
  }

  /**
   * Reads the media's metadata and qualities without downloading. Counts
   * against the rate gate and holds the guard while it runs; the download
   * that follows through `fetchSelected` does neither again.
   */
  async inspect(
    userId: UserId,
    url: string,
    hooks: Pick<FetchHooks, "onAccepted"> = {},
  ): Promise<InspectResult> {
    const admission = this.admit(userId, url);
    if (!admission.ok) {
      return admission;
    }

    const active = this.deps.guard.tryAcquire(userId, admission.url);
    if (!active) {
      return failure("AlreadyInProgress", "another fetch is running for this user");
    }

    const signal = active.controller.signal;
    const deadline = this.armDeadline(active);
    try {
      notify(hooks.onAccepted);

      let info: MediaInfo;
      try {
        info = await this.deps.inspector.inspect({ url: admission.url, signal });
      } catch (error) {
        const result = signal.aborted
          ? abortFailure(signal)
          : failure("ExtractionFailed", describeError(error));
        this.deps.stats.recordFailure(userId);
        logger.warn(
          { userId, url: admission.url, kind: result.kind, detail: result.detail },
          "Inspection failed",
        );
        return result;
      }

      if (signal.aborted) {
        this.deps.stats.recordFailure(userId);
        return abortFailure(signal);
      }

      this.pruneSelections();
      const requestId = makeRequestId();
      this.selections.set(requestId, {
        userId,
        url: admission.url,
        info,
        expiresAt: this.now() + this.deps.config.selectionTtlMs,
      });

      logger.info(
        { userId, url: admission.url, requestId, qualities: info.qualities.length },
        "Media inspected",
      );
      return {
        ok: true,
        selection: {
          requestId,
          url: admission.url,
          platform: resolvePlatform(admission.url, info.extractor),
          info,
        },
      };
    } finally {
      clearTimeout(deadline);
      this.deps.guard.release(userId);
    }
  }

  /** Downloads a previously inspected link; `maxHeight` null means best quality. */
  async fetchSelected(
    userId: UserId,
    requestId: string,
    maxHeight: number | null,
    hooks: FetchHooks = {},
  ): Promise<FetchResult> {
    const pending = this.selections.get(requestId);
    if (!pending || pending.userId !== userId) {
      return failure("SelectionExpired", "no pending selection for this request");
    }

    if (pending.expiresAt <= this.now()) {
      this.selections.delete(requestId);
      return failure("SelectionExpired", "selection window elapsed");
    }

    if (maxHeight !== null && !pending.info.qualities.some((q) => q.height === maxHeight)) {
      return failure("SelectionExpired", `quality ${maxHeight}p was not offered`);
    }

    if (this.deps.guard.isActive(userId)) {
      return failure("AlreadyInProgress", "another fetch is running for this user");
    }

    this.selections.delete(requestId);
    return this.runGuarded(
      userId,
      pending.url,
      maxHeight === null ? {} : { maxHeight },
      hooks,
    );
  }

  private admit(userId: UserId, url: string): Admission {
    const trimmed = url.trim();
    if (!isValidUrl(trimmed)) {
      return failure("InvalidUrl", "not an absolute http(s) URL");
    }

    if (!this.deps.rateGate.allow(userId)) {
      return {
        ...failure("RateLimited", "request ceiling reached for the current window"),
        retryAfterMs: this.deps.rateGate.retryAfterMs(userId),
      };
    }

    return { ok: true, url: trimmed };
  }

  private armDeadline(active: ActiveDownload): NodeJS.Timeout {
    return setTimeout(() => {
      active.controller.abort(TIMEOUT_REASON);
    }, this.deps.config.operationTimeoutMs);
  }

  private pruneSelections(): void {
    const now = this.now();
    for (const [requestId, pending] of this.selections) {
      if (pending.expiresAt <= now) {
        this.selections.delete(requestId);
      }
    }
  }

  private async runGuarded(
    userId: UserId,
    url: string,
    options: JobOptions,
    hooks: FetchHooks,
  ): Promise<FetchResult> {
    const active = this.deps.guard.tryAcquire(userId, url);
    if (!active) {
      return failure("AlreadyInProgress", "another fetch is running for this user");
    }

    const job: JobContext = {
      userId,
      url,
      jobId: makeJobId(url),
      platform: platformFromUrl(url),
      options,
      active,
    };
    const deadline = this.armDeadline(active);
    const startedAt = Date.now();
    this.jobs.add(job.jobId);

    try {
      logger.info(
        { userId, url: job.url, platform: job.platform, jobId: job.jobId, ...options },
        "Fetch started",
      );
      notify(hooks.onAccepted);

      let result: FetchResult;
      try {
        result = await this.runJob(job, hooks.onProgress);
      } catch (error) {
        logger.error({ err: error, userId, jobId: job.jobId }, "Fetch failed unexpectedly");
        await this.discardJobFiles(job);
        result = failure("Internal", describeError(error));
      }

      if (result.ok) {
        this.deps.stats.recordSuccess(userId, result.file.platform, result.file.sizeBytes);
        logger.info(
          {
            userId,
            jobId: job.jobId,
            sizeBytes: result.file.sizeBytes,
            kind: result.file.kind,
            elapsedMs: Date.now() - startedAt,
          },
          "Fetch completed",
        );
      } else {
        this.deps.stats.recordFailure(userId);
        logger.warn(
          { userId, jobId: job.jobId, kind: result.kind, detail: result.detail },
          "Fetch failed",
        );
      }

      return result;
    } finally {
      clearTimeout(deadline);
      this.jobs.delete(job.jobId);
      this.deps.guard.release(userId);
    }
  }

  private async runJob(
    job: JobContext,
    onProgress: ProgressListener | undefined,
  ): Promise<FetchResult> {
    const { config, extractor } = this.deps;
    const signal = job.active.controller.signal;

    await ensureDir(config.downloadTmpDir);

    let extracted: ExtractedMedia;
    try {
      extracted = await extractor.extract({
        url: job.url,
        jobId: job.jobId,
        outputDir: config.downloadTmpDir,
        maxBytes: config.maxDownloadBytes,
        signal,
        maxHeight: job.options.maxHeight,
        onProgress: progressForwarder(onProgress),
      });
    } catch (error) {
      await this.discardJobFiles(job);
      if (signal.aborted) {
        return abortFailure(signal);
      }

      logger.debug(
        {
          jobId: job.jobId,
          stderrTail: isExtractionError(error) ? error.stderrTail : undefined,
        },
        "Extractor error output",
      );
      return failure("ExtractionFailed", describeError(error));
    }

    if (signal.aborted) {
      await this.discardJobFiles(job);
      return abortFailure(signal);
    }

    const downloadedSize = await fileSize(extracted.path);
    if (downloadedSize > config.maxDownloadBytes) {
      await this.discardJobFiles(job);
      return failure(
        "ExtractionFailed",
        `download ceiling exceeded (${downloadedSize} > ${config.maxDownloadBytes})`,
      );
    }

    const kind = extracted.extension
      ? mediaKindFromExtension(extracted.extension)
      : mediaKindFromPath(extracted.path);
    const details: FileDetails = {
      title: extracted.title.trim() || path.basename(extracted.path),
      platform: resolvePlatform(job.url, extracted.extractor),
      uploader: extracted.uploader,
      durationSeconds: extracted.durationSeconds,
    };

    if (downloadedSize <= config.maxUploadBytes) {
      return {
        ok: true,
        file: { ...details, path: extracted.path, kind, sizeBytes: downloadedSize },
      };
    }

    if (kind === "document") {
      await this.discardJobFiles(job);
      return failure("TooLarge", `document of ${downloadedSize} bytes cannot be transcoded`);
    }

    return this.shrink(job, extracted.path, kind, downloadedSize, details);
  }

  private async shrink(
    job: JobContext,
    inputPath: string,
    kind: "video" | "audio",
    originalSize: number,
    details: FileDetails,
  ): Promise<FetchResult> {
    const { config, transcoder } = this.deps;
    const signal = job.active.controller.signal;

    logger.info(
      { jobId: job.jobId, originalSize, ceiling: config.maxUploadBytes },
      "File exceeds delivery ceiling, transcoding",
    );

    let outputPath: string;
    try {
      outputPath = await transcoder.compress({
        inputPath,
        kind,
        targetMaxBytes: config.maxUploadBytes,
        signal,
      });
    } catch (error) {
      await this.discardJobFiles(job);
      if (signal.aborted) {
        return abortFailure(signal);
      }

      logger.warn({ err: error, jobId: job.jobId }, "Transcoding failed");
      return failure("TooLarge", `transcoding failed: ${describeError(error)}`);
    }

    const compressedSize = await fileSize(outputPath);
    if (compressedSize > config.maxUploadBytes) {
      await removeFileSafe(outputPath);
      await this.discardJobFiles(job);
      return failure(
        "TooLarge",
        `still ${compressedSize} bytes after transcoding (ceiling ${config.maxUploadBytes})`,
      );
    }

    await removeFileSafe(inputPath);
    logger.info(
      { jobId: job.jobId, originalSize, compressedSize },
      "Transcoded file fits delivery ceiling",
    );

    return {
      ok: true,
      file: {
        ...details,
        path: outputPath,
        kind: mediaKindFromPath(outputPath),
        sizeBytes: compressedSize,
      },
    };
  }

  private async discardJobFiles(job: JobContext): Promise<void> {
    try {
      await removeByPrefix(this.deps.config.downloadTmpDir, job.jobId);
    } catch (error) {
      logger.error({ err: error, jobId: job.jobId }, "Failed removing job files");
    }
  }
}
