import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { YtDlpExtractor } from "../src/adapters/ytdlp.js";
import { DeliveryAdapter } from "../src/core/delivery.js";
import { FetchOrchestrator, type OrchestratorConfig } from "../src/core/orchestrator.js";
import { RateGate } from "../src/core/rate-gate.js";
import { SingleFlightGuard } from "../src/core/single-flight.js";
import { InMemoryStatsRepo } from "../src/state/stats.js";
import type {
  ExtractedMedia,
  FetchResult,
  MediaExtractor,
  MediaInspector,
  Transcoder,
} from "../src/types.js";
import { fileExists } from "../src/utils/fs.js";
import {
  deferred,
  FakeExtractor,
  FakeInspector,
  FakeTranscoder,
  FakeTransport,
  hanging,
  makeFile,
  mediaInfo,
  MIB,
  producing,
  StalledTranscoder,
  writeScript,
} from "./fakes.js";

const URL = "https://www.youtube.com/watch?v=abc123";

let tmpDir: string;

function setup(options: {
  extractor: MediaExtractor;
  inspector?: MediaInspector;
  transcoder?: Transcoder;
  config?: Partial<OrchestratorConfig>;
  now?: () => number;
}) {
  const stats = new InMemoryStatsRepo();
  const rateGate = new RateGate({ maxRequests: 5, windowMs: 60_000, now: options.now });
  const orchestrator = new FetchOrchestrator({
    config: {
      downloadTmpDir: tmpDir,
      maxUploadBytes: 50 * MIB,
      maxDownloadBytes: 500 * MIB,
      operationTimeoutMs: 300_000,
      selectionTtlMs: 600_000,
      ...options.config,
    },
    rateGate,
    guard: new SingleFlightGuard(),
    extractor: options.extractor,
    inspector: options.inspector ?? new FakeInspector(mediaInfo()),
    transcoder: options.transcoder ?? new FakeTranscoder(new Error("not expected")),
    stats,
    now: options.now,
  });
  return { orchestrator, stats, rateGate };
}

function expectFailure(result: FetchResult) {
  if (result.ok) {
    throw new Error(`expected failure, got success for ${result.file.path}`);
  }
  return result;
}

function expectSuccess(result: FetchResult) {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.kind}: ${result.detail}`);
  }
  return result.file;
}

describe("FetchOrchestrator", () => {
  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "clipdrop-orchestrator-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("fetches a small video, delivers it and leaves no file behind", async () => {
    const extractor = producing(10 * MIB);
    const { orchestrator, stats } = setup({ extractor });
    const transport = new FakeTransport();
    const delivery = new DeliveryAdapter({
      transport,
      limits: {
        maxUploadBytes: 50 * MIB,
        maxDownloadBytes: 500 * MIB,
        rateLimitRequests: 5,
        rateLimitWindowMs: 60_000,
        operationTimeoutMs: 300_000,
      },
    });

    const result = await orchestrator.fetch("user-1", URL);
    const file = expectSuccess(result);

    expect(file.kind).toBe("video");
    expect(file.sizeBytes).toBe(10 * MIB);
    expect(file.title).toBe("Test clip");
    expect(file.platform).toBe("YouTube");
    expect(await fileExists(file.path)).toBe(true);

    await delivery.deliver("chat-1", result);

    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0]).toMatchObject({ type: "sendFile", target: "chat-1", kind: "video" });
    expect(await readdir(tmpDir)).toEqual([]);
    expect(stats.get("user-1").downloads).toBe(1);
    expect(stats.get("user-1").platforms).toEqual({ YouTube: 1 });
    expect(orchestrator.activeCount).toBe(0);
  });

  it("rate limits the sixth request without calling the extractor", async () => {
    const extractor = producing(1024);
    const { orchestrator } = setup({ extractor, now: () => 1_000 });

    for (let index = 0; index < 5; index += 1) {
      const file = expectSuccess(await orchestrator.fetch("user-1", `${URL}&n=${index}`));
      await rm(file.path, { force: true });
    }

    const sixth = expectFailure(await orchestrator.fetch("user-1", URL));

    expect(sixth.kind).toBe("RateLimited");
    expect(sixth.retryAfterMs).toBe(60_000);
    expect(extractor.calls).toHaveLength(5);
  });

  it("rejects a second fetch while the first is still running", async () => {
    const started = deferred<void>();
    const gate = deferred<void>();
    const extractor = new FakeExtractor(async (params): Promise<ExtractedMedia> => {
      started.resolve();
      await gate.promise;
      const filePath = await makeFile(path.join(params.outputDir, `${params.jobId}.mp4`), 2048);
      return { path: filePath, title: "first", extension: "mp4", extractor: null, uploader: null, durationSeconds: null };
    });
    const { orchestrator } = setup({ extractor });

    const first = orchestrator.fetch("user-1", URL);
    await started.promise;

    const second = expectFailure(await orchestrator.fetch("user-1", `${URL}&second=1`));
    expect(second.kind).toBe("AlreadyInProgress");
    expect(orchestrator.activeCount).toBe(1);

    gate.resolve();
    expectSuccess(await first);
    expect(extractor.calls).toHaveLength(1);
    expect(orchestrator.activeCount).toBe(0);

    const third = await orchestrator.fetch("user-1", `${URL}&third=1`);
    expect(third.ok).toBe(true);
  });

  it("lets different users fetch concurrently", async () => {
    const gate = deferred<void>();
    const extractor = new FakeExtractor(async (params): Promise<ExtractedMedia> => {
      await gate.promise;
      const filePath = await makeFile(path.join(params.outputDir, `${params.jobId}.mp4`), 10);
      return { path: filePath, title: "", extension: "mp4", extractor: null, uploader: null, durationSeconds: null };
    });
    const { orchestrator } = setup({ extractor });

    const first = orchestrator.fetch("user-1", URL);
    const second = orchestrator.fetch("user-2", URL);
    await Promise.resolve();
    gate.resolve();

    const results = await Promise.all([first, second]);
    expect(results.map((result) => result.ok)).toEqual([true, true]);
  });

  it("fails extraction above the download ceiling and removes the file", async () => {
    const extractor = producing(600 * MIB);
    const { orchestrator, stats } = setup({ extractor });

    const result = expectFailure(await orchestrator.fetch("user-1", URL));

    expect(result.kind).toBe("ExtractionFailed");
    expect(await readdir(tmpDir)).toEqual([]);
    expect(stats.get("user-1").failures).toBe(1);
  });

  it("transcodes an oversized video below the delivery ceiling", async () => {
    const extractor = producing(80 * MIB);
    const transcoder = new FakeTranscoder(40 * MIB);
    const { orchestrator } = setup({ extractor, transcoder });

    const file = expectSuccess(await orchestrator.fetch("user-1", URL));

    expect(file.sizeBytes).toBe(40 * MIB);
    expect(file.kind).toBe("video");
    expect(file.path.endsWith(".compressed.mp4")).toBe(true);
    expect(transcoder.calls).toHaveLength(1);
    expect(transcoder.calls[0]?.targetMaxBytes).toBe(50 * MIB);
    expect(await readdir(tmpDir)).toEqual([path.basename(file.path)]);
  });

  it("reports TooLarge when transcoding cannot reach the ceiling", async () => {
    const extractor = producing(80 * MIB);
    const transcoder = new FakeTranscoder(60 * MIB);
    const { orchestrator } = setup({ extractor, transcoder });

    const result = expectFailure(await orchestrator.fetch("user-1", URL));

    expect(result.kind).toBe("TooLarge");
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it("reports TooLarge when the transcoder fails", async () => {
    const extractor = producing(80 * MIB);
    const transcoder = new FakeTranscoder(new Error("encoder crashed"));
    const { orchestrator } = setup({ extractor, transcoder });

    const result = expectFailure(await orchestrator.fetch("user-1", URL));

    expect(result.kind).toBe("TooLarge");
    expect(result.detail).toBe("transcoding failed: encoder crashed");
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it("does not transcode oversized documents", async () => {
    const extractor = producing(80 * MIB, "zip");
    const transcoder = new FakeTranscoder(10 * MIB);
    const { orchestrator } = setup({ extractor, transcoder });

    const result = expectFailure(await orchestrator.fetch("user-1", URL));

    expect(result.kind).toBe("TooLarge");
    expect(transcoder.calls).toHaveLength(0);
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it("maps extractor errors to ExtractionFailed", async () => {
    const extractor = new FakeExtractor(async () => {
      throw new Error("unsupported site");
    });
    const { orchestrator, stats } = setup({ extractor });

    const result = expectFailure(await orchestrator.fetch("user-1", URL));

    expect(result.kind).toBe("ExtractionFailed");
    expect(result.detail).toBe("unsupported site");
    expect(stats.get("user-1").failures).toBe(1);
    expect(orchestrator.activeCount).toBe(0);
  });

  it("rejects invalid URLs before consuming a rate slot", async () => {
    const extractor = producing(10);
    const { orchestrator, rateGate } = setup({ extractor });

    for (const candidate of ["not a url", "ftp://example.com/file", ""]) {
      const result = expectFailure(await orchestrator.fetch("user-1", candidate));
      expect(result.kind).toBe("InvalidUrl");
    }

    expect(rateGate.count("user-1")).toBe(0);
    expect(extractor.calls).toHaveLength(0);
  });

  it("times out a slow extraction and removes partial files", async () => {
    const { orchestrator } = setup({
      extractor: hanging(),
      config: { operationTimeoutMs: 20 },
    });

    const result = expectFailure(await orchestrator.fetch("user-1", URL));

    expect(result.kind).toBe("Timeout");
    expect(await readdir(tmpDir)).toEqual([]);
    expect(orchestrator.activeCount).toBe(0);
  });

  it("cancels an in-flight fetch through the abort hook", async () => {
    const extractor = hanging();
    const { orchestrator } = setup({ extractor });

    const pending = orchestrator.fetch("user-1", URL);
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(orchestrator.cancel("user-1")).toBe(true);
    const result = expectFailure(await pending);

    expect(result.kind).toBe("Cancelled");
    expect(orchestrator.cancel("user-1")).toBe(false);
    expect(await readdir(tmpDir)).toEqual([]);
  });

  it("reports progress in steps of ten and signals acceptance once", async () => {
    const extractor = new FakeExtractor(async (params): Promise<ExtractedMedia> => {
      for (const downloadedBytes of [0, 15, 18, 55, 100]) {
        params.onProgress?.({ downloadedBytes, totalBytes: 100 });
      }
      params.onProgress?.({ downloadedBytes: 10, totalBytes: null });
      const filePath = await makeFile(path.join(params.outputDir, `${params.jobId}.mp4`), 100);
      return { path: filePath, title: "clip", extension: "mp4", extractor: null, uploader: null, durationSeconds: null };
    });
    const { orchestrator } = setup({ extractor });
    const percents: number[] = [];
    let accepted = 0;

    await orchestrator.fetch("user-1", URL, {
      onAccepted: () => {
        accepted += 1;
      },
      onProgress: (percent) => percents.push(percent),
    });

    expect(accepted).toBe(1);
    expect(percents).toEqual([10, 50, 100]);
  });

  it("times out during transcoding and removes the partial output", async () => {
    const transcoder = new StalledTranscoder();
    const { orchestrator } = setup({
      extractor: producing(80 * MIB),
      transcoder,
      config: { operationTimeoutMs: 300 },
    });

    const result = expectFailure(await orchestrator.fetch("user-1", URL));
    const partialOutput = await transcoder.started.promise;

    expect(result.kind).toBe("Timeout");
    expect(partialOutput.endsWith(".compressed.mp4")).toBe(true);
    expect(await fileExists(partialOutput)).toBe(false);
    expect(await readdir(tmpDir)).toEqual([]);
    expect(orchestrator.activeCount).toBe(0);
  });

  it("releases the guard shortly after the deadline when yt-dlp ignores SIGTERM", async () => {
    const binary = await writeScript(path.join(tmpDir, "stubborn-yt-dlp"), "trap '' TERM\nsleep 5");
    const downloads = path.join(tmpDir, "downloads");
    const { orchestrator } = setup({
      extractor: new YtDlpExtractor({ binaryPath: binary, killGraceMs: 100 }),
      config: { downloadTmpDir: downloads, operationTimeoutMs: 200 },
    });

    const startedAt = Date.now();
    const result = expectFailure(await orchestrator.fetch("user-1", URL));

    expect(result.kind).toBe("Timeout");
    expect(Date.now() - startedAt).toBeLessThan(2_000);
    expect(orchestrator.activeCount).toBe(0);
    expect(await readdir(downloads)).toEqual([]);
  });

  it("tracks the job id while a fetch is running", async () => {
    const extractor = hanging();
    const { orchestrator } = setup({ extractor });

    const pending = orchestrator.fetch("user-1", URL);
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(orchestrator.activeJobIds).toEqual([extractor.calls[0]?.jobId]);
    orchestrator.cancel("user-1");
    await pending;
    expect(orchestrator.activeJobIds).toEqual([]);
  });

  it("names the platform after the extractor when the host is not recognized", async () => {
    const extractor = producing(1024, "mp4", "Set", { extractor: "Bandcamp" });
    const { orchestrator, stats } = setup({ extractor });

    const file = expectSuccess(await orchestrator.fetch("user-1", "https://music.example.org/track/1"));

    expect(file.platform).toBe("Bandcamp");
    expect(stats.get("user-1").platforms).toEqual({ Bandcamp: 1 });
  });

  it("carries uploader and duration into the fetched file", async () => {
    const extractor = producing(1024, "mp4", "Clip", { uploader: "Channel", durationSeconds: 61 });
    const { orchestrator } = setup({ extractor });

    const file = expectSuccess(await orchestrator.fetch("user-1", URL));

    expect(file).toMatchObject({ uploader: "Channel", durationSeconds: 61 });
  });
});

describe("FetchOrchestrator quality selection", () => {
  beforeEach(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "clipdrop-selection-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function inspected(orchestrator: FetchOrchestrator, userId = "user-1") {
    const result = await orchestrator.inspect(userId, URL);
    if (!result.ok) {
      throw new Error(`expected inspection, got ${result.kind}`);
    }
    return result.selection;
  }

  it("inspects a link and downloads the chosen quality without a second rate slot", async () => {
    const extractor = producing(1024);
    const inspector = new FakeInspector(mediaInfo());
    const { orchestrator, rateGate } = setup({ extractor, inspector });

    const selection = await inspected(orchestrator);

    expect(selection.url).toBe(URL);
    expect(selection.platform).toBe("YouTube");
    expect(selection.info.qualities.map((option) => option.height)).toEqual([1080, 720]);
    expect(inspector.calls).toHaveLength(1);
    expect(orchestrator.activeCount).toBe(0);

    expectSuccess(await orchestrator.fetchSelected("user-1", selection.requestId, 720));

    expect(extractor.calls[0]?.maxHeight).toBe(720);
    expect(rateGate.count("user-1")).toBe(1);
  });

  it("downloads the best quality when no height is chosen", async () => {
    const extractor = producing(1024);
    const { orchestrator } = setup({ extractor });

    const selection = await inspected(orchestrator);
    expectSuccess(await orchestrator.fetchSelected("user-1", selection.requestId, null));

    expect(extractor.calls[0]?.maxHeight).toBeUndefined();
  });

  it("accepts each selection once and only from its owner", async () => {
    const { orchestrator } = setup({ extractor: producing(1024) });
    const selection = await inspected(orchestrator);

    const stranger = expectFailure(
      await orchestrator.fetchSelected("user-2", selection.requestId, 1080),
    );
    expect(stranger.kind).toBe("SelectionExpired");

    expectSuccess(await orchestrator.fetchSelected("user-1", selection.requestId, 1080));
    const again = expectFailure(
      await orchestrator.fetchSelected("user-1", selection.requestId, 1080),
    );
    expect(again.kind).toBe("SelectionExpired");
  });

  it("refuses qualities that were not offered", async () => {
    const extractor = producing(1024);
    const { orchestrator } = setup({ extractor });
    const selection = await inspected(orchestrator);

    const result = expectFailure(await orchestrator.fetchSelected("user-1", selection.requestId, 144));

    expect(result.kind).toBe("SelectionExpired");
    expect(result.detail).toBe("quality 144p was not offered");
    expect(extractor.calls).toHaveLength(0);
  });

  it("expires selections after the configured window", async () => {
    let now = 10_000;
    const extractor = producing(1024);
    const { orchestrator } = setup({
      extractor,
      now: () => now,
      config: { selectionTtlMs: 1_000 },
    });
    const selection = await inspected(orchestrator);

    now += 1_000;
    const result = expectFailure(await orchestrator.fetchSelected("user-1", selection.requestId, null));

    expect(result.kind).toBe("SelectionExpired");
    expect(result.detail).toBe("selection window elapsed");
    expect(extractor.calls).toHaveLength(0);
  });

  it("maps inspection errors to ExtractionFailed and releases the guard", async () => {
    const { orchestrator, stats } = setup({
      extractor: producing(1024),
      inspector: new FakeInspector(new Error("unsupported site")),
    });

    const result = await orchestrator.inspect("user-1", URL);

    expect(result).toEqual({ ok: false, kind: "ExtractionFailed", detail: "unsupported site" });
    expect(orchestrator.activeCount).toBe(0);
    expect(stats.get("user-1").failures).toBe(1);
  });

  it("applies URL validation and the rate gate before inspecting", async () => {
    const inspector = new FakeInspector(mediaInfo());
    const { orchestrator } = setup({ extractor: producing(1024), inspector, now: () => 1_000 });

    expect(await orchestrator.inspect("user-1", "not a url")).toMatchObject({ kind: "InvalidUrl" });
    for (let index = 0; index < 5; index += 1) {
      await inspected(orchestrator);
    }
    expect(await orchestrator.inspect("user-1", URL)).toMatchObject({
      kind: "RateLimited",
      retryAfterMs: 60_000,
    });
    expect(inspector.calls).toHaveLength(5);
  });

  it("refuses to inspect while the user has a download running", async () => {
    const { orchestrator } = setup({ extractor: hanging() });

    const pending = orchestrator.fetch("user-1", URL);
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(await orchestrator.inspect("user-1", `${URL}&other=1`)).toMatchObject({
      kind: "AlreadyInProgress",
    });
    orchestrator.cancel("user-1");
    await pending;
  });
});
