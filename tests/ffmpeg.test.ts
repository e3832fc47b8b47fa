import { describe, expect, it } from "vitest";

import { buildFfmpegArgs, compressedPathFor, FfmpegTranscoder } from "../src/adapters/ffmpeg.js";
import { TranscodeError } from "../src/errors.js";

describe("compressedPathFor", () => {
  it("writes next to the input with a compressed suffix", () => {
    expect(compressedPathFor("/tmp/clips/job.webm", "video")).toBe("/tmp/clips/job.compressed.mp4");
    expect(compressedPathFor("/tmp/clips/job.opus", "audio")).toBe("/tmp/clips/job.compressed.m4a");
  });
});

describe("buildFfmpegArgs", () => {
  it("re-encodes video to 720p H.264", () => {
    expect(buildFfmpegArgs("in.webm", "out.mp4", "video")).toEqual([
      "-hide_banner",
      "-loglevel",
      "error",
      "-y",
      "-i",
      "in.webm",
      "-c:v",
      "libx264",
      "-crf",
      "28",
      "-preset",
      "fast",
      "-vf",
      "scale=-2:720",
      "-c:a",
      "aac",
      "-b:a",
      "128k",
      "-movflags",
      "+faststart",
      "out.mp4",
    ]);
  });

  it("drops video streams for audio", () => {
    expect(buildFfmpegArgs("in.opus", "out.m4a", "audio")).toEqual([
      "-hide_banner",
      "-loglevel",
      "error",
      "-y",
      "-i",
      "in.opus",
      "-vn",
      "-c:a",
      "aac",
      "-b:a",
      "96k",
      "out.m4a",
    ]);
  });
});

describe("FfmpegTranscoder", () => {
  it("refuses documents", async () => {
    const transcoder = new FfmpegTranscoder({ binaryPath: "ffmpeg" });

    await expect(
      transcoder.compress({
        inputPath: "/tmp/clips/job.zip",
        kind: "document",
        targetMaxBytes: 1000,
        signal: new AbortController().signal,
      }),
    ).rejects.toBeInstanceOf(TranscodeError);
  });
});
