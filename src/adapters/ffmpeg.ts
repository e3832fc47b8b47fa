import path from "node:path";

import { describeError, isAbortError, TranscodeError } from "../errors.js";
import { logger } from "../logger.js";
import type { CompressParams, MediaKind, Transcoder } from "../types.js";
import { fileSize, removeFileSafe } from "../utils/fs.js";
import { runProcess } from "../utils/process.js";

interface FfmpegTranscoderOptions {
  binaryPath: string;
  killGraceMs?: number;
}

export function compressedPathFor(inputPath: string, kind: MediaKind): string {
  const parsed = path.parse(inputPath);
  const extension = kind === "audio" ? ".m4a" : ".mp4";
  return path.join(parsed.dir, `${parsed.name}.compressed${extension}`);
}

export function buildFfmpegArgs(
  inputPath: string,
  outputPath: string,
  kind: MediaKind,
): string[] {
  const common = ["-hide_banner", "-loglevel", "error", "-y", "-i", inputPath];

  if (kind === "audio") {
    return [...common, "-vn", "-c:a", "aac", "-b:a", "96k", outputPath];
  }

  return [
    ...common,
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
    outputPath,
  ];
}

export class FfmpegTranscoder implements Transcoder {
  constructor(private readonly options: FfmpegTranscoderOptions) {}

  async version(): Promise<string> {
    const output = await runProcess(this.options.binaryPath, ["-version"]);
    return output.stdoutTail.split("\n")[0] ?? "";
  }

  async compress(params: CompressParams): Promise<string> {
    if (params.kind === "document") {
      throw new TranscodeError("documents cannot be transcoded");
    }

    const outputPath = compressedPathFor(params.inputPath, params.kind);

    try {
      await runProcess(
        this.options.binaryPath,
        buildFfmpegArgs(params.inputPath, outputPath, params.kind),
        { signal: params.signal, killGraceMs: this.options.killGraceMs },
      );
    } catch (error) {
      await removeFileSafe(outputPath);
      if (isAbortError(error)) {
        throw error;
      }
      throw new TranscodeError(`ffmpeg failed: ${describeError(error)}`);
    }

    const originalSize = await fileSize(params.inputPath);
    const compressedSize = await fileSize(outputPath);
    if (compressedSize >= originalSize) {
      await removeFileSafe(outputPath);
      throw new TranscodeError(
        `compression did not reduce size (${originalSize} -> ${compressedSize})`,
      );
    }

    logger.debug(
      { inputPath: params.inputPath, originalSize, compressedSize, target: params.targetMaxBytes },
      "Compressed media file",
    );
    return outputPath;
  }
}
