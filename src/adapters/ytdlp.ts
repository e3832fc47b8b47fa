import path from "node:path";

import { z } from "zod";

import {
  describeError,
  ExtractionError,
  isAbortError,
  isProcessExitError,
} from "../errors.js";
import { logger } from "../logger.js";
import type {
  DownloadProgress,
  ExtractedMedia,
  ExtractParams,
  InspectParams,
  MediaExtractor,
  MediaInfo,
  MediaInspector,
  QualityOption,
} from "../types.js";
import { runProcess } from "../utils/process.js";

interface YtDlpExtractorOptions {
  binaryPath: string;
  extraArgs?: string[];
  killGraceMs?: number;
}

const PROGRESS_MARKER = "@@progress";
const RESULT_MARKER = "@@result";
const CEILING_REASON = "download ceiling exceeded";
const MAX_QUALITY_OPTIONS = 6;

const resultSchema = z.object({
  filepath: z.string().min(1),
  title: z.string().nullish(),
  ext: z.string().nullish(),
  extractor_key: z.string().nullish(),
  uploader: z.string().nullish(),
  duration: z.number().nonnegative().nullish(),
});

const formatSchema = z.object({
  format_id: z.string().nullish(),
  height: z.number().nullish(),
  vcodec: z.string().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish(),
});

const infoSchema = z.object({
  title: z.string().nullish(),
  uploader: z.string().nullish(),
  duration: z.number().nonnegative().nullish(),
  extractor_key: z.string().nullish(),
  formats: z.array(formatSchema).nullish(),
});

type FormatEntry = z.infer<typeof formatSchema>;

export function formatSelector(maxBytes: number, maxHeight?: number): string {
  const filter = `${maxHeight ? `[height<=${maxHeight}]` : ""}[filesize<?${maxBytes}]`;
  return `bv*${filter}+ba/b${filter}/b`;
}

export function buildYtDlpArgs(
  params: Pick<ExtractParams, "url" | "jobId" | "outputDir" | "maxBytes" | "maxHeight">,
  extraArgs: string[] = [],
): string[] {
  const outputTemplate = path.join(params.outputDir, `${params.jobId}.%(ext)s`);

  return [
    "--no-playlist",
    "--no-simulate",
    "--no-mtime",
    "--newline",
    "--progress",
    "--max-filesize",
    String(params.maxBytes),
    "--format",
    formatSelector(params.maxBytes, params.maxHeight),
    "--merge-output-format",
    "mp4",
    "--progress-template",
    `download:${PROGRESS_MARKER} %(progress.downloaded_bytes)s %(progress.total_bytes,progress.total_bytes_estimate)s`,
    "--print",
    `after_move:${RESULT_MARKER} %(.{filepath,title,ext,extractor_key,uploader,duration})j`,
    "--output",
    outputTemplate,
    ...extraArgs,
    "--",
    params.url,
  ];
}

export function buildInspectArgs(url: string, extraArgs: string[] = []): string[] {
  return ["--dump-json", "--no-warnings", "--no-playlist", ...extraArgs, "--", url];
}

function parseByteCount(raw: string | undefined): number | null {
  if (!raw || raw === "NA") {
    return null;
  }

  const value = Number.parseFloat(raw);
  return Number.isFinite(value) ? Math.round(value) : null;
}

export function parseProgressLine(line: string): DownloadProgress | null {
  if (!line.startsWith(PROGRESS_MARKER)) {
    return null;
  }

  const [, downloadedRaw, totalRaw] = line.trim().split(/\s+/);
  const downloadedBytes = parseByteCount(downloadedRaw);
  if (downloadedBytes === null) {
    return null;
  }

  return { downloadedBytes, totalBytes: parseByteCount(totalRaw) };
}

export function parseResultLine(line: string): ExtractedMedia | null {
  if (!line.startsWith(RESULT_MARKER)) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(line.slice(RESULT_MARKER.length).trim());
  } catch {
    return null;
  }

  const parsed = resultSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  const extension = parsed.data.ext ?? path.extname(parsed.data.filepath).slice(1);
  return {
    path: parsed.data.filepath,
    title: parsed.data.title ?? "",
    extension,
    extractor: parsed.data.extractor_key ?? null,
    uploader: parsed.data.uploader ?? null,
    durationSeconds: parsed.data.duration ?? null,
  };
}

function knownSize(format: FormatEntry): number | null {
  return format.filesize ?? format.filesize_approx ?? null;
}

/** One option per video height, tallest first. */
export function qualityOptions(formats: FormatEntry[]): QualityOption[] {
  const byHeight = new Map<number, number | null>();

  for (const format of formats) {
    const height = format.height;
    if (!height || height <= 0 || format.vcodec === "none") {
      continue;
    }

    const size = knownSize(format);
    const previous = byHeight.get(height);
    if (previous === undefined || (size !== null && (previous === null || size > previous))) {
      byHeight.set(height, size);
    }
  }

  return [...byHeight.entries()]
    .sort(([left], [right]) => right - left)
    .slice(0, MAX_QUALITY_OPTIONS)
    .map(([height, sizeBytes]) => ({ height, sizeBytes }));
}

export function parseInfoJson(raw: string): MediaInfo | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = infoSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }

  return {
    title: parsed.data.title ?? "",
    uploader: parsed.data.uploader ?? null,
    durationSeconds: parsed.data.duration ?? null,
    extractor: parsed.data.extractor_key ?? null,
    qualities: qualityOptions(parsed.data.formats ?? []),
  };
}

export function isMaxFilesizeNotice(line: string): boolean {
  return /larger than max-filesize/i.test(line);
}

export class YtDlpExtractor implements MediaExtractor, MediaInspector {
  constructor(private readonly options: YtDlpExtractorOptions) {}

  async version(): Promise<string> {
    const output = await runProcess(this.options.binaryPath, ["--version"]);
    return output.stdoutTail;
  }

  async inspect(params: InspectParams): Promise<MediaInfo> {
    const lines: string[] = [];

    try {
      await runProcess(
        this.options.binaryPath,
        buildInspectArgs(params.url, this.options.extraArgs),
        {
          signal: params.signal,
          killGraceMs: this.options.killGraceMs,
          onLine: (line, stream) => {
            if (stream === "stdout") {
              lines.push(line);
            }
          },
        },
      );
    } catch (error) {
      throw this.toExtractionError(error);
    }

    const info = parseInfoJson(lines.join("\n"));
    if (!info) {
      throw new ExtractionError("yt-dlp returned unreadable media info");
    }

    logger.debug(
      { url: params.url, extractor: info.extractor, qualities: info.qualities.length },
      "yt-dlp inspected media",
    );
    return info;
  }

  async extract(params: ExtractParams): Promise<ExtractedMedia> {
    const ceiling = new AbortController();
    const signal = AbortSignal.any([params.signal, ceiling.signal]);
    const captured: { result: ExtractedMedia | null; ceilingHit: boolean } = {
      result: null,
      ceilingHit: false,
    };

    const onLine = (line: string): void => {
      const progress = parseProgressLine(line);
      if (progress) {
        if (progress.downloadedBytes > params.maxBytes && !ceiling.signal.aborted) {
          captured.ceilingHit = true;
          ceiling.abort(CEILING_REASON);
          return;
        }
        params.onProgress?.(progress);
        return;
      }

      const parsed = parseResultLine(line);
      if (parsed) {
        captured.result = parsed;
        return;
      }

      if (isMaxFilesizeNotice(line)) {
        captured.ceilingHit = true;
      }
    };

    try {
      await runProcess(
        this.options.binaryPath,
        buildYtDlpArgs(params, this.options.extraArgs),
        { signal, onLine, killGraceMs: this.options.killGraceMs },
      );
    } catch (error) {
      if (captured.ceilingHit && !params.signal.aborted) {
        throw new ExtractionError(CEILING_REASON);
      }
      throw this.toExtractionError(error);
    }

    if (captured.ceilingHit) {
      throw new ExtractionError(CEILING_REASON);
    }

    const result = captured.result;
    if (!result) {
      throw new ExtractionError("yt-dlp finished without producing a file");
    }

    logger.debug({ jobId: params.jobId, result }, "yt-dlp produced file");
    return result;
  }

  private toExtractionError(error: unknown): Error {
    if (error instanceof Error && isAbortError(error)) {
      return error;
    }
    if (isProcessExitError(error)) {
      return new ExtractionError(
        `yt-dlp failed with exit code ${error.exitCode ?? "null"}`,
        error.stderrTail,
      );
    }
    return new ExtractionError(`yt-dlp could not run: ${describeError(error)}`);
  }
}
