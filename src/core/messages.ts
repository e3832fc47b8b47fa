import type { AppConfig } from "../config/index.js";
import type { FetchFailure, FetchedFile, MediaInfo, QualityOption, UserStats } from "../types.js";
import {
  formatDate,
  formatDateTime,
  formatDuration,
  formatFileSize,
  formatSeconds,
  truncate,
} from "../utils/format.js";
import { SUPPORTED_PLATFORMS } from "../utils/media.js";

export type MessageLimits = Pick<
  AppConfig,
  | "maxUploadBytes"
  | "maxDownloadBytes"
  | "rateLimitRequests"
  | "rateLimitWindowMs"
  | "operationTimeoutMs"
>;

const CAPTION_LIMIT = 1024;

export const USAGE_HINT =
  "🔗 Send me a link to a video or file and I'll fetch it for you.\nUse /help to see what I can do.";

export const PROCESSING_MESSAGE =
  "🔄 **Processing...**\n\nAnalyzing your link and preparing download...";

export const ANALYZING_MESSAGE = "🔍 **Analyzing Video...**\n\nGetting video information...";

export const BEST_QUALITY_LABEL = "🎯 Best Quality (Auto)";

export const INVALID_SELECTION_MESSAGE = "❌ **Error**\n\nInvalid selection.";

export function qualityLabel(option: QualityOption): string {
  return option.sizeBytes && option.sizeBytes > 0
    ? `${option.height}p (${formatFileSize(option.sizeBytes)})`
    : `${option.height}p`;
}

export function selectionMessage(info: MediaInfo, platform: string): string {
  return [
    "📹 **Video Found**",
    "",
    `📝 **Title:** ${truncate(info.title || "Unknown", 50)}`,
    `👤 **Uploader:** ${info.uploader ?? "Unknown"}`,
    `🌐 **Platform:** ${platform}`,
    `⏱️ **Duration:** ${formatDuration(info.durationSeconds)}`,
    "",
    "📺 **Select Quality:**",
  ].join("\n");
}

export function downloadStartMessage(quality: string): string {
  return `📹 **Starting Download**\n\n📺 **Quality:** ${quality}\n\n⬇️ **Downloading...**`;
}

export function startMessage(limits: MessageLimits): string {
  return [
    "🎬 **Video Downloader Bot** 🎬",
    "",
    "Send me a link and I'll download the video or file for you.",
    "",
    "📋 **Commands:**",
    "/start - Show this message",
    "/help - Supported platforms and limits",
    "/stats - Your usage statistics",
    "",
    `⚠️ Files larger than ${formatFileSize(limits.maxUploadBytes)} will be compressed.`,
  ].join("\n");
}

export function helpMessage(limits: MessageLimits): string {
  return [
    "📚 **Help & Supported Platforms**",
    "",
    "🔗 **Supported platforms:**",
    ...SUPPORTED_PLATFORMS.map((platform) => `• ${platform}`),
    "• And many more sites supported by yt-dlp",
    "",
    "📝 **How to use:**",
    "1. Copy a video or file link",
    "2. Send it to me",
    "3. Wait for the download to finish",
    "",
    "⚠️ **Limits:**",
    `• Max file size: ${formatFileSize(limits.maxUploadBytes)} (larger files are compressed)`,
    `• Max download size: ${formatFileSize(limits.maxDownloadBytes)}`,
    `• Rate limit: ${limits.rateLimitRequests} requests per ${formatSeconds(limits.rateLimitWindowMs / 1000)}`,
    "• One download at a time",
  ].join("\n");
}

export function progressMessage(percent: number): string {
  return `📥 **Downloading...** ${percent}%`;
}

export function failureMessage(result: FetchFailure, limits: MessageLimits): string {
  switch (result.kind) {
    case "InvalidUrl":
      return "❌ **Invalid Link**\n\nThe link you sent is not a valid http(s) URL.";
    case "RateLimited": {
      const retry =
        result.retryAfterMs && result.retryAfterMs > 0
          ? ` Try again in ${formatSeconds(result.retryAfterMs / 1000)}.`
          : "";
      return `⏰ **Rate Limit Exceeded**\n\nLimit: ${limits.rateLimitRequests} requests per ${formatSeconds(limits.rateLimitWindowMs / 1000)}.${retry}`;
    }
    case "AlreadyInProgress":
      return "⏳ **Please wait**\n\nYou already have an active download. Please wait for it to complete.";
    case "ExtractionFailed":
      return `❌ **Download Failed**\n\nThe link might be unsupported, private, or larger than ${formatFileSize(limits.maxDownloadBytes)}.`;
    case "TooLarge":
      return `📦 **File Too Large**\n\nThe file is larger than ${formatFileSize(limits.maxUploadBytes)} even after compression.`;
    case "TranscodeFailed":
      return `❌ **Compression Failed**\n\nThe file could not be compressed below ${formatFileSize(limits.maxUploadBytes)}.`;
    case "DeliveryFailed":
      return "❌ **Upload Failed**\n\nThe file could not be sent to this chat. Please try again later.";
    case "Timeout":
      return `⌛ **Timed Out**\n\nThe download took longer than ${formatSeconds(limits.operationTimeoutMs / 1000)}. Please try again.`;
    case "Cancelled":
      return "🛑 **Cancelled**\n\nThe download was stopped.";
    case "SelectionExpired":
      return "❌ **Error**\n\nSession expired. Please send the link again.";
    case "Internal":
      return "❌ **Error Occurred**\n\nAn unexpected error occurred. Please try again later.";
  }
}

export function captionFor(file: FetchedFile): string {
  const caption = [
    "✅ **Download Complete**",
    "",
    `📝 ${truncate(file.title, 200)}`,
    ...(file.uploader ? [`👤 ${file.uploader}`] : []),
    `🌐 ${file.platform}`,
    `📦 ${formatFileSize(file.sizeBytes)}`,
    ...(file.durationSeconds ? [`⏱️ ${formatDuration(file.durationSeconds)}`] : []),
  ].join("\n");

  return truncate(caption, CAPTION_LIMIT);
}

export function statsMessage(stats: UserStats): string {
  const platforms = Object.entries(stats.platforms)
    .sort(([leftName, leftCount], [rightName, rightCount]) =>
      rightCount - leftCount || leftName.localeCompare(rightName),
    )
    .map(([platform, count]) => `• ${platform}: ${count}`);

  return [
    "📊 **Your Statistics**",
    "",
    `🔢 Total Downloads: ${stats.downloads}`,
    `⚠️ Failed Attempts: ${stats.failures}`,
    `📦 Total Size: ${formatFileSize(stats.totalBytes)}`,
    `📅 Member Since: ${formatDate(stats.firstSeenAt)}`,
    `🕒 Last Used: ${formatDateTime(stats.lastSeenAt)}`,
    `🌐 Platforms Used: ${platforms.length}`,
    ...platforms,
  ].join("\n");
}
