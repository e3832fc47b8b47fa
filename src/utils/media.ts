import { extname } from "node:path";

import type { MediaKind } from "../types.js";

const EXTENSION_KINDS: Record<string, MediaKind> = {
  ".mp4": "video",
  ".webm": "video",
  ".mkv": "video",
  ".mov": "video",
  ".avi": "video",
  ".m4v": "video",
  ".flv": "video",
  ".3gp": "video",
  ".ts": "video",
  ".mp3": "audio",
  ".m4a": "audio",
  ".aac": "audio",
  ".ogg": "audio",
  ".opus": "audio",
  ".wav": "audio",
  ".flac": "audio",
};

const PLATFORM_DOMAINS: Array<[string, string]> = [
  ["youtube.com", "YouTube"],
  ["youtu.be", "YouTube"],
  ["instagram.com", "Instagram"],
  ["twitter.com", "Twitter/X"],
  ["x.com", "Twitter/X"],
  ["tiktok.com", "TikTok"],
  ["facebook.com", "Facebook"],
  ["fb.watch", "Facebook"],
  ["reddit.com", "Reddit"],
  ["redd.it", "Reddit"],
  ["pinterest.com", "Pinterest"],
  ["dailymotion.com", "Dailymotion"],
  ["vimeo.com", "Vimeo"],
  ["terabox.com", "Terabox"],
];

export const SUPPORTED_PLATFORMS = [
  ...new Set(PLATFORM_DOMAINS.map(([, platform]) => platform)),
];

export function mediaKindFromPath(filePath: string): MediaKind {
  return mediaKindFromExtension(extname(filePath));
}

export function mediaKindFromExtension(extension: string): MediaKind {
  const normalized = extension.startsWith(".")
    ? extension.toLowerCase()
    : `.${extension.toLowerCase()}`;
  return EXTENSION_KINDS[normalized] ?? "document";
}

/** Platform name from the URL host, matching whole domain labels only. */
export function platformFromUrl(url: string): string {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return "Unknown";
  }

  for (const [domain, platform] of PLATFORM_DOMAINS) {
    if (host === domain || host.endsWith(`.${domain}`)) {
      return platform;
    }
  }

  return "Unknown";
}
