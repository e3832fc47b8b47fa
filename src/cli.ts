import "dotenv/config";

import { FfmpegTranscoder } from "./adapters/ffmpeg.js";
import { YtDlpExtractor } from "./adapters/ytdlp.js";
import { runBot } from "./bot.js";
import { loadTempConfig, loadToolsConfig } from "./config/index.js";
import { ConfigError, describeError } from "./errors.js";
import { TempJanitor } from "./janitor.js";
import { logger } from "./logger.js";

async function runHealthCheck(): Promise<void> {
  const tools = loadToolsConfig();
  const extractor = new YtDlpExtractor({ binaryPath: tools.ytdlpPath });
  const transcoder = new FfmpegTranscoder({ binaryPath: tools.ffmpegPath });

  const lines = ["Tool check"];
  let status: "PASS" | "FAIL" = "PASS";

  try {
    lines.push(`yt-dlp: ${await extractor.version()}`);
  } catch (error) {
    status = "FAIL";
    lines.push(`yt-dlp: missing (${describeError(error)})`);
  }

  try {
    lines.push(`ffmpeg: ${await transcoder.version()}`);
  } catch (error) {
    lines.push(`ffmpeg: missing, compression disabled (${describeError(error)})`);
  }

  lines.push(`result: ${status}`);
  process.stdout.write(`${lines.join("\n")}\n`);

  if (status === "FAIL") {
    process.exit(1);
  }
}

async function runTempClean(): Promise<void> {
  const temp = loadTempConfig();
  const janitor = new TempJanitor({
    dir: temp.downloadTmpDir,
    maxAgeMs: temp.tempMaxAgeMs,
    intervalMs: temp.tempMaxAgeMs,
  });

  const removed = await janitor.runOnce();
  logger.info({ dir: temp.downloadTmpDir, removed: removed.length }, "Temp cleanup completed");
}

async function main(): Promise<void> {
  const command = process.argv[2] ?? "bot:run";

  if (command === "bot:run") {
    await runBot();
    return;
  }

  if (command === "health:check") {
    await runHealthCheck();
    return;
  }

  if (command === "temp:clean") {
    await runTempClean();
    return;
  }

  throw new Error(`Unknown command: ${command}. Use bot:run | health:check | temp:clean`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error({ issues: error.issues }, "Invalid configuration");
    process.exit(1);
  }

  logger.error({ err: error }, "Command failed");
  process.exit(1);
});
