import { FfmpegTranscoder } from "./adapters/ffmpeg.js";
import { TelegramBotTransport } from "./adapters/telegram.js";
import { YtDlpExtractor } from "./adapters/ytdlp.js";
import { loadConfig, type AppConfig } from "./config/index.js";
import { DeliveryAdapter } from "./core/delivery.js";
import { FetchOrchestrator } from "./core/orchestrator.js";
import { RateGate } from "./core/rate-gate.js";
import { CommandRouter } from "./core/router.js";
import { SingleFlightGuard } from "./core/single-flight.js";
import { describeError } from "./errors.js";
import { HealthServer } from "./health.js";
import { TempJanitor } from "./janitor.js";
import { logger } from "./logger.js";
import { InMemoryStatsRepo } from "./state/stats.js";
import type {
  ChatTransport,
  MediaExtractor,
  MediaInspector,
  StatsRepo,
  Transcoder,
} from "./types.js";
import { ensureDir } from "./utils/fs.js";

interface ServiceDeps {
  config: AppConfig;
  transport: ChatTransport;
  extractor: MediaExtractor;
  inspector: MediaInspector;
  transcoder: Transcoder;
  stats?: StatsRepo;
}

export interface BotServices {
  router: CommandRouter;
  orchestrator: FetchOrchestrator;
  delivery: DeliveryAdapter;
  stats: StatsRepo;
}

export function createServices(deps: ServiceDeps): BotServices {
  const { config } = deps;
  const stats = deps.stats ?? new InMemoryStatsRepo();

  const orchestrator = new FetchOrchestrator({
    config,
    rateGate: new RateGate({
      maxRequests: config.rateLimitRequests,
      windowMs: config.rateLimitWindowMs,
    }),
    guard: new SingleFlightGuard(),
    extractor: deps.extractor,
    inspector: deps.inspector,
    transcoder: deps.transcoder,
    stats,
  });
  const delivery = new DeliveryAdapter({ transport: deps.transport, limits: config });
  const router = new CommandRouter({
    transport: deps.transport,
    fetcher: orchestrator,
    delivery,
    stats,
    limits: config,
    qualitySelection: config.qualitySelection,
  });

  return { router, orchestrator, delivery, stats };
}

export async function runBot(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const extractor = new YtDlpExtractor({
    binaryPath: config.ytdlpPath,
    killGraceMs: config.processKillGraceMs,
  });
  const transcoder = new FfmpegTranscoder({
    binaryPath: config.ffmpegPath,
    killGraceMs: config.processKillGraceMs,
  });

  const ytdlpVersion = await extractor.version();
  logger.info({ ytdlpVersion }, "yt-dlp available");
  try {
    const ffmpegVersion = await transcoder.version();
    logger.info({ ffmpegVersion }, "ffmpeg available");
  } catch (error) {
    logger.warn(
      { error: describeError(error) },
      "ffmpeg unavailable, oversized media will be rejected instead of compressed",
    );
  }

  await ensureDir(config.downloadTmpDir);

  const transport = new TelegramBotTransport({
    apiId: config.telegramApiId,
    apiHash: config.telegramApiHash,
    botToken: config.botToken,
    stringSession: config.telegramStringSession,
  });
  const { router, orchestrator, delivery } = createServices({
    config,
    transport,
    extractor,
    inspector: extractor,
    transcoder,
  });

  const janitor = new TempJanitor({
    dir: config.downloadTmpDir,
    maxAgeMs: config.tempMaxAgeMs,
    intervalMs: config.tempCleanupIntervalMs,
    inUse: () => [...orchestrator.activeJobIds, ...delivery.filesInFlight],
  });
  await janitor.runOnce();
  janitor.start();

  const health =
    config.healthPort > 0 ? new HealthServer(orchestrator, { port: config.healthPort }) : null;
  health?.start();

  transport.onMessage((message) => router.handle(message));
  transport.onChoice((choice) => router.handleChoice(choice));
  await transport.start();

  logger.info(
    {
      tmpDir: config.downloadTmpDir,
      maxUploadBytes: config.maxUploadBytes,
      maxDownloadBytes: config.maxDownloadBytes,
      healthPort: config.healthPort,
      qualitySelection: config.qualitySelection,
    },
    "Bot started",
  );

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;

    const aborted = orchestrator.cancelAll("shutdown");
    logger.info({ signal, aborted }, "Shutting down");
    janitor.stop();
    health?.stop();
    await transport.disconnect();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, "Shutdown failed");
          process.exit(1);
        });
    });
  }
}
