import { z } from "zod";

import { ConfigError } from "../errors.js";

const MIB = 1024 * 1024;

const PLACEHOLDER_BOT_TOKEN = "your_bot_token_here";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
  .transform((value) => ["true", "1", "yes", "on"].includes(value));

const botEnvSchema = z.object({
  BOT_TOKEN: z
    .string({ required_error: "BOT_TOKEN is required" })
    .trim()
    .min(1, "BOT_TOKEN is required")
    .refine((value) => value !== PLACEHOLDER_BOT_TOKEN, {
      message: "BOT_TOKEN still holds the placeholder value",
    }),
  TELEGRAM_API_ID: z.coerce.number().int().positive(),
  TELEGRAM_API_HASH: z.string().min(10),
  TELEGRAM_STRING_SESSION: z.string().default(""),
  DOWNLOAD_TMP_DIR: z.string().default("./temp"),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(5),
  RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60),
  MAX_UPLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(50 * MIB),
  MAX_DOWNLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(500 * MIB),
  OPERATION_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  PROCESS_KILL_GRACE_SECONDS: z.coerce.number().int().positive().default(2),
  QUALITY_SELECTION: booleanFlag.default("true"),
  SELECTION_TTL_SECONDS: z.coerce.number().int().positive().default(600),
  YTDLP_PATH: z.string().min(1).default("yt-dlp"),
  FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
  TEMP_MAX_AGE_MINUTES: z.coerce.number().int().positive().default(60),
  TEMP_CLEANUP_INTERVAL_SECONDS: z.coerce.number().int().positive().default(3600),
  HEALTH_PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

const toolsEnvSchema = botEnvSchema.pick({
  YTDLP_PATH: true,
  FFMPEG_PATH: true,
});

const tempEnvSchema = botEnvSchema.pick({
  DOWNLOAD_TMP_DIR: true,
  TEMP_MAX_AGE_MINUTES: true,
});

export interface AppConfig {
  botToken: string;
  telegramApiId: number;
  telegramApiHash: string;
  telegramStringSession: string;
  downloadTmpDir: string;
  rateLimitRequests: number;
  rateLimitWindowMs: number;
  maxUploadBytes: number;
  maxDownloadBytes: number;
  operationTimeoutMs: number;
  processKillGraceMs: number;
  qualitySelection: boolean;
  selectionTtlMs: number;
  ytdlpPath: string;
  ffmpegPath: string;
  tempMaxAgeMs: number;
  tempCleanupIntervalMs: number;
  healthPort: number;
  logLevel: string;
}

export interface ToolsConfig {
  ytdlpPath: string;
  ffmpegPath: string;
}

export interface TempConfig {
  downloadTmpDir: string;
  tempMaxAgeMs: number;
}

function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  environment: NodeJS.ProcessEnv,
): z.infer<T> {
  const result = schema.safeParse(environment);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  return result.data;
}

export function loadConfig(environment: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseOrThrow(botEnvSchema, environment);

  return {
    botToken: parsed.BOT_TOKEN,
    telegramApiId: parsed.TELEGRAM_API_ID,
    telegramApiHash: parsed.TELEGRAM_API_HASH,
    telegramStringSession: parsed.TELEGRAM_STRING_SESSION,
    downloadTmpDir: parsed.DOWNLOAD_TMP_DIR,
    rateLimitRequests: parsed.RATE_LIMIT_REQUESTS,
    rateLimitWindowMs: parsed.RATE_LIMIT_WINDOW_SECONDS * 1000,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    maxDownloadBytes: parsed.MAX_DOWNLOAD_BYTES,
    operationTimeoutMs: parsed.OPERATION_TIMEOUT_SECONDS * 1000,
    processKillGraceMs: parsed.PROCESS_KILL_GRACE_SECONDS * 1000,
    qualitySelection: parsed.QUALITY_SELECTION,
    selectionTtlMs: parsed.SELECTION_TTL_SECONDS * 1000,
    ytdlpPath: parsed.YTDLP_PATH,
    ffmpegPath: parsed.FFMPEG_PATH,
    tempMaxAgeMs: parsed.TEMP_MAX_AGE_MINUTES * 60 * 1000,
    tempCleanupIntervalMs: parsed.TEMP_CLEANUP_INTERVAL_SECONDS * 1000,
    healthPort: parsed.HEALTH_PORT,
    logLevel: parsed.LOG_LEVEL,
  };
}

export function loadToolsConfig(
  environment: NodeJS.ProcessEnv = process.env,
): ToolsConfig {
  const parsed = parseOrThrow(toolsEnvSchema, environment);

  return {
    ytdlpPath: parsed.YTDLP_PATH,
    ffmpegPath: parsed.FFMPEG_PATH,
  };
}

export function loadTempConfig(
  environment: NodeJS.ProcessEnv = process.env,
): TempConfig {
  const parsed = parseOrThrow(tempEnvSchema, environment);

  return {
    downloadTmpDir: parsed.DOWNLOAD_TMP_DIR,
    tempMaxAgeMs: parsed.TEMP_MAX_AGE_MINUTES * 60 * 1000,
  };
}
