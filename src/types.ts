export type UserId = string;

export type ChatTarget = string;

export type MediaKind = "video" | "audio" | "document";

export type ErrorKind =
  | "InvalidUrl"
  | "RateLimited"
  | "AlreadyInProgress"
  | "ExtractionFailed"
  | "TooLarge"
  | "TranscodeFailed"
  | "DeliveryFailed"
  | "Timeout"
  | "Cancelled"
  | "SelectionExpired"
  | "Internal";

export interface FetchedFile {
  path: string;
  kind: MediaKind;
  sizeBytes: number;
  title: string;
  platform: string;
  uploader: string | null;
  durationSeconds: number | null;
}

export interface FetchSuccess {
  ok: true;
  file: FetchedFile;
}

export interface FetchFailure {
  ok: false;
  kind: ErrorKind;
  detail: string;
  retryAfterMs?: number;
}

export type FetchResult = FetchSuccess | FetchFailure;

export interface DownloadProgress {
  downloadedBytes: number;
  totalBytes: number | null;
}

export type ProgressObserver = (progress: DownloadProgress) => void;

export interface ExtractParams {
  url: string;
  jobId: string;
  outputDir: string;
  maxBytes: number;
  signal: AbortSignal;
  /** Tallest video height to accept; unset means best available. */
  maxHeight?: number;
  onProgress?: ProgressObserver;
}

export interface ExtractedMedia {
  path: string;
  title: string;
  extension: string;
  extractor: string | null;
  uploader: string | null;
  durationSeconds: number | null;
}

export interface MediaExtractor {
  extract(params: ExtractParams): Promise<ExtractedMedia>;
}

export interface InspectParams {
  url: string;
  signal: AbortSignal;
}

export interface QualityOption {
  height: number;
  sizeBytes: number | null;
}

export interface MediaInfo {
  title: string;
  uploader: string | null;
  durationSeconds: number | null;
  extractor: string | null;
  qualities: QualityOption[];
}

/** Reads metadata and available qualities without downloading. */
export interface MediaInspector {
  inspect(params: InspectParams): Promise<MediaInfo>;
}

export interface CompressParams {
  inputPath: string;
  kind: MediaKind;
  targetMaxBytes: number;
  signal: AbortSignal;
}

export interface Transcoder {
  compress(params: CompressParams): Promise<string>;
}

export interface SentMessage {
  messageId: string;
}

export interface ChoiceButton {
  label: string;
  data: string;
}

export interface ChatTransport {
  sendText(target: ChatTarget, text: string): Promise<SentMessage>;
  /** Sends `text` with one inline button per choice, each on its own row. */
  sendChoices(target: ChatTarget, text: string, choices: ChoiceButton[]): Promise<SentMessage>;
  sendFile(
    target: ChatTarget,
    filePath: string,
    kind: MediaKind,
    caption: string,
  ): Promise<SentMessage>;
  editText(target: ChatTarget, messageId: string, text: string): Promise<void>;
  deleteMessage(target: ChatTarget, messageId: string): Promise<void>;
}

export interface InboundMessage {
  senderId: UserId;
  chatTarget: ChatTarget;
  text: string;
  messageId?: string;
}

/** A pressed inline button. */
export interface InboundChoice {
  senderId: UserId;
  chatTarget: ChatTarget;
  messageId: string;
  data: string;
}

export interface UserStats {
  userId: UserId;
  downloads: number;
  failures: number;
  totalBytes: number;
  platforms: Record<string, number>;
  firstSeenAt: string;
  lastSeenAt: string;
}

export interface StatsRepo {
  get(userId: UserId): UserStats;
  recordSuccess(userId: UserId, platform: string, sizeBytes: number): void;
  recordFailure(userId: UserId): void;
}
