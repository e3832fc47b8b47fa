import path from "node:path";

import { logger } from "../logger.js";
import type {
  ChatTarget,
  ChatTransport,
  FetchFailure,
  FetchResult,
  FetchedFile,
} from "../types.js";
import { removeFileSafe } from "../utils/fs.js";
import { mediaKindFromPath } from "../utils/media.js";
import { captionFor, failureMessage, type MessageLimits } from "./messages.js";

interface DeliveryAdapterDeps {
  transport: ChatTransport;
  limits: MessageLimits;
}

export class DeliveryAdapter {
  private readonly uploading = new Set<string>();

  constructor(private readonly deps: DeliveryAdapterDeps) {}

  /** Names of temp files currently being uploaded. */
  get filesInFlight(): string[] {
    return [...this.uploading];
  }

  /** Sends the outcome to `target`. Never throws; the temp file is always removed. */
  async deliver(target: ChatTarget, result: FetchResult): Promise<void> {
    if (result.ok) {
      await this.deliverFile(target, result.file);
      return;
    }

    await this.sendFailure(target, result);
  }

  async sendFailure(target: ChatTarget, result: FetchFailure): Promise<void> {
    try {
      await this.deps.transport.sendText(target, failureMessage(result, this.deps.limits));
    } catch (error) {
      logger.error(
        { err: error, target, kind: result.kind },
        "Failed sending failure message",
      );
    }
  }

  private async deliverFile(target: ChatTarget, file: FetchedFile): Promise<void> {
    const byExtension = mediaKindFromPath(file.path);
    const kind = byExtension === "document" ? file.kind : byExtension;
    const name = path.basename(file.path);
    this.uploading.add(name);

    try {
      await this.deps.transport.sendFile(target, file.path, kind, captionFor(file));
      logger.info(
        { target, kind, sizeBytes: file.sizeBytes, platform: file.platform },
        "Delivered file",
      );
    } catch (error) {
      logger.error(
        { err: error, target, path: file.path, sizeBytes: file.sizeBytes },
        "Transport rejected file",
      );
      await this.sendFailure(target, {
        ok: false,
        kind: "DeliveryFailed",
        detail: "transport rejected the file",
      });
    } finally {
      await removeFileSafe(file.path).catch((error: unknown) => {
        logger.error({ err: error, path: file.path }, "Failed removing delivered file");
      });
      this.uploading.delete(name);
    }
  }
}
