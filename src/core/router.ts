import { logger } from "../logger.js";
import type {
  ChatTarget,
  ChatTransport,
  ChoiceButton,
  FetchFailure,
  FetchResult,
  InboundChoice,
  InboundMessage,
  StatsRepo,
  UserId,
} from "../types.js";
import type { DeliveryAdapter } from "./delivery.js";
import {
  ANALYZING_MESSAGE,
  BEST_QUALITY_LABEL,
  downloadStartMessage,
  helpMessage,
  INVALID_SELECTION_MESSAGE,
  PROCESSING_MESSAGE,
  progressMessage,
  qualityLabel,
  selectionMessage,
  startMessage,
  statsMessage,
  USAGE_HINT,
  type MessageLimits,
} from "./messages.js";
import type { FetchHooks, InspectResult, QualitySelection } from "./orchestrator.js";

export interface Fetcher {
  fetch(userId: UserId, url: string, hooks?: FetchHooks): Promise<FetchResult>;
  inspect(
    userId: UserId,
    url: string,
    hooks?: Pick<FetchHooks, "onAccepted">,
  ): Promise<InspectResult>;
  fetchSelected(
    userId: UserId,
    requestId: string,
    maxHeight: number | null,
    hooks?: FetchHooks,
  ): Promise<FetchResult>;
}

interface CommandRouterDeps {
  transport: ChatTransport;
  fetcher: Fetcher;
  delivery: DeliveryAdapter;
  stats: StatsRepo;
  limits: MessageLimits;
  /** Offer a quality keyboard before downloading. */
  qualitySelection: boolean;
}

export interface QualityChoice {
  requestId: string;
  maxHeight: number | null;
}

const URL_PATTERN = /https?:\/\/[^\s<>"']+/i;
const TRAILING_PUNCTUATION = /[.,!?;:]+$/;
const CHOICE_PATTERN = /^q:([0-9a-f]+):(best|\d+)$/;

const INTERNAL_FAILURE: FetchFailure = {
  ok: false,
  kind: "Internal",
  detail: "unhandled error at dispatch boundary",
};

export function parseCommand(text: string): string | null {
  const matched = text.trim().match(/^\/([a-z0-9_]+)(?:@\w+)?(?:\s|$)/i);
  return matched?.[1]?.toLowerCase() ?? null;
}

export function extractUrl(text: string): string | null {
  const matched = text.match(URL_PATTERN);
  if (!matched) {
    return null;
  }

  let url = matched[0].replace(TRAILING_PUNCTUATION, "");
  while (hasUnbalancedClose(url)) {
    url = url.slice(0, -1).replace(TRAILING_PUNCTUATION, "");
  }
  return url;
}

function hasUnbalancedClose(url: string): boolean {
  return url.endsWith(")") && url.split(")").length > url.split("(").length;
}

export function choiceData(requestId: string, maxHeight: number | null): string {
  return `q:${requestId}:${maxHeight ?? "best"}`;
}

export function parseChoice(data: string): QualityChoice | null {
  const matched = data.match(CHOICE_PATTERN);
  if (!matched?.[1] || !matched[2]) {
    return null;
  }

  const height = matched[2] === "best" ? null : Number.parseInt(matched[2], 10);
  if (height !== null && height <= 0) {
    return null;
  }
  return { requestId: matched[1], maxHeight: height };
}

function choicesFor(selection: QualitySelection): ChoiceButton[] {
  return [
    ...selection.info.qualities.map((option) => ({
      label: qualityLabel(option),
      data: choiceData(selection.requestId, option.height),
    })),
    { label: BEST_QUALITY_LABEL, data: choiceData(selection.requestId, null) },
  ];
}

/**
 * Status message that is created lazily, edited in order, then removed. An
 * adopted message is only removed once it has been edited.
 */
class StatusMessage {
  private chain: Promise<void> = Promise.resolve();
  private messageId: string | null = null;

  constructor(
    private readonly transport: ChatTransport,
    private readonly target: ChatTarget,
    private readonly adoptedId: string | null = null,
  ) {}

  show(text: string): void {
    if (!this.messageId && this.adoptedId) {
      this.messageId = this.adoptedId;
    }

    this.chain = this.chain
      .then(async () => {
        if (this.messageId) {
          await this.transport.editText(this.target, this.messageId, text);
          return;
        }
        const sent = await this.transport.sendText(this.target, text);
        this.messageId = sent.messageId;
      })
      .catch((error: unknown) => {
        logger.debug({ err: error, target: this.target }, "Status message update failed");
      });
  }

  async clear(): Promise<void> {
    await this.chain;
    if (!this.messageId) {
      return;
    }

    const messageId = this.messageId;
    this.messageId = null;
    try {
      await this.transport.deleteMessage(this.target, messageId);
    } catch (error) {
      logger.debug({ err: error, target: this.target }, "Status message delete failed");
    }
  }
}

export class CommandRouter {
  constructor(private readonly deps: CommandRouterDeps) {}

  /** Dispatch boundary: nothing thrown below this point escapes. */
  async handle(message: InboundMessage): Promise<void> {
    try {
      await this.dispatch(message);
    } catch (error) {
      logger.error(
        { err: error, senderId: message.senderId, chatTarget: message.chatTarget },
        "Unhandled error while handling message",
      );
      await this.deps.delivery.sendFailure(message.chatTarget, INTERNAL_FAILURE);
    }
  }

  /** Dispatch boundary for pressed quality buttons. */
  async handleChoice(choice: InboundChoice): Promise<void> {
    try {
      await this.dispatchChoice(choice);
    } catch (error) {
      logger.error(
        { err: error, senderId: choice.senderId, chatTarget: choice.chatTarget },
        "Unhandled error while handling choice",
      );
      await this.deps.delivery.sendFailure(choice.chatTarget, INTERNAL_FAILURE);
    }
  }

  private async dispatchChoice(choice: InboundChoice): Promise<void> {
    const parsed = parseChoice(choice.data);
    if (!parsed) {
      await this.deps.transport.sendText(choice.chatTarget, INVALID_SELECTION_MESSAGE);
      return;
    }

    const quality = parsed.maxHeight === null ? BEST_QUALITY_LABEL : `${parsed.maxHeight}p`;
    logger.debug({ senderId: choice.senderId, ...parsed }, "Quality chosen");
    await this.download(
      choice.chatTarget,
      downloadStartMessage(quality),
      choice.messageId,
      (hooks) =>
        this.deps.fetcher.fetchSelected(choice.senderId, parsed.requestId, parsed.maxHeight, hooks),
    );
  }

  private async dispatch(message: InboundMessage): Promise<void> {
    const { transport, limits } = this.deps;
    const text = message.text.trim();
    const command = parseCommand(text);

    if (command) {
      logger.debug({ senderId: message.senderId, command }, "Command received");
      switch (command) {
        case "start":
          await transport.sendText(message.chatTarget, startMessage(limits));
          return;
        case "help":
          await transport.sendText(message.chatTarget, helpMessage(limits));
          return;
        case "stats":
          await transport.sendText(
            message.chatTarget,
            statsMessage(this.deps.stats.get(message.senderId)),
          );
          return;
        default:
          await transport.sendText(message.chatTarget, USAGE_HINT);
          return;
      }
    }

    const url = extractUrl(text);
    if (!url) {
      await transport.sendText(message.chatTarget, USAGE_HINT);
      return;
    }

    await this.handleUrl(message, url);
  }

  private async handleUrl(message: InboundMessage, url: string): Promise<void> {
    const { fetcher, transport } = this.deps;
    const userId = message.senderId;

    if (!this.deps.qualitySelection) {
      await this.download(message.chatTarget, PROCESSING_MESSAGE, null, (hooks) =>
        fetcher.fetch(userId, url, hooks),
      );
      return;
    }

    const status = new StatusMessage(transport, message.chatTarget);
    let inspected: InspectResult;
    try {
      inspected = await fetcher.inspect(userId, url, {
        onAccepted: () => status.show(ANALYZING_MESSAGE),
      });
    } finally {
      await status.clear();
    }

    if (!inspected.ok) {
      await this.deps.delivery.sendFailure(message.chatTarget, inspected);
      return;
    }

    const { selection } = inspected;
    if (selection.info.qualities.length <= 1) {
      await this.download(message.chatTarget, PROCESSING_MESSAGE, null, (hooks) =>
        fetcher.fetchSelected(userId, selection.requestId, null, hooks),
      );
      return;
    }

    await transport.sendChoices(
      message.chatTarget,
      selectionMessage(selection.info, selection.platform),
      choicesFor(selection),
    );
  }

  private async download(
    target: ChatTarget,
    acceptedText: string,
    statusMessageId: string | null,
    run: (hooks: FetchHooks) => Promise<FetchResult>,
  ): Promise<void> {
    const status = new StatusMessage(this.deps.transport, target, statusMessageId);

    let result: FetchResult;
    try {
      result = await run({
        onAccepted: () => status.show(acceptedText),
        onProgress: (percent) => status.show(progressMessage(percent)),
      });
    } finally {
      await status.clear();
    }

    await this.deps.delivery.deliver(target, result);
  }
}
