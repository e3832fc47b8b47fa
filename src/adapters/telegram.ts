import { Api, TelegramClient as GramClient } from "telegram";
import type { EntityLike } from "telegram/define.js";
import { CallbackQuery, type CallbackQueryEvent } from "telegram/events/CallbackQuery.js";
import { NewMessage, type NewMessageEvent } from "telegram/events/index.js";
import { LogLevel } from "telegram/extensions/Logger.js";
import { StringSession } from "telegram/sessions/index.js";
import { Button } from "telegram/tl/custom/button.js";

import { DeliveryError } from "../errors.js";
import { logger } from "../logger.js";
import type {
  ChatTarget,
  ChatTransport,
  ChoiceButton,
  InboundChoice,
  InboundMessage,
  MediaKind,
  SentMessage,
} from "../types.js";
import { withRetry } from "../utils/retry.js";

interface TelegramBotTransportOptions {
  apiId: number;
  apiHash: string;
  botToken: string;
  stringSession: string;
  maxCachedPeers?: number;
}

interface IdLike {
  toString(): string;
}

export interface RawInboundFields {
  message: string;
  id: number;
  out?: boolean;
  senderId?: IdLike;
  chatId?: IdLike;
}

export interface RawChoiceFields {
  data?: Buffer;
  messageId: number;
  senderId?: IdLike;
  chatId?: IdLike;
}

export type InboundHandler = (message: InboundMessage) => Promise<void>;

export type ChoiceHandler = (choice: InboundChoice) => Promise<void>;

const DEFAULT_MAX_CACHED_PEERS = 5000;
const PARSE_MODE = "md";

export function normalizeInbound(fields: RawInboundFields): InboundMessage | null {
  if (fields.out || !fields.senderId || !fields.chatId) {
    return null;
  }

  const text = fields.message.trim();
  if (!text) {
    return null;
  }

  return {
    senderId: fields.senderId.toString(),
    chatTarget: fields.chatId.toString(),
    text,
    messageId: String(fields.id),
  };
}

export function normalizeChoice(fields: RawChoiceFields): InboundChoice | null {
  if (!fields.data || !fields.senderId || !fields.chatId) {
    return null;
  }

  return {
    senderId: fields.senderId.toString(),
    chatTarget: fields.chatId.toString(),
    messageId: String(fields.messageId),
    data: fields.data.toString("utf8"),
  };
}

export class TelegramBotTransport implements ChatTransport {
  private readonly client: GramClient;
  private readonly peers = new Map<ChatTarget, EntityLike>();
  private readonly maxCachedPeers: number;
  private connected = false;

  constructor(private readonly options: TelegramBotTransportOptions) {
    this.client = new GramClient(
      new StringSession(options.stringSession),
      options.apiId,
      options.apiHash,
      {
        connectionRetries: 5,
      },
    );
    this.client.setLogLevel(LogLevel.WARN);
    this.maxCachedPeers = options.maxCachedPeers ?? DEFAULT_MAX_CACHED_PEERS;
  }

  async start(): Promise<void> {
    if (this.connected) {
      return;
    }

    await withRetry(
      () => this.client.start({ botAuthToken: this.options.botToken }),
      {
        retries: 3,
        baseDelayMs: 2000,
        factor: 2,
        maxDelayMs: 10_000,
        onRetry: (error, attempt, delayMs) => {
          logger.warn({ err: error, attempt, delayMs }, "Telegram login failed, retrying");
        },
      },
    );
    this.connected = true;
    logger.info("Telegram bot connected");
  }

  onMessage(handler: InboundHandler): void {
    this.client.addEventHandler((event: NewMessageEvent) => {
      this.handleEvent(event, handler).catch((error: unknown) => {
        logger.error({ err: error }, "Inbound message handling failed");
      });
    }, new NewMessage({ incoming: true }));
  }

  onChoice(handler: ChoiceHandler): void {
    this.client.addEventHandler((event: CallbackQueryEvent) => {
      this.handleChoiceEvent(event, handler).catch((error: unknown) => {
        logger.error({ err: error }, "Button press handling failed");
      });
    }, new CallbackQuery({}));
  }

  async sendText(target: ChatTarget, text: string): Promise<SentMessage> {
    const sent = await this.client.sendMessage(this.peerFor(target), {
      message: text,
      parseMode: PARSE_MODE,
    });
    return { messageId: String(sent.id) };
  }

  async sendChoices(
    target: ChatTarget,
    text: string,
    choices: ChoiceButton[],
  ): Promise<SentMessage> {
    const sent = await this.client.sendMessage(this.peerFor(target), {
      message: text,
      parseMode: PARSE_MODE,
      buttons: choices.map((choice) => [Button.inline(choice.label, Buffer.from(choice.data))]),
    });
    return { messageId: String(sent.id) };
  }

  async sendFile(
    target: ChatTarget,
    filePath: string,
    kind: MediaKind,
    caption: string,
  ): Promise<SentMessage> {
    const sent = await this.client.sendFile(this.peerFor(target), {
      file: filePath,
      caption,
      parseMode: PARSE_MODE,
      forceDocument: kind === "document",
      supportsStreaming: kind === "video",
    });

    logger.debug({ target, filePath, kind, messageId: sent.id }, "Uploaded file to Telegram");
    return { messageId: String(sent.id) };
  }

  async editText(target: ChatTarget, messageId: string, text: string): Promise<void> {
    await this.client.editMessage(this.peerFor(target), {
      message: Number(messageId),
      text,
      parseMode: PARSE_MODE,
    });
  }

  async deleteMessage(target: ChatTarget, messageId: string): Promise<void> {
    await this.client.deleteMessages(this.peerFor(target), [Number(messageId)], {
      revoke: true,
    });
  }

  async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }

    await this.client.disconnect();
    this.connected = false;
    this.peers.clear();
  }

  private async handleEvent(event: NewMessageEvent, handler: InboundHandler): Promise<void> {
    const inbound = normalizeInbound(event.message);
    if (!inbound) {
      return;
    }

    const peer = await event.message.getInputChat();
    if (peer) {
      this.rememberPeer(inbound.chatTarget, peer);
    }

    await handler(inbound);
  }

  private async handleChoiceEvent(
    event: CallbackQueryEvent,
    handler: ChoiceHandler,
  ): Promise<void> {
    await event.answer();

    const choice = normalizeChoice({
      data: event.data,
      messageId: event.messageId,
      senderId: event.senderId,
      chatId: event.chatId,
    });
    if (!choice) {
      return;
    }

    const peer = await event.getInputChat();
    if (peer) {
      this.rememberPeer(choice.chatTarget, peer);
    }

    await handler(choice);
  }

  private rememberPeer(target: ChatTarget, peer: EntityLike): void {
    this.peers.delete(target);
    this.peers.set(target, peer);

    if (this.peers.size > this.maxCachedPeers) {
      const oldest = this.peers.keys().next();
      if (!oldest.done) {
        this.peers.delete(oldest.value);
      }
    }
  }

  private peerFor(target: ChatTarget): EntityLike {
    const peer = this.peers.get(target);
    if (!peer) {
      throw new DeliveryError(`No known Telegram peer for chat ${target}`);
    }
    return peer;
  }
}
