// Telegram channel via grammY (Bot API long polling)
// Implements the Channel interface — one bot token and go.

import { Bot, GrammyError, HttpError } from "grammy";
import type {
  Channel,
  ChannelMessage,
  ChannelMessageHandler,
  LifecycleStatus,
  Logger,
} from "@docent/core";
import { ChannelError, errorMessage } from "@docent/core";

/** Telegram rejects messages longer than this many characters. */
export const TELEGRAM_MESSAGE_LIMIT = 4096;

export interface TelegramChannelOptions {
  readonly token: string;
  readonly logger: Logger;
  /** Long-polling timeout in seconds. Defaults to 60. */
  readonly pollingTimeout?: number;
}

/** The fields of a Telegram message the channel reads. */
export interface TelegramTextMessage {
  readonly message_id: number;
  readonly text?: string;
  readonly from?: { readonly id: number; readonly is_bot?: boolean };
  readonly chat: { readonly id: number };
}

/**
 * Convert an incoming Telegram message into a ChannelMessage.
 * Returns null for messages the bot should not answer.
 */
export function toChannelMessage(message: TelegramTextMessage): ChannelMessage | null {
  if (!message.from || message.from.is_bot) return null;
  if (!message.text || !message.text.trim()) return null;

  return {
    channelId: "telegram",
    senderId: String(message.from.id),
    replyTo: String(message.chat.id),
    content: message.text,
    requestId: `tg-${message.chat.id}-${message.message_id}`,
  };
}

/**
 * Split text into chunks Telegram accepts, preferring to break at a newline.
 */
export function splitMessage(text: string, limit: number = TELEGRAM_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    let cut = rest.lastIndexOf("\n", limit);
    if (cut <= 0) {
      cut = limit;
      // Keep surrogate pairs together
      const code = rest.charCodeAt(cut - 1);
      if (code >= 0xd800 && code <= 0xdbff) cut--;
    }
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut).replace(/^\n/, "");
  }

  if (rest.length > 0 || chunks.length === 0) chunks.push(rest);
  return chunks;
}

/**
 * Telegram channel using grammY's built-in long polling.
 *
 * start() calls getMe first, so a bad token fails startup instead of
 * surfacing later. Updates are handled one at a time: the registered
 * handler is awaited before the next message is delivered.
 */
export class TelegramChannel implements Channel {
  readonly name = "telegram";

  readonly bot: Bot;
  private _status: LifecycleStatus = "stopped";
  private messageHandler: ChannelMessageHandler | null = null;
  private polling: Promise<void> | null = null;
  private readonly logger: Logger;
  private readonly pollingTimeout: number;

  constructor(options: TelegramChannelOptions) {
    this.bot = new Bot(options.token);
    this.logger = options.logger.child({ component: "telegram" });
    this.pollingTimeout = options.pollingTimeout ?? 60;

    this.bot.on("message:text", (ctx) => this.receive(ctx.message));
    this.bot.catch((err) => {
      this.logger.error("Error handling Telegram update", {
        updateId: err.ctx.update.update_id,
        error: errorMessage(err.error),
      });
    });
  }

  get status(): LifecycleStatus {
    return this._status;
  }

  // ── Lifecycle ──────────────────────────────────────────────────────

  async authorize(): Promise<void> {
    if (this.bot.isInited()) return;

    try {
      await this.bot.init();
    } catch (error) {
      throw new ChannelError(`Telegram authorization failed: ${describeApiError(error)}`, error);
    }
    this.logger.info("Telegram bot authorized", { username: this.bot.botInfo.username });
  }

  async start(): Promise<void> {
    if (this._status === "running" || this._status === "starting") return;
    this._status = "starting";

    try {
      await this.authorize();
    } catch (error) {
      this._status = "stopped";
      throw error;
    }

    this.polling = this.bot
      .start({
        timeout: this.pollingTimeout,
        onStart: () => {
          this._status = "running";
          this.logger.info("Telegram polling started");
        },
      })
      .catch((error: unknown) => {
        this._status = "stopped";
        this.logger.error("Telegram polling stopped with an error", { error: describeApiError(error) });
      });
  }

  async stop(): Promise<void> {
    if (this._status === "stopped" || this._status === "stopping") return;
    this._status = "stopping";

    await this.bot.stop();
    await this.polling;
    this.polling = null;

    this.logger.info("Telegram channel stopped");
    this._status = "stopped";
  }

  // ── Channel contract ───────────────────────────────────────────────

  onMessage(handler: ChannelMessageHandler): void {
    this.messageHandler = handler;
  }

  async sendText(destination: string, text: string): Promise<void> {
    for (const chunk of splitMessage(text)) {
      try {
        await this.bot.api.sendMessage(destination, chunk);
      } catch (error) {
        throw new ChannelError(`Failed to send Telegram message: ${describeApiError(error)}`, error);
      }
    }
  }

  /** Hand one incoming message to the registered handler. */
  async receive(message: TelegramTextMessage): Promise<void> {
    const channelMessage = toChannelMessage(message);
    if (!channelMessage) return;

    if (!this.messageHandler) {
      this.logger.warn("Telegram message received but no handler registered");
      return;
    }

    this.logger.info("Received message", { senderId: channelMessage.senderId });
    await this.messageHandler(channelMessage);
  }
}

function describeApiError(error: unknown): string {
  if (error instanceof GrammyError) {
    return `${error.method}: ${error.error_code} ${error.description}`;
  }
  if (error instanceof HttpError) {
    return `network error: ${errorMessage(error.error)}`;
  }
  return errorMessage(error);
}
