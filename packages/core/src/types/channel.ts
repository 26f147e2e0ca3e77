// Channel interface for messaging adapters

import type { Lifecycle } from "./lifecycle";

export interface ChannelMessage {
  readonly channelId: string;
  /** Stable identity of the sender; keys the session. */
  readonly senderId: string;
  /** Where replies to this message are delivered (e.g. a chat id). */
  readonly replyTo: string;
  readonly content: string;
  readonly requestId: string;
}

export type ChannelMessageHandler = (msg: ChannelMessage) => Promise<void>;

export interface Channel extends Lifecycle {
  readonly name: string;

  /**
   * Verify credentials with the messaging platform without receiving
   * messages yet. start() calls it too; calling it first lets startup fail
   * before other resources are set up.
   */
  authorize(): Promise<void>;

  /**
   * Called by the gateway to register a handler for incoming messages.
   * The channel awaits the handler before delivering the next message.
   */
  onMessage(handler: ChannelMessageHandler): void;

  /**
   * Send a complete text back to a destination taken from `ChannelMessage.replyTo`.
   */
  sendText(destination: string, text: string): Promise<void>;
}
