// Request orchestrator: one user message in, one reply (or notice) out

import {
  DocentError,
  EmptyReplyError,
  assistantTurn,
  errorMessage,
  userTurn,
  type Channel,
  type ChannelMessage,
  type Logger,
  type Session,
  type SessionRegistry,
} from "@docent/core";
import { decodeRunStream, type RunClient } from "@docent/provider-assistants";

export const FAILURE_NOTICE = "Sorry, I could not process your request.";
export const EMPTY_REPLY_NOTICE = "The assistant could not provide an answer.";

export type ReplyOutcome = "replied" | "failed" | "empty" | "undelivered";

export interface ProvisionedIds {
  readonly assistantId: string;
  readonly vectorStoreId: string;
}

export interface OrchestratorDeps {
  readonly sessions: SessionRegistry;
  readonly client: RunClient;
  readonly channel: Pick<Channel, "sendText">;
  readonly assistant: ProvisionedIds;
  readonly logger: Logger;
  readonly temperature?: number;
  readonly topP?: number;
}

export class Orchestrator {
  private readonly logger: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger.child({ component: "orchestrator" });
  }

  /** Run the whole exchange for one message. Never throws for remote failures. */
  async handle(msg: ChannelMessage): Promise<ReplyOutcome> {
    const session = await this.admit(msg);
    return this.reply(msg, session);
  }

  /**
   * Record the user's turn. Once this resolves the turn is part of the
   * history any later snapshot of the session sees.
   */
  async admit(msg: ChannelMessage): Promise<Session> {
    const { sessions } = this.deps;
    const session = await sessions.getOrCreate(msg.senderId);
    await sessions.appendAndTrim(session, userTurn(msg.content));
    this.logger.debug("User turn recorded", {
      userId: msg.senderId,
      requestId: msg.requestId,
      content: msg.content,
    });
    return session;
  }

  /**
   * Ask the assistant with the session's current history and deliver the
   * answer. Failures are logged and answered with a fixed notice; the
   * history is only extended on success.
   */
  async reply(msg: ChannelMessage, session: Session): Promise<ReplyOutcome> {
    const { sessions, client, assistant, temperature, topP } = this.deps;
    const log = this.logger.child({ userId: msg.senderId, requestId: msg.requestId });

    let text: string;
    try {
      const messages = await sessions.snapshot(session);
      const body = await client.createRun({
        assistantId: assistant.assistantId,
        vectorStoreId: assistant.vectorStoreId,
        messages,
        temperature,
        topP,
      });
      text = await decodeRunStream(body, log);
    } catch (error) {
      if (error instanceof EmptyReplyError) {
        log.warn("Assistant returned an empty reply");
        await this.deliver(msg, EMPTY_REPLY_NOTICE, log);
        return "empty";
      }
      log.error("Assistant run failed", {
        error: errorMessage(error),
        code: error instanceof DocentError ? error.code : undefined,
      });
      await this.deliver(msg, FAILURE_NOTICE, log);
      return "failed";
    }

    await sessions.appendAndTrim(session, assistantTurn(text));
    if (!(await this.deliver(msg, text, log))) return "undelivered";

    log.info("Reply sent", { length: text.length });
    return "replied";
  }

  private async deliver(msg: ChannelMessage, text: string, log: Logger): Promise<boolean> {
    try {
      await this.deps.channel.sendText(msg.replyTo, text);
      return true;
    } catch (error) {
      log.error("Failed to deliver reply", { replyTo: msg.replyTo, error: errorMessage(error) });
      return false;
    }
  }
}
