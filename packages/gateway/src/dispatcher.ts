// Dispatcher: admits messages in arrival order and detaches the reply phase

import { Semaphore, errorMessage, type ChannelMessage, type Logger, type Session } from "@docent/core";
import type { Orchestrator } from "./orchestrator";

export interface DispatcherOptions {
  /** Upper bound on replies waiting on the assistant at once. 0 = unbounded. */
  readonly maxConcurrentRuns?: number;
}

export class Dispatcher {
  private readonly tasks = new Set<Promise<void>>();
  private readonly permits: Semaphore | null;
  private readonly logger: Logger;

  constructor(
    private readonly orchestrator: Orchestrator,
    logger: Logger,
    options: DispatcherOptions = {},
  ) {
    this.logger = logger.child({ component: "dispatcher" });
    const bound = options.maxConcurrentRuns ?? 0;
    this.permits = bound > 0 ? new Semaphore(bound) : null;
  }

  /** Replies started and not yet finished. */
  get inFlight(): number {
    return this.tasks.size;
  }

  /**
   * Record the user's turn, then hand the reply off without waiting for it.
   * Resolves once the turn is recorded.
   */
  async dispatch(msg: ChannelMessage): Promise<void> {
    if (msg.content.trim() === "") {
      this.logger.debug("Ignoring empty message", { requestId: msg.requestId });
      return;
    }

    let session: Session;
    try {
      session = await this.orchestrator.admit(msg);
    } catch (error) {
      this.logger.error("Failed to record message", {
        userId: msg.senderId,
        requestId: msg.requestId,
        error: errorMessage(error),
      });
      return;
    }

    this.track(this.replyTo(msg, session), msg);
  }

  /** Consume a message source sequentially until it ends. */
  async run(source: AsyncIterable<ChannelMessage>): Promise<void> {
    for await (const msg of source) {
      await this.dispatch(msg);
    }
  }

  /** Wait until every started reply has finished, including ones started meanwhile. */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  private async replyTo(msg: ChannelMessage, session: Session): Promise<void> {
    if (this.permits) {
      await this.permits.runExclusive(() => this.orchestrator.reply(msg, session));
    } else {
      await this.orchestrator.reply(msg, session);
    }
  }

  private track(task: Promise<void>, msg: ChannelMessage): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        this.logger.error("Reply task failed", {
          userId: msg.senderId,
          requestId: msg.requestId,
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }
}
