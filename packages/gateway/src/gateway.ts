// Gateway: composition root that wires all dependencies and manages lifecycle

import {
  ConsoleLogger,
  SessionStore,
  errorMessage,
  type Channel,
  type Lifecycle,
  type LifecycleStatus,
  type Logger,
} from "@docent/core";
import { redactConfig, type DocentConfig } from "@docent/config";
import {
  AssistantsClient,
  type ProvisioningClient,
  type RunClient,
} from "@docent/provider-assistants";
import { TelegramChannel } from "@docent/channel-telegram";
import { Dispatcher } from "./dispatcher";
import { Orchestrator } from "./orchestrator";
import { provision, type ProvisionedAssistant } from "./provisioning";

export interface GatewayDeps {
  readonly config: DocentConfig;
  readonly logger: Logger;
  readonly client: RunClient & ProvisioningClient;
  readonly channel: Channel;
}

export class Gateway implements Lifecycle {
  private _status: LifecycleStatus = "stopped";
  private dispatcher: Dispatcher | null = null;
  private _assistant: ProvisionedAssistant | null = null;

  readonly deps: GatewayDeps;

  constructor(deps: GatewayDeps) {
    this.deps = deps;
  }

  get status(): LifecycleStatus {
    return this._status;
  }

  /** Set once start() has provisioned the assistant. */
  get assistant(): ProvisionedAssistant | null {
    return this._assistant;
  }

  /** Replies still being produced. */
  get inFlight(): number {
    return this.dispatcher?.inFlight ?? 0;
  }

  /**
   * Authorize the channel, provision the assistant, then start receiving.
   * Throws ChannelError or ProvisioningError when startup cannot complete.
   */
  async start(): Promise<void> {
    if (this._status === "running" || this._status === "starting") return;
    this._status = "starting";

    const { config, logger, client, channel } = this.deps;
    logger.info("Starting gateway", { config: redactConfig(config) });

    let assistant: ProvisionedAssistant;
    try {
      await channel.authorize();
      assistant = await provision(client, config, logger);
    } catch (error) {
      this._status = "stopped";
      throw error;
    }
    this._assistant = assistant;

    const orchestrator = new Orchestrator({
      sessions: new SessionStore(config.maxContextMessages),
      client,
      channel,
      assistant,
      logger,
      temperature: config.temperature,
      topP: config.topP,
    });
    const dispatcher = new Dispatcher(orchestrator, logger, {
      maxConcurrentRuns: config.maxConcurrentRuns,
    });
    this.dispatcher = dispatcher;

    channel.onMessage(async (msg) => {
      await dispatcher.dispatch(msg);
    });

    try {
      await channel.start();
    } catch (error) {
      this._status = "stopped";
      throw error;
    }

    this._status = "running";
    logger.info("Gateway started", { channel: channel.name });
  }

  /** Stop receiving, then wait for replies already in progress. */
  async stop(): Promise<void> {
    if (this._status === "stopped" || this._status === "stopping") return;
    this._status = "stopping";

    const { logger, channel } = this.deps;
    try {
      await channel.stop();
    } catch (error) {
      logger.error("Failed to stop channel", {
        channel: channel.name,
        error: errorMessage(error),
      });
    }

    if (this.dispatcher) {
      logger.info("Waiting for in-flight replies", { count: this.dispatcher.inFlight });
      await this.dispatcher.drain();
    }

    this._status = "stopped";
    logger.info("Gateway stopped");
  }
}

/**
 * Build the production gateway from a validated config. Any dependency can
 * be replaced, which is how the tests run it without network access.
 */
export function createGateway(
  config: DocentConfig,
  overrides?: Partial<Omit<GatewayDeps, "config">>,
): Gateway {
  const logger = overrides?.logger ?? new ConsoleLogger(config.logLevel);

  const client =
    overrides?.client ??
    new AssistantsClient({ baseUrl: config.apiUrl, apiKey: config.apiKey, logger });

  const channel =
    overrides?.channel ??
    new TelegramChannel({ token: config.telegramBotToken, logger });

  return new Gateway({ config, logger, client, channel });
}
