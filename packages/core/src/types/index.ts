// Barrel export — the public type surface of @docent/core types

export type { Turn, TurnRole } from "./message";
export { userTurn, assistantTurn } from "./message";

export type {
  Channel,
  ChannelMessage,
  ChannelMessageHandler,
} from "./channel";

export type { Session, SessionRegistry } from "./session";

export type { Lifecycle, LifecycleStatus } from "./lifecycle";

export type { Logger, LogLevel, LogSink } from "./logger";
export { ConsoleLogger, LOG_LEVELS, isLogLevel } from "./logger";

export {
  DocentError,
  ConfigError,
  ProvisioningError,
  ProviderError,
  StreamReadError,
  EmptyReplyError,
  ChannelError,
  SessionError,
  errorMessage,
  ok,
  err,
} from "./errors";
export type { Result, ProviderErrorCode } from "./errors";
