// Error types and Result monad for explicit error handling

export type Result<T, E = DocentError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type ProviderErrorCode =
  | "throttled"
  | "auth_failed"
  | "invalid_request"
  | "not_found"
  | "transient_network"
  | "server_error"
  | "unknown";

export class DocentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "DocentError";
  }
}

/** Startup configuration could not be read or validated. Fatal. */
export class ConfigError extends DocentError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

/** Assistant, vector store or attachment setup failed. Fatal. */
export class ProvisioningError extends DocentError {
  constructor(message: string, cause?: unknown) {
    super(message, "PROVISIONING_ERROR", cause);
    this.name = "ProvisioningError";
  }
}

/** The assistant API could not be reached or rejected a request. */
export class ProviderError extends DocentError {
  constructor(
    message: string,
    public readonly providerCode: ProviderErrorCode = "unknown",
    cause?: unknown,
    public readonly status?: number,
  ) {
    super(message, "PROVIDER_ERROR", cause);
    this.name = "ProviderError";
  }
}

/** The run stream failed before a clean end of stream. */
export class StreamReadError extends DocentError {
  constructor(message: string, cause?: unknown) {
    super(message, "STREAM_READ_ERROR", cause);
    this.name = "StreamReadError";
  }
}

/** The run stream ended without producing any text. */
export class EmptyReplyError extends DocentError {
  constructor(message = "Assistant returned an empty reply") {
    super(message, "EMPTY_REPLY");
    this.name = "EmptyReplyError";
  }
}

export class ChannelError extends DocentError {
  constructor(message: string, cause?: unknown) {
    super(message, "CHANNEL_ERROR", cause);
    this.name = "ChannelError";
  }
}

export class SessionError extends DocentError {
  constructor(message: string, cause?: unknown) {
    super(message, "SESSION_ERROR", cause);
    this.name = "SessionError";
  }
}

/** Render any thrown value as a log-friendly string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
