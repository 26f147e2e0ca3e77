// Run stream decoder for Assistants API server-sent events.
//
// A run streams `event: <name>` / `data: <json>` pairs. Only data lines
// matter: message deltas carry text fragments, everything else is logged
// or ignored. Reading stops at `data: [DONE]` or at end of stream; a
// completed message in the middle of the stream does not stop it.

import {
  EmptyReplyError,
  StreamReadError,
  errorMessage,
  type Logger,
} from "@docent/core";
import {
  MESSAGE_COMPLETED,
  MESSAGE_DELTA,
  WireEventSchema,
  WireMessageDeltaSchema,
  WireTextPartSchema,
} from "./wire";

const DATA_PREFIX = "data: ";
const DONE_TOKEN = "[DONE]";

export type RunStreamEvent =
  | { readonly kind: "delta"; readonly fragments: string[] }
  | { readonly kind: "completed" }
  | { readonly kind: "other"; readonly object: string | null };

export type ParsedLine =
  | { readonly type: "skip" }
  | { readonly type: "done" }
  | { readonly type: "malformed"; readonly error: string }
  | { readonly type: "event"; readonly event: RunStreamEvent };

/** Classify an already-parsed JSON payload. Shape mismatches become "other". */
export function toRunStreamEvent(payload: unknown): RunStreamEvent {
  const base = WireEventSchema.safeParse(payload);
  if (!base.success) {
    return { kind: "other", object: null };
  }

  if (base.data.object === MESSAGE_COMPLETED) {
    return { kind: "completed" };
  }

  if (base.data.object === MESSAGE_DELTA) {
    const delta = WireMessageDeltaSchema.safeParse(payload);
    if (!delta.success) {
      return { kind: "other", object: MESSAGE_DELTA };
    }
    const fragments: string[] = [];
    for (const part of delta.data.delta.content) {
      const text = WireTextPartSchema.safeParse(part);
      if (text.success) fragments.push(text.data.text.value);
    }
    return { kind: "delta", fragments };
  }

  return { kind: "other", object: base.data.object };
}

/** Parse one SSE line. The line may still carry its trailing "\r". */
export function parseEventLine(line: string): ParsedLine {
  const trimmed = line.trim();
  if (!trimmed || !trimmed.startsWith(DATA_PREFIX)) return { type: "skip" };

  const data = trimmed.slice(DATA_PREFIX.length);
  if (data === DONE_TOKEN) return { type: "done" };

  let payload: unknown;
  try {
    payload = JSON.parse(data);
  } catch (error) {
    return { type: "malformed", error: errorMessage(error) };
  }
  return { type: "event", event: toRunStreamEvent(payload) };
}

/**
 * Read a run stream to the end and return the assistant's full reply.
 *
 * Throws EmptyReplyError when no text arrived and StreamReadError when the
 * stream fails. The stream is cancelled and its reader released on every
 * exit path.
 */
export async function decodeRunStream(
  body: ReadableStream<Uint8Array>,
  logger: Logger,
): Promise<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let reply = "";
  let terminated = false;

  // Returns true once the termination token has been seen
  const consume = (line: string): boolean => {
    const parsed = parseEventLine(line);
    switch (parsed.type) {
      case "done":
        logger.debug("Run stream finished");
        return true;
      case "malformed":
        logger.warn("Skipping malformed run stream event", { error: parsed.error });
        return false;
      case "event":
        if (parsed.event.kind === "delta") {
          reply += parsed.event.fragments.join("");
        } else if (parsed.event.kind === "completed") {
          logger.debug("Assistant message completed");
        }
        return false;
      case "skip":
        return false;
    }
  };

  try {
    while (!terminated) {
      let chunk: { done: boolean; value?: Uint8Array };
      try {
        chunk = await reader.read();
      } catch (cause) {
        throw new StreamReadError(`Failed to read run stream: ${errorMessage(cause)}`, cause);
      }

      if (chunk.done) {
        buffer += decoder.decode();
        // A final line without a newline still counts
        if (buffer) terminated = consume(buffer);
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (consume(line)) {
          terminated = true;
          break;
        }
      }
    }
  } finally {
    try {
      await reader.cancel();
    } catch (cause) {
      logger.debug("Run stream cancel failed", { error: errorMessage(cause) });
    }
    reader.releaseLock();
  }

  logger.debug("Assembled assistant reply", { length: reply.length });

  if (reply === "") {
    throw new EmptyReplyError();
  }
  return reply;
}
