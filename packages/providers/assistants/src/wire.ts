// Wire types for the Assistants API v2 (snake_case).

import { z } from "zod";

export interface WireToolDef {
  type: string;
}

export interface WireMessage {
  role: "user" | "assistant";
  content: string;
}

export interface WireToolResources {
  file_search: { vector_store_ids: string[] };
}

export interface WireAssistantCreate {
  name: string;
  instructions: string;
  model: string;
  tools: WireToolDef[];
}

export interface WireRunCreate {
  assistant_id: string;
  thread: { messages: WireMessage[] };
  tool_resources: WireToolResources;
  temperature: number;
  top_p: number;
  stream: true;
}

/** Every create endpoint answers with at least an object id. */
export const WireIdResponseSchema = z.object({ id: z.string().min(1) });

// ── Run stream events ───────────────────────────────────────────────────────

export const MESSAGE_DELTA = "thread.message.delta";
export const MESSAGE_COMPLETED = "thread.message.completed";

export const WireEventSchema = z.object({ object: z.string() });

export const WireMessageDeltaSchema = z.object({
  object: z.literal(MESSAGE_DELTA),
  delta: z.object({
    // Entries are checked one by one so an odd part does not drop its siblings
    content: z.array(z.unknown()),
  }),
});

export const WireTextPartSchema = z.object({
  text: z.object({ value: z.string() }),
});
