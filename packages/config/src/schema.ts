import { z } from "zod";
import { LOG_LEVELS } from "@docent/core";
import {
  DEFAULT_API_URL,
  DEFAULT_ASSISTANT_NAME,
  DEFAULT_INSTRUCTIONS,
  DEFAULT_MAX_CONTEXT_MESSAGES,
  DEFAULT_MODEL,
} from "./constants";

export const HttpUrlSchema = z
  .string()
  .refine((value) => {
    try {
      const url = new URL(value);
      return url.protocol === "http:" || url.protocol === "https:";
    } catch {
      return false;
    }
  }, "Invalid URL (expected http:// or https://)");

const SecretSchema = z.string().trim().min(1, "Required");

/** Absent, null, zero or negative falls back to the default window. */
const MaxContextMessagesSchema = z
  .number()
  .int()
  .nullish()
  .transform((value) => (value != null && value > 0 ? value : DEFAULT_MAX_CONTEXT_MESSAGES));

/**
 * Shape of config.yaml. Keys are snake_case in the file and come out
 * camelCase after parsing.
 */
export const DocentConfigSchema = z
  .object({
    api_url: HttpUrlSchema.default(DEFAULT_API_URL),
    api_key: SecretSchema,
    telegram_bot_token: SecretSchema,
    files_path: z.string().min(1).default("docs"),
    name: z.string().min(1).default(DEFAULT_ASSISTANT_NAME),
    instructions: z.string().default(DEFAULT_INSTRUCTIONS),
    model: z.string().min(1).default(DEFAULT_MODEL),
    tools: z.array(z.string().min(1)).default(["file_search"]),
    max_context_messages: MaxContextMessagesSchema,
    temperature: z.number().min(0).max(2).default(1),
    top_p: z.number().min(0).max(1).default(1),
    max_concurrent_runs: z.number().int().min(0).default(0),
    log_level: z.enum(LOG_LEVELS).default("info"),
  })
  .transform((raw) => ({
    apiUrl: raw.api_url,
    apiKey: raw.api_key,
    telegramBotToken: raw.telegram_bot_token,
    filesPath: raw.files_path,
    assistant: {
      name: raw.name,
      instructions: raw.instructions,
      model: raw.model,
      tools: raw.tools,
    },
    maxContextMessages: raw.max_context_messages,
    temperature: raw.temperature,
    topP: raw.top_p,
    maxConcurrentRuns: raw.max_concurrent_runs,
    logLevel: raw.log_level,
  }));
