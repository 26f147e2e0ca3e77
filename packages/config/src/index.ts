export { DocentConfigSchema, HttpUrlSchema } from "./schema";
export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_API_URL,
  DEFAULT_MODEL,
  DEFAULT_ASSISTANT_NAME,
  DEFAULT_INSTRUCTIONS,
  DEFAULT_MAX_CONTEXT_MESSAGES,
} from "./constants";
export type { DocentConfig, DocentConfigInput, AssistantSettings } from "./types";
export { loadConfig, parseConfig, resolveConfigPath, formatIssues } from "./load";
export { redactConfig } from "./redact";
