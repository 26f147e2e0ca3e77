export {
  AssistantsClient,
  normalizeBaseUrl,
  type AssistantsClientConfig,
  type AssistantSpec,
  type RunClient,
  type ProvisioningClient,
  type RunRequest,
} from "./client";
export {
  decodeRunStream,
  parseEventLine,
  toRunStreamEvent,
  type RunStreamEvent,
  type ParsedLine,
} from "./sse";
export { classifyError, classifyStatus } from "./errors";
export type { WireMessage, WireRunCreate, WireAssistantCreate, WireToolDef } from "./wire";
