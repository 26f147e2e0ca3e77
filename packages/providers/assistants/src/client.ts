// AssistantsClient — HTTP glue for the Assistants API v2.
//
// Handles:
//   • Base URL normalization (trailing slashes)
//   • Bearer auth and the assistants=v2 beta header
//   • Provisioning calls (assistant, vector store, file upload, attachment)
//   • Streaming run creation (the body is handed to decodeRunStream)
//   • Error normalization into ProviderError

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { ProviderError, errorMessage, type Logger, type Turn } from "@docent/core";
import { classifyError, classifyStatus } from "./errors";
import {
  WireIdResponseSchema,
  type WireAssistantCreate,
  type WireRunCreate,
  type WireToolResources,
} from "./wire";

// ── Config ───────────────────────────────────────────────────────────────────

export interface AssistantsClientConfig {
  /** e.g. https://api.openai.com/v1 — with or without a trailing slash. */
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly logger: Logger;
}

export interface AssistantSpec {
  readonly name: string;
  readonly instructions: string;
  readonly model: string;
  /** Tool type names, e.g. ["file_search"]. */
  readonly tools: readonly string[];
}

export interface RunRequest {
  readonly assistantId: string;
  readonly vectorStoreId: string;
  readonly messages: readonly Turn[];
  readonly temperature?: number;
  readonly topP?: number;
}

/** The slice of the client the request orchestrator depends on. */
export interface RunClient {
  createRun(request: RunRequest): Promise<ReadableStream<Uint8Array>>;
}

/** The startup calls that set up the assistant and its document index. */
export interface ProvisioningClient {
  createAssistant(spec: AssistantSpec): Promise<string>;
  createVectorStore(): Promise<string>;
  uploadFile(path: string): Promise<string>;
  addFileToVectorStore(vectorStoreId: string, fileId: string): Promise<void>;
  attachVectorStore(assistantId: string, vectorStoreId: string): Promise<void>;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

export function normalizeBaseUrl(raw: string): string {
  return raw.replace(/\/+$/, "");
}

function fileSearchResources(vectorStoreId: string): WireToolResources {
  return { file_search: { vector_store_ids: [vectorStoreId] } };
}

// ── Client ───────────────────────────────────────────────────────────────────

export class AssistantsClient implements RunClient, ProvisioningClient {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly logger: Logger;

  constructor(config: AssistantsClientConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.apiKey = config.apiKey;
    this.logger = config.logger.child({ component: "AssistantsClient" });
  }

  async createAssistant(spec: AssistantSpec): Promise<string> {
    const body: WireAssistantCreate = {
      name: spec.name,
      instructions: spec.instructions,
      model: spec.model,
      tools: spec.tools.map((type) => ({ type })),
    };
    const id = await this.postForId("create assistant", "assistants", JSON.stringify(body));
    this.logger.info("Assistant created", { assistantId: id });
    return id;
  }

  async createVectorStore(): Promise<string> {
    const id = await this.postForId("create vector store", "vector_stores", undefined);
    this.logger.info("Vector store created", { vectorStoreId: id });
    return id;
  }

  /** Upload a local file with purpose "assistants". Returns the file id. */
  async uploadFile(path: string): Promise<string> {
    const fileName = basename(path);
    this.logger.debug("Reading file for upload", { path });
    const data = await readFile(path);

    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(data)]), fileName);
    form.append("purpose", "assistants");

    const id = await this.postForId(`upload ${fileName}`, "files", form);
    this.logger.debug("File uploaded", { fileName, fileId: id });
    return id;
  }

  async addFileToVectorStore(vectorStoreId: string, fileId: string): Promise<void> {
    await this.post(
      "register file in vector store",
      `vector_stores/${encodeURIComponent(vectorStoreId)}/files`,
      JSON.stringify({ file_id: fileId }),
    );
    this.logger.info("File registered in vector store", { vectorStoreId, fileId });
  }

  async attachVectorStore(assistantId: string, vectorStoreId: string): Promise<void> {
    await this.post(
      "attach vector store",
      `assistants/${encodeURIComponent(assistantId)}`,
      JSON.stringify({ tool_resources: fileSearchResources(vectorStoreId) }),
    );
    this.logger.info("Assistant updated with vector store", { assistantId, vectorStoreId });
  }

  /**
   * Start a streaming run on a fresh thread seeded with `messages`.
   * Returns the raw SSE body; the caller owns it from here.
   */
  async createRun(request: RunRequest): Promise<ReadableStream<Uint8Array>> {
    const body: WireRunCreate = {
      assistant_id: request.assistantId,
      thread: {
        messages: request.messages.map((turn) => ({ role: turn.role, content: turn.content })),
      },
      tool_resources: fileSearchResources(request.vectorStoreId),
      temperature: request.temperature ?? 1,
      top_p: request.topP ?? 1,
      stream: true,
    };

    this.logger.debug("Starting streaming run", {
      assistantId: request.assistantId,
      messages: request.messages.length,
    });

    const response = await this.post("create run", "threads/runs", JSON.stringify(body));
    if (!response.body) {
      throw new ProviderError("create run failed: no response body", "unknown");
    }
    return response.body;
  }

  // ── Internals ──────────────────────────────────────────────────────────

  private async postForId(operation: string, path: string, body: string | FormData | undefined): Promise<string> {
    const response = await this.post(operation, path, body);
    const text = await response.text();

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (cause) {
      throw new ProviderError(`${operation} failed: invalid JSON response\nBody: ${text}`, "unknown", cause);
    }

    const parsed = WireIdResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ProviderError(`${operation} failed: response has no id\nBody: ${text}`, "unknown");
    }
    return parsed.data.id;
  }

  private async post(operation: string, path: string, body: string | FormData | undefined): Promise<Response> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      "OpenAI-Beta": "assistants=v2",
    };
    // FormData sets its own multipart boundary
    if (!(body instanceof FormData)) {
      headers["Content-Type"] = "application/json";
    }

    const url = `${this.baseUrl}/${path}`;
    this.logger.debug("Sending request", { operation, url });

    let response: Response;
    try {
      response = await fetch(url, { method: "POST", headers, body });
    } catch (cause) {
      throw new ProviderError(`${operation} failed: ${errorMessage(cause)}`, classifyError(cause), cause);
    }

    if (!response.ok) {
      const errorBody = await response.text();
      this.logger.error("Request rejected", { operation, status: response.status, body: errorBody });
      throw new ProviderError(
        `${operation} failed: Status ${response.status}\nBody: ${errorBody}`,
        classifyStatus(response.status),
        undefined,
        response.status,
      );
    }

    return response;
  }
}
