// Test fixtures: in-process stand-ins for the Assistants API and a chat channel

import type {
  Channel,
  ChannelMessage,
  ChannelMessageHandler,
  LifecycleStatus,
  Turn,
} from "@docent/core";
import type {
  AssistantSpec,
  ProvisioningClient,
  RunClient,
  RunRequest,
} from "@docent/provider-assistants";

const encoder = new TextEncoder();

/** SSE body the Assistants API would stream for a reply of `text`. */
export function sseReply(text: string): string {
  const delta = {
    object: "thread.message.delta",
    delta: { content: [{ index: 0, type: "text", text: { value: text } }] },
  };
  return `data: ${JSON.stringify(delta)}\n\ndata: [DONE]\n\n`;
}

export function byteStream(body: string): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(encoder.encode(body));
      controller.close();
    },
  });
}

export interface ReplyScript {
  /** Reply text, streamed as a single delta. */
  readonly text?: string;
  /** Raw SSE body, used as is. */
  readonly sse?: string;
  /** createRun rejects with this error. */
  readonly error?: Error;
}

/**
 * Fake Assistants API. Runs are answered by the script registered for the
 * latest user turn in the request, or with "Reply to <content>".
 */
export class FakeAssistants implements RunClient, ProvisioningClient {
  readonly runs: RunRequest[] = [];
  readonly calls: string[] = [];
  readonly failingUploads = new Set<string>();
  failOn: string | null = null;

  private readonly scripts = new Map<string, ReplyScript>();
  private nextFile = 0;

  respond(userContent: string, script: ReplyScript): void {
    this.scripts.set(userContent, script);
  }

  async createRun(request: RunRequest): Promise<ReadableStream<Uint8Array>> {
    this.runs.push({ ...request, messages: [...request.messages] });

    const content = lastUserContent(request.messages);
    const script = this.scripts.get(content) ?? {};
    if (script.error) throw script.error;
    return byteStream(script.sse ?? sseReply(script.text ?? `Reply to ${content}`));
  }

  async createAssistant(spec: AssistantSpec): Promise<string> {
    this.record(`createAssistant:${spec.name}`, "createAssistant");
    return "asst_1";
  }

  async createVectorStore(): Promise<string> {
    this.record("createVectorStore", "createVectorStore");
    return "vs_1";
  }

  async uploadFile(path: string): Promise<string> {
    this.record(`uploadFile:${path}`, "uploadFile");
    if (this.failingUploads.has(path)) throw new Error(`upload rejected: ${path}`);
    this.nextFile++;
    return `file_${this.nextFile}`;
  }

  async addFileToVectorStore(vectorStoreId: string, fileId: string): Promise<void> {
    this.record(`addFileToVectorStore:${vectorStoreId}:${fileId}`, "addFileToVectorStore");
  }

  async attachVectorStore(assistantId: string, vectorStoreId: string): Promise<void> {
    this.record(`attachVectorStore:${assistantId}:${vectorStoreId}`, "attachVectorStore");
  }

  private record(call: string, operation: string): void {
    this.calls.push(call);
    if (this.failOn === operation) throw new Error(`${operation} rejected`);
  }
}

function lastUserContent(messages: readonly Turn[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === "user") return messages[i].content;
  }
  return "";
}

export interface PendingRun {
  readonly request: RunRequest;
  /** Let the run stream `text` as its reply. */
  readonly release: (text: string) => void;
}

/** Run client whose runs only answer when the test releases them. */
export class GatedRunClient implements RunClient {
  readonly pending: PendingRun[] = [];

  async createRun(request: RunRequest): Promise<ReadableStream<Uint8Array>> {
    const text = await new Promise<string>((resolve) => {
      this.pending.push({ request: { ...request, messages: [...request.messages] }, release: resolve });
    });
    return byteStream(sseReply(text));
  }
}

export interface SentText {
  readonly destination: string;
  readonly text: string;
}

/** Channel that records outgoing texts and lets tests push messages in. */
export class FakeChannel implements Channel {
  readonly name = "fake";
  readonly sent: SentText[] = [];
  readonly events: string[] = [];
  authorizeError: Error | null = null;
  failSends = false;

  private _status: LifecycleStatus = "stopped";
  private handler: ChannelMessageHandler | null = null;

  get status(): LifecycleStatus {
    return this._status;
  }

  async authorize(): Promise<void> {
    this.events.push("authorize");
    if (this.authorizeError) throw this.authorizeError;
  }

  async start(): Promise<void> {
    this.events.push("start");
    this._status = "running";
  }

  async stop(): Promise<void> {
    this.events.push("stop");
    this._status = "stopped";
  }

  onMessage(handler: ChannelMessageHandler): void {
    this.handler = handler;
  }

  async sendText(destination: string, text: string): Promise<void> {
    if (this.failSends) throw new Error("send failed");
    this.sent.push({ destination, text });
  }

  /** Deliver a message the way the real channel does. */
  async emit(msg: ChannelMessage): Promise<void> {
    if (!this.handler) throw new Error("no handler registered");
    await this.handler(msg);
  }
}

let requestCounter = 0;

export function message(senderId: string, content: string, replyTo: string = senderId): ChannelMessage {
  requestCounter++;
  return { channelId: "fake", senderId, replyTo, content, requestId: `req-${requestCounter}` };
}

