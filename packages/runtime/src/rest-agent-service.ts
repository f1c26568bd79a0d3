import type { z } from "zod";
import type {
  AgentConfig,
  AgentDefinition,
  AgentId,
  AgentService,
  ConversationId,
  FileId,
  ListMessagesOptions,
  Message,
  MessageContent,
  MessageId,
  MessageInput,
  MessageRole,
  RequiredAction,
  Run,
  RunError,
  RunId,
  RunStatus,
  RunStreamEvent,
  ToolCallId,
  ToolDefinition,
  ToolOutput,
  ToolResources,
  VectorStore,
  VectorStoreId,
} from "@agentdeck/types";
import { AgentServiceError, createSilentLogger, errorMessage, type Logger } from "@agentdeck/core";
import {
  WireAgentSchema,
  WireFileSchema,
  WireImageUrlBlockSchema,
  WireMessageDeltaSchema,
  WireMessageListSchema,
  WireMessageSchema,
  WireRunSchema,
  WireTextBlockSchema,
  WireThreadSchema,
  WireVectorStoreSchema,
  type WireMessage,
  type WireRun,
  type WireVectorStore,
} from "./wire.js";
import { readServerSentEvents, type ServerSentEvent } from "./sse.js";

export interface RestAgentServiceOptions {
  /** Project endpoint, e.g. https://<resource>.services.ai.azure.com/api/projects/<project>. */
  endpoint: string;
  apiVersion?: string;
  /** Sent as a bearer token. */
  accessToken?: string;
  /** Page size when listing messages. */
  pageSize?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

type HttpMethod = "GET" | "POST" | "DELETE";

interface StatusAlias {
  status: RunStatus;
  error?: string;
}

/** Statuses the service reports beyond the six the harness models. */
const STATUS_ALIASES: ReadonlyMap<string, StatusAlias> = new Map<string, StatusAlias>([
  ["cancelling", { status: "cancelled" }],
  ["expired", { status: "failed", error: "Run expired before completing" }],
  ["incomplete", { status: "failed", error: "Run ended incomplete" }],
]);

const RUN_STATUSES: ReadonlySet<string> = new Set<RunStatus>([
  "queued",
  "in_progress",
  "requires_action",
  "completed",
  "failed",
  "cancelled",
]);

/**
 * AgentService over the persistent-agents REST API.
 * Uses the REST API directly (no SDK dependency); every response is
 * validated before it is mapped to domain types.
 */
export class RestAgentService implements AgentService {
  private readonly baseUrl: string;
  private readonly apiVersion: string;
  private readonly accessToken?: string;
  private readonly pageSize: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(opts: RestAgentServiceOptions) {
    if (!opts.endpoint) throw new Error("Agent service endpoint is required");
    this.baseUrl = opts.endpoint.replace(/\/+$/, "");
    this.apiVersion = opts.apiVersion ?? "v1";
    this.accessToken = opts.accessToken;
    this.pageSize = opts.pageSize ?? 100;
    this.fetchFn = opts.fetch ?? fetch;
    this.logger = (opts.logger ?? createSilentLogger()).child({ component: "rest" });
  }

  async createAgent(definition: AgentDefinition): Promise<AgentConfig> {
    const body: Record<string, unknown> = {
      model: definition.model,
      name: definition.name,
      instructions: definition.instructions,
      tools: (definition.tools ?? []).map(toWireTool),
    };
    if (definition.toolResources) body.tool_resources = toWireToolResources(definition.toolResources);
    if (definition.responseFormat) {
      const { name, strict, schema } = definition.responseFormat.jsonSchema;
      body.response_format = { type: "json_schema", json_schema: { name, strict, schema } };
    }

    const wire = await this.request("createAgent", "POST", "/assistants", WireAgentSchema, body);
    return { ...definition, id: brand<AgentId>(wire.id), createdAt: fromUnix(wire.created_at) };
  }

  async deleteAgent(agentId: AgentId): Promise<void> {
    await this.request("deleteAgent", "DELETE", `/assistants/${enc(agentId)}`);
  }

  async createConversation(): Promise<ConversationId> {
    const wire = await this.request("createConversation", "POST", "/threads", WireThreadSchema, {});
    return brand<ConversationId>(wire.id);
  }

  async deleteConversation(conversationId: ConversationId): Promise<void> {
    await this.request("deleteConversation", "DELETE", `/threads/${enc(conversationId)}`);
  }

  async appendMessage(
    conversationId: ConversationId,
    role: MessageRole,
    content: MessageInput
  ): Promise<Message> {
    const wire = await this.request(
      "appendMessage",
      "POST",
      `/threads/${enc(conversationId)}/messages`,
      WireMessageSchema,
      { role: toWireRole(role), content: toWireContent(content) }
    );
    return toMessage(wire);
  }

  /** Follows `has_more` / `last_id` until `limit` messages or the end of the conversation. */
  async listMessages(conversationId: ConversationId, options: ListMessagesOptions): Promise<Message[]> {
    const messages: Message[] = [];
    let after: string | undefined;

    for (;;) {
      const wanted = options.limit === undefined ? this.pageSize : Math.min(this.pageSize, options.limit - messages.length);
      const query: Record<string, string> = { order: options.order, limit: String(wanted) };
      if (after) query.after = after;

      const page = await this.request(
        "listMessages",
        "GET",
        `/threads/${enc(conversationId)}/messages`,
        WireMessageListSchema,
        undefined,
        query
      );
      messages.push(...page.data.map(toMessage));

      const full = options.limit !== undefined && messages.length >= options.limit;
      if (full || !page.has_more || !page.last_id || page.data.length === 0) break;
      after = page.last_id;
    }
    return options.limit === undefined ? messages : messages.slice(0, options.limit);
  }

  async createRun(conversationId: ConversationId, agentId: AgentId): Promise<Run> {
    const wire = await this.request("createRun", "POST", `/threads/${enc(conversationId)}/runs`, WireRunSchema, {
      assistant_id: agentId,
    });
    return toRun("createRun", wire);
  }

  /**
   * Start a run with `stream: true` and translate its server-sent events.
   * Run-step and thread events are skipped; the stream ends at `done`.
   */
  async *createRunStream(conversationId: ConversationId, agentId: AgentId): AsyncGenerator<RunStreamEvent> {
    const operation = "createRunStream";
    const response = await this.send(
      operation,
      "POST",
      `/threads/${enc(conversationId)}/runs`,
      { assistant_id: agentId, stream: true },
      {},
      "text/event-stream"
    );
    if (!response.body) {
      throw new AgentServiceError("PROTOCOL_ERROR", operation, "Stream response has no body", {
        status: response.status,
      });
    }

    for await (const event of readServerSentEvents(response.body)) {
      if (event.event === "done") return;
      yield* this.toStreamEvents(operation, event);
    }
  }

  private *toStreamEvents(operation: string, event: ServerSentEvent): Generator<RunStreamEvent> {
    if (event.event === "error") {
      throw new AgentServiceError(
        "PROTOCOL_ERROR",
        operation,
        `Stream reported an error: ${serviceErrorMessage(event.data) ?? event.data}`
      );
    }

    if (event.event === "thread.message.delta") {
      const delta = validate(operation, WireMessageDeltaSchema, parseEventData(operation, event));
      for (const block of delta.delta.content) {
        const text = block.type === "text" ? block.text?.value : undefined;
        if (text) yield { kind: "delta", messageId: brand<MessageId>(delta.id), text };
      }
      return;
    }

    if (event.event === "thread.message.completed") {
      const message = validate(operation, WireMessageSchema, parseEventData(operation, event));
      yield { kind: "message", message: toMessage(message) };
      return;
    }

    if (event.event.startsWith("thread.run.") && !event.event.startsWith("thread.run.step.")) {
      const run = validate(operation, WireRunSchema, parseEventData(operation, event));
      yield { kind: "status", run: toRun(operation, run) };
      return;
    }

    this.logger.trace({ operation, event: event.event }, "stream event skipped");
  }

  async getRun(conversationId: ConversationId, runId: RunId): Promise<Run> {
    const wire = await this.request("getRun", "GET", `/threads/${enc(conversationId)}/runs/${enc(runId)}`, WireRunSchema);
    return toRun("getRun", wire);
  }

  async submitToolOutputs(run: Run, outputs: ReadonlyArray<ToolOutput>): Promise<Run> {
    const wire = await this.request(
      "submitToolOutputs",
      "POST",
      `/threads/${enc(run.conversationId)}/runs/${enc(run.id)}/submit_tool_outputs`,
      WireRunSchema,
      { tool_outputs: outputs.map((o) => ({ tool_call_id: o.toolCallId, output: o.output })) }
    );
    return toRun("submitToolOutputs", wire);
  }

  async cancelRun(conversationId: ConversationId, runId: RunId): Promise<Run> {
    const wire = await this.request(
      "cancelRun",
      "POST",
      `/threads/${enc(conversationId)}/runs/${enc(runId)}/cancel`,
      WireRunSchema,
      {}
    );
    return toRun("cancelRun", wire);
  }

  async uploadFile(filename: string, content: string): Promise<FileId> {
    const form = new FormData();
    form.append("purpose", "assistants");
    form.append("file", new Blob([content], { type: "text/plain" }), filename);
    const wire = await this.request("uploadFile", "POST", "/files", WireFileSchema, form);
    return brand<FileId>(wire.id);
  }

  async deleteFile(fileId: FileId): Promise<void> {
    await this.request("deleteFile", "DELETE", `/files/${enc(fileId)}`);
  }

  async createVectorStore(name: string, fileIds: ReadonlyArray<FileId>): Promise<VectorStore> {
    const wire = await this.request("createVectorStore", "POST", "/vector_stores", WireVectorStoreSchema, {
      name,
      file_ids: fileIds,
    });
    return toVectorStore(wire, name);
  }

  async getVectorStore(vectorStoreId: VectorStoreId): Promise<VectorStore> {
    const wire = await this.request(
      "getVectorStore",
      "GET",
      `/vector_stores/${enc(vectorStoreId)}`,
      WireVectorStoreSchema
    );
    return toVectorStore(wire, "");
  }

  async deleteVectorStore(vectorStoreId: VectorStoreId): Promise<void> {
    await this.request("deleteVectorStore", "DELETE", `/vector_stores/${enc(vectorStoreId)}`);
  }

  // ── Transport ────────────────────────────────────────────────────

  private request(operation: string, method: HttpMethod, path: string): Promise<void>;
  private request<T>(
    operation: string,
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: Record<string, unknown> | FormData,
    query?: Record<string, string>
  ): Promise<T>;
  private async request<T>(
    operation: string,
    method: HttpMethod,
    path: string,
    schema?: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: Record<string, unknown> | FormData,
    query: Record<string, string> = {}
  ): Promise<T | void> {
    const response = await this.send(operation, method, path, body, query);

    if (!schema) {
      // Release the connection even when the body is not read.
      await response.body?.cancel();
      return;
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new AgentServiceError("PROTOCOL_ERROR", operation, `Response is not JSON: ${errorMessage(err)}`, {
        status: response.status,
        cause: err,
      });
    }
    return validate(operation, schema, json, response.status);
  }

  /** Issue the request; non-2xx answers become `HTTP_ERROR`. */
  private async send(
    operation: string,
    method: HttpMethod,
    path: string,
    body?: Record<string, unknown> | FormData,
    query: Record<string, string> = {},
    accept = "application/json"
  ): Promise<Response> {
    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set("api-version", this.apiVersion);
    for (const [key, value] of Object.entries(query)) url.searchParams.set(key, value);

    const headers: Record<string, string> = { Accept: accept };
    if (this.accessToken) headers.Authorization = `Bearer ${this.accessToken}`;
    let payload: string | FormData | undefined;
    if (body instanceof FormData) {
      payload = body;
    } else if (body !== undefined) {
      headers["Content-Type"] = "application/json";
      payload = JSON.stringify(body);
    }

    this.logger.debug({ operation, method, path }, "request");

    let response: Response;
    try {
      response = await this.fetchFn(url, { method, headers, body: payload });
    } catch (err) {
      throw new AgentServiceError("TRANSPORT_ERROR", operation, errorMessage(err), { cause: err });
    }

    if (!response.ok) {
      const detail = await readErrorDetail(response);
      throw new AgentServiceError("HTTP_ERROR", operation, `HTTP ${response.status}: ${detail}`, {
        status: response.status,
        retryable: response.status === 408 || response.status === 429 || response.status >= 500,
      });
    }
    return response;
  }
}

function validate<T>(
  operation: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  json: unknown,
  status?: number
): T {
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new AgentServiceError("PROTOCOL_ERROR", operation, `Unexpected response shape: ${issues}`, { status });
  }
  return parsed.data;
}

function parseEventData(operation: string, event: ServerSentEvent): unknown {
  try {
    return JSON.parse(event.data);
  } catch (err) {
    throw new AgentServiceError(
      "PROTOCOL_ERROR",
      operation,
      `Stream event '${event.event}' is not JSON: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

async function readErrorDetail(response: Response): Promise<string> {
  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    return `(unreadable body: ${errorMessage(err)})`;
  }
  return serviceErrorMessage(text) ?? (text || response.statusText);
}

/** `error.message` of a JSON error body. */
function serviceErrorMessage(text: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof json !== "object" || json === null || !("error" in json)) return undefined;
  const error: unknown = json.error;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return undefined;
}

// ── Mapping ──────────────────────────────────────────────────────────

function brand<T extends string>(id: string): T {
  return id as T;
}

function enc(id: string): string {
  return encodeURIComponent(id);
}

function fromUnix(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

function toWireRole(role: MessageRole): "user" | "assistant" {
  return role === "agent" ? "assistant" : "user";
}

function toWireContent(content: MessageInput): string | Array<Record<string, unknown>> {
  if (typeof content === "string") return content;
  return content.map((block) => {
    switch (block.type) {
      case "text":
        return { type: "text", text: block.text };
      case "image_url":
        return { type: "image_url", image_url: { url: block.url, ...(block.detail ? { detail: block.detail } : {}) } };
    }
  });
}

function toWireTool(tool: ToolDefinition): Record<string, unknown> {
  switch (tool.type) {
    case "function":
      return { type: "function", function: tool.function };
    case "code_interpreter":
    case "file_search":
    case "azure_ai_search":
      return { type: tool.type };
  }
}

function toWireToolResources(resources: ToolResources): Record<string, unknown> {
  const wire: Record<string, unknown> = {};
  if (resources.fileSearch) {
    wire.file_search = { vector_store_ids: resources.fileSearch.vectorStoreIds };
  }
  if (resources.azureAiSearch) {
    const search = resources.azureAiSearch;
    wire.azure_ai_search = {
      indexes: [
        {
          index_connection_id: search.connectionId,
          index_name: search.indexName,
          query_type: search.queryType ?? "simple",
          top_k: search.topK ?? 3,
        },
      ],
    };
  }
  return wire;
}

function toContentBlock(block: unknown): MessageContent[] {
  const text = WireTextBlockSchema.safeParse(block);
  if (text.success) return [{ type: "text", text: text.data.text.value }];
  const image = WireImageUrlBlockSchema.safeParse(block);
  if (image.success) {
    const { url, detail } = image.data.image_url;
    return [detail ? { type: "image_url", url, detail } : { type: "image_url", url }];
  }
  return [];
}

function toMessage(wire: WireMessage): Message {
  return {
    id: brand<MessageId>(wire.id),
    conversationId: brand<ConversationId>(wire.thread_id),
    role: wire.role === "assistant" ? "agent" : "user",
    content: wire.content.flatMap(toContentBlock),
    createdAt: fromUnix(wire.created_at),
    ...(wire.run_id ? { runId: brand<RunId>(wire.run_id) } : {}),
  };
}

/** Map a wire run; unknown statuses are a protocol error. */
export function toRun(operation: string, wire: WireRun): Run {
  let status: RunStatus;
  let lastError: RunError | undefined = wire.last_error
    ? { ...(wire.last_error.code ? { code: wire.last_error.code } : {}), message: wire.last_error.message }
    : undefined;

  const alias = STATUS_ALIASES.get(wire.status);
  if (alias) {
    status = alias.status;
    if (alias.error && !lastError) lastError = { code: wire.status, message: alias.error };
  } else if (isRunStatus(wire.status)) {
    status = wire.status;
  } else {
    throw new AgentServiceError("PROTOCOL_ERROR", operation, `Unknown run status '${wire.status}'`);
  }

  const toolCalls = (wire.required_action?.submit_tool_outputs.tool_calls ?? []).flatMap((call) =>
    call.type === "function" && call.function
      ? [{ id: brand<ToolCallId>(call.id), name: call.function.name, arguments: call.function.arguments }]
      : []
  );

  const requiredAction: RequiredAction | undefined =
    status === "requires_action" ? { type: "submit_tool_outputs", toolCalls } : undefined;

  return {
    id: brand<RunId>(wire.id),
    conversationId: brand<ConversationId>(wire.thread_id),
    agentId: brand<AgentId>(wire.assistant_id),
    status,
    ...(requiredAction ? { requiredAction } : {}),
    ...(lastError ? { lastError } : {}),
  };
}

function isRunStatus(status: string): status is RunStatus {
  return RUN_STATUSES.has(status);
}

function toVectorStore(wire: WireVectorStore, fallbackName: string): VectorStore {
  return {
    id: brand<VectorStoreId>(wire.id),
    name: wire.name ?? fallbackName,
    status: wire.status,
    fileCounts: {
      inProgress: wire.file_counts.in_progress,
      completed: wire.file_counts.completed,
      failed: wire.file_counts.failed,
    },
  };
}
