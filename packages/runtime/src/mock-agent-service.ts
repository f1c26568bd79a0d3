import { v7 as uuidv7 } from "uuid";
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
  ToolOutput,
  VectorStore,
  VectorStoreId,
} from "@agentdeck/types";
import { AgentServiceError } from "@agentdeck/core";
import { isTerminal, messageText } from "./run-state.js";
import { planRun, type RunPlanner, type ScriptedStep, type SubmittedOutput } from "./mock-planner.js";

export type MockOperation = keyof AgentService;

export interface MockAgentServiceOptions {
  /** Plans runs that have no queued script. Defaults to `planRun`. */
  planner?: RunPlanner;
}

interface RunState {
  readonly id: RunId;
  readonly conversationId: ConversationId;
  readonly agentId: AgentId;
  status: RunStatus;
  requiredAction?: RequiredAction;
  lastError?: RunError;
  readonly steps: ReadonlyArray<ScriptedStep>;
  cursor: number;
  pollsLeft?: number;
  readonly outputs: SubmittedOutput[];
  readonly submissions: ToolOutput[][];
}

interface StoredFile {
  readonly filename: string;
  readonly content: string;
}

interface StoredVectorStore {
  readonly id: VectorStoreId;
  readonly name: string;
  readonly fileIds: ReadonlyArray<FileId>;
  indexed: boolean;
}

interface InjectedFailure {
  remaining: number;
  readonly error?: Error;
}

/**
 * In-process stand-in for the remote agent service.
 *
 * Runs advance one scripted step per `getRun`. Scripts queued with
 * `enqueueScript` are used first, in order; other runs are planned from the
 * conversation. Every operation can be made to fail with `failNext`.
 *
 * `createRunStream` drives the same steps without polls and emits each reply
 * word by word. A `stall` step ends the stream with the run still in progress.
 */
export class MockAgentService implements AgentService {
  private readonly planner: RunPlanner;
  private readonly agents = new Map<AgentId, AgentConfig>();
  private readonly conversations = new Map<ConversationId, Message[]>();
  private readonly runs = new Map<RunId, RunState>();
  private readonly files = new Map<FileId, StoredFile>();
  private readonly vectorStores = new Map<VectorStoreId, StoredVectorStore>();
  private readonly scripts: ScriptedStep[][] = [];
  private readonly failures = new Map<MockOperation, InjectedFailure>();
  private readonly calls = new Map<MockOperation, number>();

  constructor(opts: MockAgentServiceOptions = {}) {
    this.planner = opts.planner ?? planRun;
  }

  // ── Test controls ────────────────────────────────────────────────

  /** Script the next run created on any conversation. */
  enqueueScript(...steps: ScriptedStep[]): this {
    this.scripts.push(steps);
    return this;
  }

  /** Make the next `times` calls of `operation` throw. */
  failNext(operation: MockOperation, opts: { times?: number; error?: Error } = {}): this {
    this.failures.set(operation, { remaining: opts.times ?? 1, error: opts.error });
    return this;
  }

  callCount(operation: MockOperation): number {
    return this.calls.get(operation) ?? 0;
  }

  /** Every batch of outputs submitted to `runId`. */
  submissions(runId: RunId): ReadonlyArray<ReadonlyArray<ToolOutput>> {
    return this.runs.get(runId)?.submissions ?? [];
  }

  /** Conversation messages, oldest first. */
  messages(conversationId: ConversationId): ReadonlyArray<Message> {
    return this.conversations.get(conversationId) ?? [];
  }

  /** Counts of resources that have not been deleted. */
  live(): { agents: number; conversations: number; files: number; vectorStores: number } {
    return {
      agents: this.agents.size,
      conversations: this.conversations.size,
      files: this.files.size,
      vectorStores: this.vectorStores.size,
    };
  }

  // ── AgentService ─────────────────────────────────────────────────

  async createAgent(definition: AgentDefinition): Promise<AgentConfig> {
    this.enter("createAgent");
    const agent: AgentConfig = {
      ...definition,
      id: newId<AgentId>("asst"),
      createdAt: new Date().toISOString(),
    };
    this.agents.set(agent.id, agent);
    return agent;
  }

  async deleteAgent(agentId: AgentId): Promise<void> {
    this.enter("deleteAgent");
    if (!this.agents.delete(agentId)) throw notFound("deleteAgent", "agent", agentId);
  }

  async createConversation(): Promise<ConversationId> {
    this.enter("createConversation");
    const id = newId<ConversationId>("thread");
    this.conversations.set(id, []);
    return id;
  }

  async deleteConversation(conversationId: ConversationId): Promise<void> {
    this.enter("deleteConversation");
    if (!this.conversations.delete(conversationId)) {
      throw notFound("deleteConversation", "thread", conversationId);
    }
  }

  async appendMessage(
    conversationId: ConversationId,
    role: MessageRole,
    content: MessageInput
  ): Promise<Message> {
    this.enter("appendMessage");
    const messages = this.requireConversation("appendMessage", conversationId);
    this.rejectActiveRun("appendMessage", conversationId);
    return this.pushMessage(messages, conversationId, role, toBlocks(content));
  }

  async listMessages(conversationId: ConversationId, options: ListMessagesOptions): Promise<Message[]> {
    this.enter("listMessages");
    const messages = [...this.requireConversation("listMessages", conversationId)];
    if (options.order === "desc") messages.reverse();
    return options.limit === undefined ? messages : messages.slice(0, options.limit);
  }

  async createRun(conversationId: ConversationId, agentId: AgentId): Promise<Run> {
    this.enter("createRun");
    return snapshot(this.startRun("createRun", conversationId, agentId));
  }

  async *createRunStream(conversationId: ConversationId, agentId: AgentId): AsyncGenerator<RunStreamEvent> {
    this.enter("createRunStream");
    const state = this.startRun("createRunStream", conversationId, agentId);
    const messages = this.requireConversation("createRunStream", conversationId);
    yield { kind: "status", run: snapshot(state) };

    while (!isTerminal(state.status) && state.status !== "requires_action") {
      const before = { status: state.status, cursor: state.cursor, pollsLeft: state.pollsLeft, messages: messages.length };
      this.advance(state);

      for (const message of messages.slice(before.messages)) {
        for (const text of messageText(message).match(/\s*\S+\s*/g) ?? []) {
          yield { kind: "delta", messageId: message.id, text };
        }
        yield { kind: "message", message };
      }
      if (state.status !== before.status) yield { kind: "status", run: snapshot(state) };

      const stalled =
        state.status === before.status && state.cursor === before.cursor && state.pollsLeft === before.pollsLeft;
      if (stalled) return;
    }
  }

  async getRun(conversationId: ConversationId, runId: RunId): Promise<Run> {
    this.enter("getRun");
    const state = this.requireRun("getRun", conversationId, runId);
    this.advance(state);
    return snapshot(state);
  }

  async submitToolOutputs(run: Run, outputs: ReadonlyArray<ToolOutput>): Promise<Run> {
    this.enter("submitToolOutputs");
    const state = this.requireRun("submitToolOutputs", run.conversationId, run.id);
    const pending = state.requiredAction?.toolCalls;
    if (state.status !== "requires_action" || !pending) {
      throw badRequest("submitToolOutputs", `Run ${run.id} is not waiting for tool outputs (status ${state.status})`);
    }

    const expected = new Set<string>(pending.map((call) => call.id));
    const received = new Set<string>(outputs.map((output) => output.toolCallId));
    const complete =
      outputs.length === pending.length &&
      received.size === expected.size &&
      [...expected].every((id) => received.has(id));
    if (!complete) {
      throw badRequest("submitToolOutputs", "Tool outputs must answer every pending tool call exactly once");
    }

    for (const output of outputs) {
      const call = pending.find((c) => c.id === output.toolCallId);
      if (call) state.outputs.push({ name: call.name, arguments: call.arguments, output: output.output });
    }
    state.submissions.push([...outputs]);
    state.requiredAction = undefined;
    state.status = "queued";
    return snapshot(state);
  }

  async cancelRun(conversationId: ConversationId, runId: RunId): Promise<Run> {
    this.enter("cancelRun");
    const state = this.requireRun("cancelRun", conversationId, runId);
    if (isTerminal(state.status)) {
      throw badRequest("cancelRun", `Cannot cancel run with status '${state.status}'`);
    }
    state.status = "cancelled";
    state.requiredAction = undefined;
    return snapshot(state);
  }

  async uploadFile(filename: string, content: string): Promise<FileId> {
    this.enter("uploadFile");
    const id = newId<FileId>("assistant-file");
    this.files.set(id, { filename, content });
    return id;
  }

  async deleteFile(fileId: FileId): Promise<void> {
    this.enter("deleteFile");
    if (!this.files.delete(fileId)) throw notFound("deleteFile", "file", fileId);
  }

  async createVectorStore(name: string, fileIds: ReadonlyArray<FileId>): Promise<VectorStore> {
    this.enter("createVectorStore");
    for (const fileId of fileIds) {
      if (!this.files.has(fileId)) throw notFound("createVectorStore", "file", fileId);
    }
    const store: StoredVectorStore = { id: newId<VectorStoreId>("vs"), name, fileIds: [...fileIds], indexed: false };
    this.vectorStores.set(store.id, store);
    return describeStore(store);
  }

  /** Indexing finishes by the first status check. */
  async getVectorStore(vectorStoreId: VectorStoreId): Promise<VectorStore> {
    this.enter("getVectorStore");
    const store = this.vectorStores.get(vectorStoreId);
    if (!store) throw notFound("getVectorStore", "vector store", vectorStoreId);
    store.indexed = true;
    return describeStore(store);
  }

  async deleteVectorStore(vectorStoreId: VectorStoreId): Promise<void> {
    this.enter("deleteVectorStore");
    if (!this.vectorStores.delete(vectorStoreId)) {
      throw notFound("deleteVectorStore", "vector store", vectorStoreId);
    }
  }

  // ── Internals ────────────────────────────────────────────────────

  private enter(operation: MockOperation): void {
    this.calls.set(operation, this.callCount(operation) + 1);
    const failure = this.failures.get(operation);
    if (!failure || failure.remaining <= 0) return;
    failure.remaining--;
    throw failure.error ?? new AgentServiceError("TRANSPORT_ERROR", operation, "Injected failure");
  }

  private startRun(operation: MockOperation, conversationId: ConversationId, agentId: AgentId): RunState {
    const messages = this.requireConversation(operation, conversationId);
    const agent = this.agents.get(agentId);
    if (!agent) throw notFound(operation, "agent", agentId);
    this.rejectActiveRun(operation, conversationId);

    const steps = this.scripts.shift() ?? this.planner({ agent, messages: [...messages] });
    const state: RunState = {
      id: newId<RunId>("run"),
      conversationId,
      agentId,
      status: "queued",
      steps,
      cursor: 0,
      outputs: [],
      submissions: [],
    };
    this.runs.set(state.id, state);
    return state;
  }

  private advance(state: RunState): void {
    if (isTerminal(state.status) || state.status === "requires_action") return;

    const step = state.steps[state.cursor];
    if (!step) {
      state.status = "completed";
      return;
    }

    switch (step.kind) {
      case "working":
        state.status = "in_progress";
        state.pollsLeft = (state.pollsLeft ?? step.polls ?? 1) - 1;
        if (state.pollsLeft <= 0) {
          state.pollsLeft = undefined;
          state.cursor++;
        }
        return;

      case "tool_calls":
        state.status = "requires_action";
        state.requiredAction = {
          type: "submit_tool_outputs",
          toolCalls: step.calls.map((call) => ({
            id: newId<ToolCallId>("call"),
            name: call.name,
            arguments: typeof call.arguments === "string" ? call.arguments : JSON.stringify(call.arguments ?? {}),
          })),
        };
        state.cursor++;
        return;

      case "reply": {
        const messages = this.requireConversation("getRun", state.conversationId);
        const agent = this.agents.get(state.agentId);
        let text = "";
        if (typeof step.text === "string") text = step.text;
        else if (agent) text = step.text({ agent, messages: [...messages], toolOutputs: state.outputs });
        this.pushMessage(messages, state.conversationId, "agent", [{ type: "text", text }], state.id);
        state.status = "completed";
        state.cursor++;
        return;
      }

      case "complete":
        state.status = "completed";
        state.cursor++;
        return;

      case "fail":
        state.status = "failed";
        state.lastError = step.code ? { code: step.code, message: step.message } : { message: step.message };
        state.cursor++;
        return;

      case "cancel":
        state.status = "cancelled";
        if (step.message) state.lastError = { message: step.message };
        state.cursor++;
        return;

      case "stall":
        state.status = "in_progress";
        return;
    }
  }

  private pushMessage(
    messages: Message[],
    conversationId: ConversationId,
    role: MessageRole,
    content: ReadonlyArray<MessageContent>,
    runId?: RunId
  ): Message {
    const message: Message = {
      id: newId<MessageId>("msg"),
      conversationId,
      role,
      content,
      createdAt: new Date().toISOString(),
      ...(runId ? { runId } : {}),
    };
    messages.push(message);
    return message;
  }

  private requireConversation(operation: MockOperation, conversationId: ConversationId): Message[] {
    const messages = this.conversations.get(conversationId);
    if (!messages) throw notFound(operation, "thread", conversationId);
    return messages;
  }

  private requireRun(operation: MockOperation, conversationId: ConversationId, runId: RunId): RunState {
    const state = this.runs.get(runId);
    if (!state || state.conversationId !== conversationId) throw notFound(operation, "run", runId);
    return state;
  }

  private rejectActiveRun(operation: MockOperation, conversationId: ConversationId): void {
    for (const state of this.runs.values()) {
      if (state.conversationId === conversationId && !isTerminal(state.status)) {
        throw badRequest(operation, `Thread ${conversationId} already has an active run ${state.id}`);
      }
    }
  }
}

function newId<T extends string>(prefix: string): T {
  return `${prefix}_${uuidv7().replace(/-/g, "")}` as T;
}

function toBlocks(content: MessageInput): ReadonlyArray<MessageContent> {
  return typeof content === "string" ? [{ type: "text", text: content }] : content;
}

function snapshot(state: RunState): Run {
  return {
    id: state.id,
    conversationId: state.conversationId,
    agentId: state.agentId,
    status: state.status,
    ...(state.requiredAction ? { requiredAction: state.requiredAction } : {}),
    ...(state.lastError ? { lastError: state.lastError } : {}),
  };
}

function describeStore(store: StoredVectorStore): VectorStore {
  const total = store.fileIds.length;
  return {
    id: store.id,
    name: store.name,
    status: store.indexed ? "completed" : "in_progress",
    fileCounts: {
      inProgress: store.indexed ? 0 : total,
      completed: store.indexed ? total : 0,
      failed: 0,
    },
  };
}

function notFound(operation: string, resource: string, id: string): AgentServiceError {
  return new AgentServiceError("HTTP_ERROR", operation, `No ${resource} found with id '${id}'`, { status: 404 });
}

function badRequest(operation: string, message: string): AgentServiceError {
  return new AgentServiceError("HTTP_ERROR", operation, message, { status: 400 });
}
