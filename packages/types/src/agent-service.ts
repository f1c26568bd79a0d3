import type {
  AgentId,
  ConversationId,
  FileId,
  RunId,
  VectorStoreId,
} from "./foundational.js";
import type { AgentConfig, AgentDefinition } from "./agent.js";
import type {
  ListMessagesOptions,
  Message,
  MessageInput,
  MessageRole,
} from "./message.js";
import type { Run, RunStreamEvent, ToolOutput } from "./run.js";
import type { VectorStore } from "./resources.js";

/**
 * The remote agent service as the harness consumes it.
 *
 * Every call is remote and fallible: implementations raise
 * `AgentServiceError` for transport, HTTP and protocol failures.
 * The connection is stateless and may be shared by concurrent flows;
 * the service orders operations within one conversation.
 */
export interface AgentService {
  createAgent(definition: AgentDefinition): Promise<AgentConfig>;
  deleteAgent(agentId: AgentId): Promise<void>;

  createConversation(): Promise<ConversationId>;
  deleteConversation(conversationId: ConversationId): Promise<void>;

  appendMessage(
    conversationId: ConversationId,
    role: MessageRole,
    content: MessageInput
  ): Promise<Message>;
  listMessages(
    conversationId: ConversationId,
    options: ListMessagesOptions
  ): Promise<Message[]>;

  createRun(conversationId: ConversationId, agentId: AgentId): Promise<Run>;
  /** Start a run and receive its progress and text as it is produced. */
  createRunStream(conversationId: ConversationId, agentId: AgentId): AsyncIterable<RunStreamEvent>;
  getRun(conversationId: ConversationId, runId: RunId): Promise<Run>;
  submitToolOutputs(run: Run, outputs: ReadonlyArray<ToolOutput>): Promise<Run>;
  cancelRun(conversationId: ConversationId, runId: RunId): Promise<Run>;

  uploadFile(filename: string, content: string): Promise<FileId>;
  deleteFile(fileId: FileId): Promise<void>;

  createVectorStore(name: string, fileIds: ReadonlyArray<FileId>): Promise<VectorStore>;
  getVectorStore(vectorStoreId: VectorStoreId): Promise<VectorStore>;
  deleteVectorStore(vectorStoreId: VectorStoreId): Promise<void>;
}
