import type { AgentId, ConversationId, MessageId, RunId, ToolCallId } from "./foundational.js";
import type { Message } from "./message.js";

/**
 * Status of a run on the remote service.
 *
 * queued → in_progress → requires_action | completed | failed
 * requires_action → queued | in_progress   (after tool outputs are submitted)
 * any non-terminal → cancelled              (client-issued cancel)
 */
export type RunStatus =
  | "queued"
  | "in_progress"
  | "requires_action"
  | "completed"
  | "failed"
  | "cancelled";

export type TerminalRunStatus = Extract<RunStatus, "completed" | "failed" | "cancelled">;

/** A request from the service to execute a local function. */
export interface ToolCall {
  readonly id: ToolCallId;
  readonly name: string;
  /** Raw JSON document exactly as the service sent it. */
  readonly arguments: string;
}

/** The result of a tool call, submitted once to resume a paused run. */
export interface ToolOutput {
  readonly toolCallId: ToolCallId;
  readonly output: string;
}

export interface RequiredAction {
  readonly type: "submit_tool_outputs";
  readonly toolCalls: ReadonlyArray<ToolCall>;
}

export interface RunError {
  readonly code?: string;
  readonly message: string;
}

export interface Run {
  readonly id: RunId;
  readonly conversationId: ConversationId;
  readonly agentId: AgentId;
  readonly status: RunStatus;
  /** Present only while `status` is "requires_action". */
  readonly requiredAction?: RequiredAction;
  /** Present when the service reports a failure. */
  readonly lastError?: RunError;
}

/**
 * One event of a streamed run, in arrival order. The stream ends once the
 * run stops or pauses for tool outputs; the last `status` event says which.
 */
export type RunStreamEvent =
  | { readonly kind: "status"; readonly run: Run }
  /** A fragment of agent text; fragments of one message share `messageId`. */
  | { readonly kind: "delta"; readonly messageId: MessageId; readonly text: string }
  | { readonly kind: "message"; readonly message: Message };
