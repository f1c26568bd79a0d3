import type { ConversationId, MessageId, RunId, Timestamp } from "./foundational.js";

export type MessageRole = "user" | "agent";

/**
 * A single block of message content.
 * Closed union: consumers switch on `type` instead of inspecting shapes.
 */
export type MessageContent = TextContent | ImageUrlContent;

export interface TextContent {
  readonly type: "text";
  readonly text: string;
}

export interface ImageUrlContent {
  readonly type: "image_url";
  readonly url: string;
  /** Resolution hint forwarded to the service. */
  readonly detail?: "auto" | "low" | "high";
}

/** What callers may pass when appending: a plain string is one text block. */
export type MessageInput = string | ReadonlyArray<MessageContent>;

/** A message held by the remote conversation. Immutable once appended. */
export interface Message {
  readonly id: MessageId;
  readonly conversationId: ConversationId;
  readonly role: MessageRole;
  readonly content: ReadonlyArray<MessageContent>;
  readonly createdAt: Timestamp;
  /** The run that produced this message, for agent messages. */
  readonly runId?: RunId;
}

export type ListOrder = "asc" | "desc";

export interface ListMessagesOptions {
  readonly order: ListOrder;
  /** Upper bound on returned messages. Unbounded when absent. */
  readonly limit?: number;
}
