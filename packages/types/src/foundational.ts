/** Branded opaque identifier types for compile-time safety. */
type Brand<T, B extends string> = T & { readonly __brand: B };

export type AgentId = Brand<string, "AgentId">;
export type ConversationId = Brand<string, "ConversationId">;
export type MessageId = Brand<string, "MessageId">;
export type RunId = Brand<string, "RunId">;
export type ToolCallId = Brand<string, "ToolCallId">;
export type FileId = Brand<string, "FileId">;
export type VectorStoreId = Brand<string, "VectorStoreId">;

/** ISO 8601 timestamp. */
export type Timestamp = string;
