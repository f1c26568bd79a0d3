import type { ConversationId, Timestamp } from "./foundational.js";

/** A conversation the user chose to keep for a later session. */
export interface SavedConversation {
  readonly conversationId: ConversationId;
  /** Short label shown when picking a conversation to resume. */
  readonly topic: string;
  readonly agentName?: string;
  readonly savedAt: Timestamp;
}

/**
 * Local index of saved conversations. The messages themselves stay on the
 * service; only the handle is stored.
 */
export interface ConversationStore {
  /** Insert or replace the entry for `conversationId`. */
  save(entry: Omit<SavedConversation, "savedAt">): Promise<SavedConversation>;
  get(conversationId: ConversationId): Promise<SavedConversation | undefined>;
  /** Most recently saved first. */
  list(): Promise<SavedConversation[]>;
  /** Returns false when nothing was stored under the id. */
  remove(conversationId: ConversationId): Promise<boolean>;
}
