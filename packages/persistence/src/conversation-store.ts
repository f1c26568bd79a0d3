import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { ConversationId, ConversationStore, SavedConversation, Timestamp } from "@agentdeck/types";

/**
 * SQLite-backed implementation of ConversationStore.
 *
 * One row per saved conversation handle; the conversation content lives on
 * the agent service and is fetched from there when resumed.
 */
export class SQLiteConversationStore implements ConversationStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  /** Pass ":memory:" for a throwaway store. */
  constructor(dbPath: string, opts: { now?: () => Date } = {}) {
    if (dbPath !== ":memory:") fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.now = opts.now ?? (() => new Date());
    this.migrate();
  }

  /** Run schema migrations. Idempotent. */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS saved_conversations (
        conversation_id TEXT PRIMARY KEY,
        topic           TEXT NOT NULL,
        agent_name      TEXT,
        saved_at        TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_saved_conversations_saved_at
        ON saved_conversations(saved_at);
    `);
  }

  async save(entry: Omit<SavedConversation, "savedAt">): Promise<SavedConversation> {
    const savedAt: Timestamp = this.now().toISOString();
    this.db
      .prepare<[string, string, string | null, string]>(`
        INSERT INTO saved_conversations (conversation_id, topic, agent_name, saved_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(conversation_id) DO UPDATE SET
          topic = excluded.topic,
          agent_name = excluded.agent_name,
          saved_at = excluded.saved_at
      `)
      .run(entry.conversationId, entry.topic, entry.agentName ?? null, savedAt);

    return { ...entry, savedAt };
  }

  async get(conversationId: ConversationId): Promise<SavedConversation | undefined> {
    const row = this.db
      .prepare<[string], SavedConversationRow>("SELECT * FROM saved_conversations WHERE conversation_id = ?")
      .get(conversationId);
    return row ? fromRow(row) : undefined;
  }

  async list(): Promise<SavedConversation[]> {
    const rows = this.db
      .prepare<[], SavedConversationRow>(
        "SELECT * FROM saved_conversations ORDER BY saved_at DESC, rowid DESC"
      )
      .all();
    return rows.map(fromRow);
  }

  async remove(conversationId: ConversationId): Promise<boolean> {
    const result = this.db
      .prepare<[string]>("DELETE FROM saved_conversations WHERE conversation_id = ?")
      .run(conversationId);
    return result.changes > 0;
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}

// ─── Internal row types ─────────────────────────────────────────────

interface SavedConversationRow {
  conversation_id: string;
  topic: string;
  agent_name: string | null;
  saved_at: string;
}

function fromRow(row: SavedConversationRow): SavedConversation {
  return {
    conversationId: row.conversation_id as ConversationId,
    topic: row.topic,
    ...(row.agent_name !== null ? { agentName: row.agent_name } : {}),
    savedAt: row.saved_at,
  };
}
