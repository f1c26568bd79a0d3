import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";

import { createSilentLogger } from "@agentdeck/core";
import { MockAgentService, TurnExecutor, withResources } from "@agentdeck/runtime";
import { createDefaultRegistry } from "@agentdeck/tools";
import { SQLiteConversationStore } from "@agentdeck/persistence";
import type { AgentDefinition } from "@agentdeck/types";

const noWait = async () => {};

const ASSISTANT: AgentDefinition = {
  model: "gpt-4o",
  name: "MemoryAssistant",
  instructions: "Remember what the user tells you.",
};

describe("State Recovery (resume after restart)", () => {
  let tmpDir: string;
  let dbPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "agentdeck-resume-"));
    dbPath = path.join(tmpDir, "conversations.db");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("continues a saved conversation from a fresh store and a fresh agent", async () => {
    // The remote service outlives both local sessions.
    const service = new MockAgentService();
    const executor = new TurnExecutor({ service, tools: createDefaultRegistry(), sleep: noWait });

    // ── Session 1: introduce, save, shut down ──
    const first = new SQLiteConversationStore(dbPath);
    const conversationId = await service.createConversation();
    await withResources(service, createSilentLogger(), async (scope) => {
      const agent = await scope.createAgent(ASSISTANT);
      const outcome = await executor.executeTurn({ agent, conversationId, message: "Hi, my name is Ada" });
      expect(outcome.ok && outcome.text).toBe("Nice to meet you, Ada!");
    });
    await first.save({ conversationId, topic: "introductions", agentName: ASSISTANT.name });
    first.close();

    // ── Session 2: reopen the database and pick the conversation back up ──
    const second = new SQLiteConversationStore(dbPath);
    const [saved] = await second.list();
    expect(saved?.topic).toBe("introductions");
    expect(saved?.conversationId).toBe(conversationId);

    await withResources(service, createSilentLogger(), async (scope) => {
      const agent = await scope.createAgent(ASSISTANT);
      const outcome = await executor.executeTurn({
        agent,
        conversationId: saved?.conversationId,
        message: "What is my name?",
      });
      expect(outcome.ok && outcome.text).toBe("Your name is Ada.");
    });
    second.close();

    expect(service.messages(conversationId).map((m) => m.role)).toEqual(["user", "agent", "user", "agent"]);
    expect(service.live()).toEqual({ agents: 0, conversations: 1, files: 0, vectorStores: 0 });
  });

  it("forgets a conversation once it is removed", async () => {
    const store = new SQLiteConversationStore(dbPath);
    const service = new MockAgentService();
    const conversationId = await service.createConversation();

    await store.save({ conversationId, topic: "scratch" });
    expect(await store.remove(conversationId)).toBe(true);
    store.close();

    const reopened = new SQLiteConversationStore(dbPath);
    expect(await reopened.list()).toEqual([]);
    reopened.close();
  });
});
