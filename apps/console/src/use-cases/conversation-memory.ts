import type { ConversationId, SavedConversation } from "@agentdeck/types";
import { AgentServiceError } from "@agentdeck/core";
import type { DemoContext } from "../context.js";
import type { UseCase } from "../use-case.js";
import { converse, promptLoop, showHistory } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

const HELP = "Commands: history, list, save, new, exit. Anything else is sent to the agent.";

export const conversationMemory: UseCase = {
  id: "conversation-memory",
  title: "Conversation Memory",
  summary: "Save a conversation under a topic and resume it in a later session.",
  interactive: true,
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "MemoryAssistant",
          instructions: "You are a helpful assistant. Use everything said earlier in the conversation.",
        })
      );

      // Unsaved conversations stay in the scope and are deleted with it.
      const startNew = async (): Promise<ConversationId> => {
        const id = await scope.createConversation();
        ctx.out.line(`Started conversation ${id}`);
        return id;
      };
      const keep = async (id: ConversationId): Promise<boolean> => {
        if (!(await saveConversation(ctx, id, agent.name))) return false;
        scope.untrack({ kind: "conversation", id });
        return true;
      };

      const resumed = await resumeConversation(ctx);
      let current = resumed ?? (await startNew());
      let saved = resumed !== undefined;
      ctx.out.line(HELP);
      ctx.out.line();

      for await (const line of promptLoop(ctx, "You: ")) {
        switch (line.toLowerCase()) {
          case "history":
            await showHistory(ctx, current);
            break;
          case "list":
            printSaved(ctx, await ctx.store.list());
            break;
          case "save":
            saved = (await keep(current)) || saved;
            break;
          case "new":
            current = await startNew();
            saved = false;
            break;
          default:
            await converse(ctx, agent, current, line);
        }
      }

      if (!saved) await keep(current);
    }),
};

/**
 * Offer the saved conversations and show the chosen one's history. A saved
 * handle the service no longer knows is dropped from the store.
 */
async function resumeConversation(ctx: DemoContext): Promise<ConversationId | undefined> {
  const entries = await ctx.store.list();
  if (entries.length === 0) return undefined;

  printSaved(ctx, entries);
  const answer = await ctx.input.ask("Resume which conversation? (number, or Enter for a new one): ");
  const index = Number(answer?.trim()) - 1;
  const entry = Number.isInteger(index) ? entries[index] : undefined;
  if (!entry) return undefined;

  ctx.out.line(`Resuming "${entry.topic}"`);
  try {
    await showHistory(ctx, entry.conversationId);
  } catch (err) {
    if (!(err instanceof AgentServiceError)) throw err;
    ctx.logger.warn({ err, conversationId: entry.conversationId }, "saved conversation is no longer available");
    ctx.out.line(`⚠️  Could not load history for "${entry.topic}" (${err.message}). Starting a new conversation.`);
    await ctx.store.remove(entry.conversationId);
    return undefined;
  }
  return entry.conversationId;
}

async function saveConversation(
  ctx: DemoContext,
  conversationId: ConversationId,
  agentName: string
): Promise<boolean> {
  const topic = (await ctx.input.ask("Topic to save under (Enter to skip): "))?.trim();
  if (!topic) return false;
  await ctx.store.save({ conversationId, topic, agentName });
  ctx.out.line(`💾 Saved as "${topic}"`);
  return true;
}

function printSaved(ctx: DemoContext, entries: ReadonlyArray<SavedConversation>): void {
  if (entries.length === 0) {
    ctx.out.line("No saved conversations.");
    return;
  }
  ctx.out.line("Saved conversations:");
  entries.forEach((entry, i) => {
    ctx.out.line(`  ${i + 1}. ${entry.topic} (${entry.savedAt})`);
  });
}
