import type { FileId, VectorStore } from "@agentdeck/types";
import { AgentDeckError } from "@agentdeck/core";
import { fileSearchTool } from "@agentdeck/tools";
import type { DemoContext } from "../context.js";
import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

const INDEX_POLL_MS = 1000;
const INDEX_MAX_POLLS = 60;

const DOCUMENTS: ReadonlyArray<{ filename: string; content: string }> = [
  {
    filename: "travel-policy.md",
    content: [
      "# Travel Policy",
      "Economy class is required for flights under six hours.",
      "Hotel stays are reimbursed up to $180 per night in most cities and $260 in high-cost cities.",
      "Expense reports are due within 30 days of returning.",
    ].join("\n"),
  },
  {
    filename: "equipment-policy.md",
    content: [
      "# Equipment Policy",
      "New hires choose a laptop from the standard catalogue.",
      "Laptops are refreshed every three years.",
      "Lost equipment must be reported to the service desk within 24 hours.",
    ].join("\n"),
  },
];

const QUESTIONS = [
  "What is the nightly hotel limit in a high-cost city?",
  "How often are laptops replaced?",
];

export const fileSearch: UseCase = {
  id: "file-search",
  title: "File Search",
  summary: "Upload documents, index them in a vector store and let the agent search them.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const fileIds: FileId[] = [];
      for (const doc of DOCUMENTS) {
        fileIds.push(await scope.uploadFile(doc.filename, doc.content));
        ctx.out.line(`📄 Uploaded ${doc.filename}`);
      }

      const store = await waitForIndexing(ctx, await scope.createVectorStore("company-policies", fileIds));
      ctx.out.line(`📚 Vector store ${store.name} ready (${store.fileCounts.completed} files indexed)`);
      ctx.out.line();

      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "PolicyAssistant",
          instructions: "Answer questions about company policy using only the attached documents. Cite the file name.",
          tools: [fileSearchTool],
          toolResources: { fileSearch: { vectorStoreIds: [store.id] } },
        })
      );
      const conversationId = await scope.createConversation();
      for (const question of QUESTIONS) {
        await converse(ctx, agent, conversationId, question);
      }
    }),
};

async function waitForIndexing(
  ctx: DemoContext,
  created: VectorStore
): Promise<VectorStore> {
  let store = created;
  for (let poll = 0; store.status === "in_progress"; poll++) {
    if (poll >= INDEX_MAX_POLLS) {
      throw new AgentDeckError("RESOURCE_ERROR", `Vector store ${store.id} was not indexed after ${INDEX_MAX_POLLS} polls`);
    }
    await ctx.sleep(INDEX_POLL_MS);
    store = await ctx.service.getVectorStore(store.id);
  }
  if (store.status === "expired") {
    throw new AgentDeckError("RESOURCE_ERROR", `Vector store ${store.id} expired before indexing finished`);
  }
  if (store.fileCounts.failed > 0) {
    ctx.logger.warn({ vectorStoreId: store.id, failed: store.fileCounts.failed }, "some files failed to index");
  }
  return store;
}
