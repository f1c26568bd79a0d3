import { azureAiSearchTool } from "@agentdeck/tools";
import type { UseCase } from "../use-case.js";
import { converse, promptLoop } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

export const azureSearchRag: UseCase = {
  id: "azure-search-rag",
  title: "Azure AI Search RAG",
  summary: "Chat with an agent grounded on an Azure AI Search index. Type 'exit' to leave.",
  interactive: true,
  run: async (ctx) => {
    const { connectionId, indexName } = ctx.config.search;
    if (!connectionId || !indexName) {
      ctx.out.line(
        "⚠️  Set search.connectionId and search.indexName (or AGENTDECK_SEARCH_CONNECTION_ID and AGENTDECK_SEARCH_INDEX) to run this use case."
      );
      return;
    }

    await scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "SearchGroundedAssistant",
          instructions:
            "Answer from the search index only. Quote the document title for each fact and say when the index has no answer.",
          tools: [azureAiSearchTool],
          toolResources: { azureAiSearch: { connectionId, indexName, topK: 5, queryType: "simple" } },
        })
      );
      const conversationId = await scope.createConversation();
      for await (const question of promptLoop(ctx, "You: ")) {
        await converse(ctx, agent, conversationId, question);
      }
    });
  },
};
