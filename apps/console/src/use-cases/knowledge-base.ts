import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

const QUESTIONS = [
  "What is your refund policy?",
  "How long does shipping take to Canada?",
  "Which subscription plans do you offer?",
];

export const knowledgeBase: UseCase = {
  id: "knowledge-base",
  title: "Knowledge Base Agent",
  summary: "A support agent grounded on a small local knowledge base exposed as a function.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "SupportDesk",
          instructions:
            "You are a customer support agent. Answer only from search_knowledge_base results and say so when nothing matches.",
          tools: ctx.tools.definitions(["search_knowledge_base"]),
        })
      );
      const conversationId = await scope.createConversation();
      for (const question of QUESTIONS) {
        await converse(ctx, agent, conversationId, question);
      }
    }),
};
