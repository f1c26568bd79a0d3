import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

const QUESTIONS = [
  "Hi! My name is Priya. What kinds of questions can you help with?",
  "Give me two tips for writing clear commit messages.",
  "What is my name?",
];

export const basicConversation: UseCase = {
  id: "basic-conversation",
  title: "Basic Conversation",
  summary: "One agent, one conversation, several turns that build on each other.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "GeneralAssistant",
          instructions: "You are a friendly, concise assistant. Keep answers under five sentences.",
        })
      );
      const conversationId = await scope.createConversation();
      for (const question of QUESTIONS) {
        await converse(ctx, agent, conversationId, question);
      }
    }),
};
