import type { UseCase } from "../use-case.js";
import { converseStreaming } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

export const STREAMING_QUESTIONS = [
  "Tell the history of the printing press as a short story.",
  "Compare polling and streaming for chat interfaces in three bullet points.",
];

export const streaming: UseCase = {
  id: "streaming",
  title: "Streaming Responses",
  summary: "Replies are printed while the agent is still writing them.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "Storyteller",
          instructions:
            "You are a storyteller who explains technical topics vividly. Use short paragraphs and markdown lists where they help.",
        })
      );
      const conversationId = await scope.createConversation();
      for (const question of STREAMING_QUESTIONS) {
        await converseStreaming(ctx, agent, conversationId, question);
      }
    }),
};
