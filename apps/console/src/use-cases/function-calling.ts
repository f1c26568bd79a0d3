import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

const QUESTIONS = [
  "What's the weather in Seattle?",
  "What is the current stock price of MSFT?",
  "Compare the weather in London and Tokyo.",
];

export const functionCalling: UseCase = {
  id: "function-calling",
  title: "Function Calling",
  summary: "The agent requests local functions; the harness runs them and submits the results.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "WeatherAndMarkets",
          instructions:
            "You answer weather and stock questions. Always call the matching function instead of guessing.",
          tools: ctx.tools.definitions(["get_weather", "get_stock_price"]),
        })
      );
      const conversationId = await scope.createConversation();
      for (const question of QUESTIONS) {
        await converse(ctx, agent, conversationId, question);
      }
    }),
};
