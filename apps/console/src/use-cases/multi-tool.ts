import { codeInterpreterTool } from "@agentdeck/tools";
import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

const QUESTIONS = [
  "What's the weather in Paris and the stock price of NVDA?",
  "Calculate (1250 * 0.15) + 40",
  "Look up employee EMP-001 and tell me their department.",
];

export const multiTool: UseCase = {
  id: "multi-tool",
  title: "Multi-Tool Agent",
  summary: "Every local function plus the code interpreter on one agent; one turn may call several tools.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "OperationsCopilot",
          instructions:
            "You help an operations team. Pick the right tools, call several in one step when a question needs them, and summarise the results.",
          tools: [...ctx.tools.definitions(), codeInterpreterTool],
        })
      );
      const conversationId = await scope.createConversation();
      for (const question of QUESTIONS) {
        await converse(ctx, agent, conversationId, question);
      }
    }),
};
