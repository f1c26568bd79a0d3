import { codeInterpreterTool } from "@agentdeck/tools";
import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

export const codeInterpreter: UseCase = {
  id: "code-interpreter",
  title: "Code Interpreter",
  summary: "The service writes and runs code in its own sandbox; nothing executes locally.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "DataAnalyst",
          instructions:
            "You analyse numbers. Use the code interpreter for every calculation and show the code you ran.",
          tools: [codeInterpreterTool],
        })
      );
      const conversationId = await scope.createConversation();
      await converse(
        ctx,
        agent,
        conversationId,
        "Here are weekly sign-ups: 120, 135, 98, 160, 142, 171. Compute the mean, the median and the week-over-week growth."
      );
    }),
};
