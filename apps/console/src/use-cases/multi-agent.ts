import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

const TOPIC = "why small teams adopt feature flags";

export const multiAgent: UseCase = {
  id: "multi-agent",
  title: "Multi-Agent Pipeline",
  summary: "A researcher drafts notes in one conversation; a writer turns them into prose in another.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const researcher = await scope.createAgent(
        defineAgent(ctx, {
          name: "Researcher",
          instructions: "You collect facts. Reply with at most five terse bullet points and no prose.",
        })
      );
      const writer = await scope.createAgent(
        defineAgent(ctx, {
          name: "Writer",
          instructions: "You turn research notes into a short, readable paragraph for a company blog.",
        })
      );

      ctx.out.line(`🔎 ${researcher.name} is researching...`);
      const notes = await converse(
        ctx,
        researcher,
        await scope.createConversation(),
        `Research notes on ${TOPIC}.`
      );
      if (!notes.ok) return;

      ctx.out.line(`✍️  ${writer.name} is drafting...`);
      await converse(
        ctx,
        writer,
        await scope.createConversation(),
        `Write a short blog paragraph from these notes:\n${notes.text}`
      );
    }),
};
