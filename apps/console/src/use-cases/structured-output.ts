import type { JsonSchemaResponseFormat } from "@agentdeck/types";
import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

export const REVIEW_FORMAT: JsonSchemaResponseFormat = {
  type: "json_schema",
  jsonSchema: {
    name: "review_analysis",
    strict: true,
    schema: {
      type: "object",
      properties: {
        sentiment: { type: "string", enum: ["positive", "mixed", "negative"] },
        score: { type: "integer", description: "1 to 5" },
        pros: { type: "array", items: { type: "string" } },
        cons: { type: "array", items: { type: "string" } },
        wouldRecommend: { type: "boolean" },
      },
      required: ["sentiment", "score", "pros", "cons", "wouldRecommend"],
      additionalProperties: false,
    },
  },
};

const REVIEW =
  "The kettle boils fast and looks great on the counter, but the lid sticks and the handle gets warm. For the price I'd still buy it again.";

export const structuredOutput: UseCase = {
  id: "structured-output",
  title: "Structured Output",
  summary: "A JSON schema on the agent forces replies into a fixed shape.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "ReviewAnalyzer",
          instructions: "Analyse product reviews. Reply only with JSON matching the response schema.",
          responseFormat: REVIEW_FORMAT,
        })
      );
      const conversationId = await scope.createConversation();
      await converse(ctx, agent, conversationId, `Analyse this review: ${REVIEW}`);
    }),
};
