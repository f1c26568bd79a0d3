import type { JsonSchemaResponseFormat } from "@agentdeck/types";
import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { defineAgent, scoped } from "./shared.js";

export interface InboundEvent {
  readonly id: string;
  readonly source: "email" | "monitoring" | "ticket";
  readonly body: string;
}

export const SAMPLE_EVENTS: ReadonlyArray<InboundEvent> = [
  {
    id: "evt-101",
    source: "email",
    body: "Subject: Invoice 8841 charged twice. Customer asks for the duplicate charge to be reversed.",
  },
  {
    id: "evt-102",
    source: "monitoring",
    body: "checkout-api p95 latency 4.2s (threshold 1.5s) for 10 minutes in eu-west.",
  },
  {
    id: "evt-103",
    source: "ticket",
    body: "User cannot reset password: reset email never arrives. Tried three times today.",
  },
  {
    id: "evt-104",
    source: "email",
    body: "Subject: Partnership idea. A podcast host wants to feature our CTO next month.",
  },
  {
    id: "evt-105",
    source: "monitoring",
    body: "Disk usage on db-replica-2 at 91% and rising 2% per hour.",
  },
];

const TRIAGE_FORMAT: JsonSchemaResponseFormat = {
  type: "json_schema",
  jsonSchema: {
    name: "event_triage",
    strict: true,
    schema: {
      type: "object",
      properties: {
        eventId: { type: "string" },
        severity: { type: "string", enum: ["low", "medium", "high", "critical"] },
        category: { type: "string", enum: ["billing", "incident", "account", "other"] },
        summary: { type: "string" },
        routeTo: { type: "string" },
      },
      required: ["eventId", "severity", "category", "summary", "routeTo"],
      additionalProperties: false,
    },
  },
};

export const eventDriven: UseCase = {
  id: "event-driven",
  title: "Event-Driven Triage",
  summary: "Inbound events are triaged one by one, each in a conversation of its own.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      const agent = await scope.createAgent(
        defineAgent(ctx, {
          name: "TriageAgent",
          instructions:
            "You triage operational events. Classify severity and category, summarise in one sentence and name the team to route to.",
          responseFormat: TRIAGE_FORMAT,
        })
      );
      for (const event of SAMPLE_EVENTS) {
        ctx.out.line(`📨 ${event.id} from ${event.source}`);
        const conversationId = await scope.createConversation();
        await converse(ctx, agent, conversationId, `Event ${event.id} (${event.source}): ${event.body}`);
      }
    }),
};
