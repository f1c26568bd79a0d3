import { z } from "zod";
import { defineTool } from "../tool.js";

export interface KnowledgeBaseEntry {
  readonly topic: string;
  readonly content: string;
}

/** Articles of the simulated support knowledge base. */
export const KNOWLEDGE_BASE: ReadonlyArray<KnowledgeBaseEntry> = [
  {
    topic: "refund policy",
    content:
      "Purchases can be returned for a full refund within 30 days if the item is unused and in its original packaging. Subscriptions are refunded pro rata when cancelled within the first 14 days. Open a ticket at help.example.test to start a refund.",
  },
  {
    topic: "shipping",
    content:
      "Standard delivery takes 4 to 6 business days and express delivery 1 to 2 business days. Orders above $75 ship free within the country. International delivery is offered to 35 countries.",
  },
  {
    topic: "pricing plans",
    content:
      "Starter costs $12 per month for up to 3 seats. Team costs $34 per month for up to 20 seats and includes priority email support. Enterprise is quoted per contract and adds SSO, audit logs and a named account manager.",
  },
  {
    topic: "api limits",
    content:
      "Starter accounts may send 2,000 API requests per day and Team accounts 40,000. Enterprise limits are set per contract. Every tier is throttled at 120 requests per minute.",
  },
  {
    topic: "security",
    content:
      "Data is encrypted with AES-256 at rest and TLS 1.3 in transit. The platform holds an ISO 27001 certificate and a SOC 2 Type II report, supports two-factor authentication and is penetration-tested twice a year.",
  },
  {
    topic: "contact",
    content:
      "Support is staffed Monday to Friday, 8am to 6pm CET. Reach us at support@example.test or through the in-app chat during those hours.",
  },
];

export const KnowledgeBaseArgsSchema = z.object({
  query: z.string().trim().min(1),
});

export type KnowledgeBaseResult =
  | { readonly query: string; readonly results: ReadonlyArray<KnowledgeBaseEntry> }
  | { readonly query: string; readonly message: string };

/**
 * Case-insensitive lookup: an entry matches when its topic or content
 * contains the query, or when the query mentions the topic.
 */
export function searchKnowledgeBase(
  query: string,
  entries: ReadonlyArray<KnowledgeBaseEntry> = KNOWLEDGE_BASE
): KnowledgeBaseResult {
  const needle = query.toLowerCase();
  const results = entries.filter(
    (entry) =>
      entry.topic.includes(needle) ||
      entry.content.toLowerCase().includes(needle) ||
      needle.includes(entry.topic)
  );

  if (results.length === 0) {
    return { query, message: "No relevant information found." };
  }
  return { query, results };
}

export const knowledgeBaseTool = defineTool({
  name: "search_knowledge_base",
  description:
    "Search the company knowledge base for policies, products, pricing and support topics. Call it before answering customer questions.",
  parameters: {
    type: "object",
    properties: {
      query: { type: "string", description: "The search query" },
    },
    required: ["query"],
  },
  schema: KnowledgeBaseArgsSchema,
  execute: ({ query }) => searchKnowledgeBase(query),
});
