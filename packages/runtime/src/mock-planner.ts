import type { AgentConfig, ImageUrlContent, Message } from "@agentdeck/types";
import { KNOWLEDGE_BASE, REFERENCE_PRICES } from "@agentdeck/tools";
import { messageText } from "./run-state.js";

export interface MockToolCallSpec {
  readonly name: string;
  /** Raw JSON document, or an object to serialize. */
  readonly arguments?: string | Readonly<Record<string, unknown>>;
}

export interface SubmittedOutput {
  readonly name: string;
  readonly arguments: string;
  readonly output: string;
}

export interface ReplyContext {
  readonly agent: AgentConfig;
  /** Conversation so far, oldest first. */
  readonly messages: ReadonlyArray<Message>;
  /** Outputs submitted during this run, in submission order. */
  readonly toolOutputs: ReadonlyArray<SubmittedOutput>;
}

/**
 * One step of a simulated run. Each poll of the run consumes at most one
 * step; `requires_action` holds until outputs are submitted.
 */
export type ScriptedStep =
  | { readonly kind: "working"; readonly polls?: number }
  | { readonly kind: "tool_calls"; readonly calls: ReadonlyArray<MockToolCallSpec> }
  | { readonly kind: "reply"; readonly text: string | ((ctx: ReplyContext) => string) }
  | { readonly kind: "complete" }
  | { readonly kind: "fail"; readonly message: string; readonly code?: string }
  | { readonly kind: "cancel"; readonly message?: string }
  | { readonly kind: "stall" };

export interface PlanContext {
  readonly agent: AgentConfig;
  readonly messages: ReadonlyArray<Message>;
}

export type RunPlanner = (ctx: PlanContext) => ScriptedStep[];

/**
 * Default offline planner. Pattern-matches the latest user message:
 * requests the declared tools can answer become one round of tool calls,
 * everything else gets a canned reply.
 *
 * Supported patterns:
 * - "weather in Seattle and Tokyo"        → get_weather per city
 * - "stock price of MSFT"                 → get_stock_price per known ticker
 * - "refund policy", "shipping", ...       → search_knowledge_base per topic
 * - "calculate (2+3)*4"                   → calculate
 * - "EMP-001", "ORD-555"                  → get_database_record
 * - "My name is X" / "What is my name?"   → remembers X from the conversation
 */
export const planRun: RunPlanner = (ctx) => {
  const latest = [...ctx.messages].reverse().find((m) => m.role === "user");
  const text = latest ? messageText(latest) : "";
  const calls = detectToolCalls(text, declaredFunctions(ctx.agent));

  if (calls.length === 0) {
    return [{ kind: "working" }, { kind: "reply", text: composeReply }];
  }
  return [
    { kind: "working" },
    { kind: "tool_calls", calls },
    { kind: "working" },
    { kind: "reply", text: composeReply },
  ];
};

function declaredFunctions(agent: AgentConfig): Set<string> {
  const names = new Set<string>();
  for (const tool of agent.tools ?? []) {
    if (tool.type === "function") names.add(tool.function.name);
  }
  return names;
}

const KNOWLEDGE_KEYWORDS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\brefunds?\b|\breturns?\b/i, "refund policy"],
  [/\bshipping\b|\bdeliver(y|ies)?\b/i, "shipping"],
  [/\bpricing\b|\bplans?\b|\bsubscriptions?\b/i, "pricing plans"],
  [/\bapi\b|\brate limits?\b/i, "api limits"],
  [/\bsecurity\b|\bencrypt(ed|ion)?\b/i, "security"],
  [/\bcontact\b|\bsupport hours\b|\breach (you|support)\b/i, "contact"],
];

export function detectToolCalls(text: string, declared: ReadonlySet<string>): MockToolCallSpec[] {
  const calls: MockToolCallSpec[] = [];

  if (declared.has("get_weather") && /\bweather\b/i.test(text)) {
    for (const match of text.matchAll(/\b(?:in|for|and)\s+([A-Z][a-z]+(?:\s[A-Z][a-z]+)*)/g)) {
      const city = match[1];
      if (city) calls.push({ name: "get_weather", arguments: { city } });
    }
  }

  if (declared.has("get_stock_price") && /\b(stocks?|shares?|price|ticker|trading)\b/i.test(text)) {
    const symbols = new Set(
      [...text.matchAll(/\b[A-Z]{2,5}\b/g)].map((m) => m[0]).filter((s) => s in REFERENCE_PRICES)
    );
    for (const symbol of symbols) calls.push({ name: "get_stock_price", arguments: { symbol } });
  }

  if (declared.has("search_knowledge_base")) {
    const known = new Set(KNOWLEDGE_BASE.map((entry) => entry.topic));
    for (const [pattern, topic] of KNOWLEDGE_KEYWORDS) {
      if (known.has(topic) && pattern.test(text)) {
        calls.push({ name: "search_knowledge_base", arguments: { query: topic } });
      }
    }
  }

  if (declared.has("calculate")) {
    const match = /\b(?:calculate|compute|evaluate|what is|what's)\s+([-+*/%().\d\s]*\d[-+*/%().\d\s]*)/i.exec(text);
    const expression = match?.[1]?.trim();
    if (expression && /\d\s*[-+*/%]\s*[\d(.-]/.test(expression)) {
      calls.push({ name: "calculate", arguments: { expression } });
    }
  }

  if (declared.has("get_database_record")) {
    for (const match of text.matchAll(/\b(EMP|ORD)-\d+\b/gi)) {
      const recordId = match[0].toUpperCase();
      const table = recordId.startsWith("EMP") ? "employees" : "orders";
      calls.push({ name: "get_database_record", arguments: { recordId, table } });
    }
  }

  return calls;
}

/** Reply for the end of a planned run. */
export function composeReply(ctx: ReplyContext): string {
  const format = ctx.agent.responseFormat;
  if (format) return JSON.stringify(sampleFromSchema(format.jsonSchema.schema));
  if (ctx.toolOutputs.length > 0) return summariseOutputs(ctx.toolOutputs);

  const latest = [...ctx.messages].reverse().find((m) => m.role === "user");
  const text = latest ? messageText(latest) : "";
  const images = (latest?.content ?? []).filter(
    (block): block is ImageUrlContent => block.type === "image_url"
  );

  if (images.length > 0) {
    const urls = images.map((image) => image.url).join(", ");
    return `I received ${images.length === 1 ? "an image" : `${images.length} images`} (${urls}) with the question "${text}". Image analysis needs the live service.`;
  }

  const introduced = /\bmy name is (\w+)/i.exec(text);
  if (introduced) return `Nice to meet you, ${introduced[1]}!`;

  if (/\bwhat(?:'s| is) my name\b/i.test(text)) {
    for (const message of ctx.messages) {
      if (message.role !== "user") continue;
      const earlier = /\bmy name is (\w+)/i.exec(messageText(message));
      if (earlier) return `Your name is ${earlier[1]}.`;
    }
    return "I don't know your name yet.";
  }

  const builtin = (ctx.agent.tools ?? []).find((tool) => tool.type !== "function");
  if (builtin) {
    return `The ${builtin.type} tool runs inside the live service and is not available offline. You asked: "${text}"`;
  }

  return `You said: "${text}"`;
}

function summariseOutputs(outputs: ReadonlyArray<SubmittedOutput>): string {
  const lines = outputs.map(({ name, output }) => {
    const payload = parseRecord(output);
    if (!payload) return `${name}: ${output}`;
    if (typeof payload.error === "string") {
      return typeof payload.details === "string"
        ? `${name} failed: ${payload.error} (${payload.details})`
        : `${name} failed: ${payload.error}`;
    }
    const fields = Object.entries(payload).map(([key, value]) =>
      typeof value === "object" && value !== null ? `${key}: ${JSON.stringify(value)}` : `${key}: ${String(value)}`
    );
    return `${name}: ${fields.join(", ")}`;
  });
  return ["Here is what I found:", ...lines.map((line) => `- ${line}`)].join("\n");
}

/** A minimal value that satisfies a JSON schema, for structured-output replies. */
export function sampleFromSchema(schema: unknown): unknown {
  if (!isRecord(schema)) return null;

  if (Array.isArray(schema.enum) && schema.enum.length > 0) return schema.enum[0];

  switch (schema.type) {
    case "object": {
      const properties = isRecord(schema.properties) ? schema.properties : {};
      return Object.fromEntries(
        Object.entries(properties).map(([key, value]) => [key, sampleFromSchema(value)])
      );
    }
    case "array":
      return [sampleFromSchema(schema.items)];
    case "string":
      return "sample";
    case "number":
    case "integer":
      return 0;
    case "boolean":
      return false;
    default:
      return null;
  }
}

function parseRecord(json: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(json);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
