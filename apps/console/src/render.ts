import type { Message, MessageInput, ToolCall, ToolResultPayload } from "@agentdeck/types";
import { messageText } from "@agentdeck/runtime";
import { isToolError } from "@agentdeck/tools";

const RULE_WIDTH = 60;

export function banner(title: string): string {
  const head = `── ${title} `;
  return head + "─".repeat(Math.max(3, RULE_WIDTH - head.length));
}

/** Pretty-print replies that are JSON documents; anything else is returned as is. */
export function formatReply(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) return text;
  try {
    return JSON.stringify(JSON.parse(trimmed), null, 2);
  } catch {
    return text;
  }
}

export function describeInput(input: MessageInput): string {
  if (typeof input === "string") return input;
  return input
    .map((block) => (block.type === "text" ? block.text : `[image: ${block.url}]`))
    .join(" ");
}

export function formatToolCall(call: ToolCall, result: ToolResultPayload): string {
  if (isToolError(result)) {
    const details = result.details ? ` (${result.details})` : "";
    return `  ⚠ ${call.name}(${call.arguments}) failed: ${result.error}${details}`;
  }
  return `  ⚙ ${call.name}(${call.arguments}) → ${truncate(JSON.stringify(result), 160)}`;
}

export function formatHistoryEntry(message: Message): string {
  return `[${message.role === "user" ? "You" : "Agent"}]: ${messageText(message)}`;
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}
