import type { Message, RunStatus, TerminalRunStatus } from "@agentdeck/types";

const TERMINAL: ReadonlySet<RunStatus> = new Set<RunStatus>(["completed", "failed", "cancelled"]);

export function isTerminal(status: RunStatus): status is TerminalRunStatus {
  return TERMINAL.has(status);
}

/** Concatenated text blocks of a message; image blocks are skipped. */
export function messageText(message: Message): string {
  return message.content
    .flatMap((block) => (block.type === "text" ? [block.text] : []))
    .join("\n");
}

/**
 * Text of the most recent agent message.
 * Expects `messages` newest-first, as listed with `order: "desc"`.
 */
export function latestAgentText(messages: ReadonlyArray<Message>): string | undefined {
  const reply = messages.find((message) => message.role === "agent");
  return reply ? messageText(reply) : undefined;
}
