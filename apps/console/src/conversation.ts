import type { AgentConfig, ConversationId, MessageInput } from "@agentdeck/types";
import type { TurnOutcome } from "@agentdeck/runtime";
import type { DemoContext } from "./context.js";
import { describeInput, formatHistoryEntry, formatReply } from "./render.js";

export const DEFAULT_HISTORY_SIZE = 10;

/**
 * Send one user message and print the exchange. Failures are printed, not
 * thrown: service errors still propagate.
 */
export async function converse(
  ctx: DemoContext,
  agent: AgentConfig,
  conversationId: ConversationId,
  message: MessageInput
): Promise<TurnOutcome> {
  ctx.out.line(`[You]: ${describeInput(message)}`);
  const outcome = await ctx.executor.executeTurn({ agent, conversationId, message });
  if (outcome.ok) {
    ctx.out.line(`[Agent]: ${formatReply(outcome.text)}`);
  } else {
    ctx.out.line(`[Error] ${outcome.failure.kind}: ${outcome.failure.message}`);
  }
  ctx.out.line();
  return outcome;
}

/**
 * Like `converse`, but the reply is printed fragment by fragment while the
 * service generates it.
 */
export async function converseStreaming(
  ctx: DemoContext,
  agent: AgentConfig,
  conversationId: ConversationId,
  message: MessageInput
): Promise<TurnOutcome> {
  ctx.out.line(`[You]: ${describeInput(message)}`);
  let started = false;
  const outcome = await ctx.executor.streamTurn({ agent, conversationId, message }, (text) => {
    if (!started) ctx.out.write("[Agent]: ");
    started = true;
    ctx.out.write(text);
  });

  if (outcome.ok) {
    ctx.out.line(started ? "" : `[Agent]: ${outcome.text}`);
  } else {
    if (started) ctx.out.line();
    ctx.out.line(`[Error] ${outcome.failure.kind}: ${outcome.failure.message}`);
  }
  ctx.out.line();
  return outcome;
}

/** Print the last `count` messages of a conversation, oldest first. */
export async function showHistory(
  ctx: DemoContext,
  conversationId: ConversationId,
  count = DEFAULT_HISTORY_SIZE
): Promise<void> {
  const messages = await ctx.service.listMessages(conversationId, { order: "asc" });
  const recent = messages.slice(-count);
  if (recent.length === 0) {
    ctx.out.line("(no messages yet)");
    return;
  }
  ctx.out.line(`Last ${recent.length} of ${messages.length} messages:`);
  for (const message of recent) ctx.out.line(formatHistoryEntry(message));
}

/**
 * Prompt until the user types one of `stopWords` or input runs out.
 * Blank lines are skipped.
 */
export async function* promptLoop(
  ctx: DemoContext,
  prompt: string,
  stopWords: ReadonlyArray<string> = ["exit", "quit"]
): AsyncGenerator<string> {
  for (;;) {
    const answer = await ctx.input.ask(prompt);
    if (answer === undefined) return;
    const line = answer.trim();
    if (line === "") continue;
    if (stopWords.includes(line.toLowerCase())) return;
    yield line;
  }
}
