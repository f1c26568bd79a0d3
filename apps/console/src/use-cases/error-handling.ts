import type { AgentConfig, AgentDefinition, ConversationId } from "@agentdeck/types";
import { errorMessage } from "@agentdeck/core";
import {
  executeTurnWithRetry,
  isRetryable,
  retry,
  type ResourceScope,
  type RetryAttempt,
} from "@agentdeck/runtime";
import type { DemoContext } from "../context.js";
import type { UseCase } from "../use-case.js";
import { converse } from "../conversation.js";
import { formatReply } from "../render.js";
import { defineAgent, scoped } from "./shared.js";

const RESILIENT_QUESTIONS = ["What's the weather in Oslo?", "Summarise what you just told me in one line."];

const RECORD_QUESTIONS = [
  "Look up employee EMP-001.",
  "What is the status of order ORD-555?",
  "Find employee EMP-999.",
];

/** Tight enough that the first poll already exceeds it. */
const FORCED_TIMEOUT_MS = 1;

export const errorHandling: UseCase = {
  id: "error-handling",
  title: "Error Handling & Retry",
  summary: "Retried agent creation, timed turns with a fallback, and tool errors the agent can explain.",
  run: (ctx) =>
    scoped(ctx, async (scope) => {
      ctx.out.line("1) Agent creation with backoff, then turns with a timeout and retry");
      const assistant = await createAgentWithRetry(
        ctx,
        scope,
        defineAgent(ctx, {
          name: "ResilientAssistant",
          instructions: "You are a concise assistant. Use get_weather for weather questions.",
          tools: ctx.tools.definitions(["get_weather"]),
        })
      );
      const conversationId = await scope.createConversation();
      for (const question of RESILIENT_QUESTIONS) {
        await resilientTurn(ctx, assistant, conversationId, question, ctx.config.turn.timeoutMs);
      }

      ctx.out.line("2) Tool errors are returned to the agent as data");
      const records = await scope.createAgent(
        defineAgent(ctx, {
          name: "DatabaseAssistant",
          instructions:
            "You look up records with get_database_record. Employee ids start with EMP-, order ids with ORD-. Explain lookup errors plainly.",
          tools: ctx.tools.definitions(["get_database_record"]),
        })
      );
      const recordConversation = await scope.createConversation();
      for (const question of RECORD_QUESTIONS) {
        await converse(ctx, records, recordConversation, question);
      }

      ctx.out.line(`3) A ${FORCED_TIMEOUT_MS}ms timeout exhausts every attempt and yields the fallback`);
      await resilientTurn(ctx, assistant, await scope.createConversation(), "Tell me a short joke.", FORCED_TIMEOUT_MS);
    }),
};

function createAgentWithRetry(
  ctx: DemoContext,
  scope: ResourceScope,
  definition: AgentDefinition
): Promise<AgentConfig> {
  return retry(() => scope.createAgent(definition), {
    maxAttempts: ctx.config.retry.maxAttempts,
    baseDelayMs: ctx.config.retry.baseDelayMs,
    operationName: "createAgent",
    onExhausted: { kind: "propagate" },
    shouldRetry: isRetryable,
    onRetry: (attempt) => printRetry(ctx, attempt),
    logger: ctx.logger,
  });
}

async function resilientTurn(
  ctx: DemoContext,
  agent: AgentConfig,
  conversationId: ConversationId,
  message: string,
  timeoutMs: number
): Promise<void> {
  ctx.out.line(`[You]: ${message}`);
  const result = await executeTurnWithRetry(
    ctx.executor,
    { agent, conversationId, message },
    {
      maxAttempts: ctx.config.turn.maxAttempts,
      timeoutMs,
      baseDelayMs: ctx.config.retry.baseDelayMs,
      onRetry: (attempt) => printRetry(ctx, attempt),
      logger: ctx.logger,
    }
  );
  const note = result.usedFallback ? ` (fallback after ${result.attempts} attempts)` : "";
  ctx.out.line(`[Agent]: ${formatReply(result.text)}${note}`);
  ctx.out.line();
}

function printRetry(ctx: DemoContext, attempt: RetryAttempt): void {
  ctx.out.line(
    `  ↻ ${attempt.operationName} attempt ${attempt.attempt}/${attempt.maxAttempts} failed (${errorMessage(attempt.error)}); retrying in ${attempt.delayMs}ms`
  );
}
