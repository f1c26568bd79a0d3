import { setTimeout as delay } from "node:timers/promises";
import type {
  AgentConfig,
  AgentService,
  ConversationId,
  MessageInput,
  Run,
  RunId,
  ToolCall,
  ToolOutput,
  ToolResultPayload,
  TurnFailure,
  TurnFailureKind,
} from "@agentdeck/types";
import { AgentServiceError, createSilentLogger, type Logger } from "@agentdeck/core";
import { serializePayload, type ToolDispatchRegistry } from "@agentdeck/tools";
import { latestAgentText, messageText } from "./run-state.js";

/** Returned as the response text when a completed run left no agent message. */
export const NO_RESPONSE = "[No response received]";

export const DEFAULT_POLL_INTERVAL_MS = 500;

/** Newest messages read back when looking for the reply to a completed run. */
export const REPLY_SCAN_LIMIT = 20;

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const realSleep: Sleep = (ms) => delay(ms);

export interface TurnRequest {
  agent: Pick<AgentConfig, "id" | "name">;
  /** Omit to start a new conversation. */
  conversationId?: ConversationId;
  message: MessageInput;
  /** Overrides the executor default for this turn. */
  timeoutMs?: number;
  /** Overrides the executor default for this turn. */
  maxToolRounds?: number;
}

export type TurnOutcome =
  | {
      readonly ok: true;
      readonly conversationId: ConversationId;
      readonly runId: RunId;
      readonly text: string;
      readonly toolRounds: number;
    }
  | {
      readonly ok: false;
      readonly conversationId: ConversationId;
      readonly runId?: RunId;
      readonly failure: TurnFailure;
    };

/** Hooks for presenting a turn while it runs. */
export interface TurnObserver {
  onToolCall?(call: ToolCall, result: ToolResultPayload): void;
}

export interface TurnExecutorOptions {
  service: AgentService;
  tools: ToolDispatchRegistry;
  logger?: Logger;
  pollIntervalMs?: number;
  /** Wall-clock limit per turn. Unbounded when absent. */
  timeoutMs?: number;
  /** Tool-output submissions allowed per turn. Unbounded when absent. */
  maxToolRounds?: number;
  observer?: TurnObserver;
  sleep?: Sleep;
  now?: Clock;
}

/**
 * Drives one conversational turn: append the user message, start a run,
 * poll it to a terminal state and resolve function calls on the way.
 *
 * Run failures, cancellation, timeouts and the tool-round cap come back as a
 * failed `TurnOutcome`. Only service errors are thrown.
 */
export class TurnExecutor {
  private readonly service: AgentService;
  private readonly tools: ToolDispatchRegistry;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs?: number;
  private readonly maxToolRounds?: number;
  private readonly observer?: TurnObserver;
  private readonly sleep: Sleep;
  private readonly now: Clock;

  constructor(opts: TurnExecutorOptions) {
    this.service = opts.service;
    this.tools = opts.tools;
    this.logger = (opts.logger ?? createSilentLogger()).child({ component: "turn" });
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = opts.timeoutMs;
    this.maxToolRounds = opts.maxToolRounds;
    this.observer = opts.observer;
    this.sleep = opts.sleep ?? realSleep;
    this.now = opts.now ?? Date.now;
  }

  /** Create a conversation for a caller that wants to own it before the first turn. */
  async openConversation(): Promise<ConversationId> {
    const conversationId = await this.service.createConversation();
    this.logger.debug({ conversationId }, "conversation created");
    return conversationId;
  }

  async executeTurn(request: TurnRequest): Promise<TurnOutcome> {
    const startedAt = this.now();
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const maxToolRounds = request.maxToolRounds ?? this.maxToolRounds;

    const conversationId = request.conversationId ?? (await this.openConversation());
    await this.service.appendMessage(conversationId, "user", request.message);

    let run = await this.service.createRun(conversationId, request.agent.id);
    const log = this.logger.child({ conversationId, runId: run.id, agent: request.agent.name });
    log.debug({ status: run.status }, "run created");

    let toolRounds = 0;
    const fail = (kind: TurnFailureKind, message: string): TurnOutcome => {
      log.warn({ kind, toolRounds }, message);
      return { ok: false, conversationId, runId: run.id, failure: { kind, message } };
    };

    for (;;) {
      await this.sleep(this.pollIntervalMs);

      const elapsed = this.now() - startedAt;
      if (timeoutMs !== undefined && elapsed > timeoutMs) {
        await this.cancelQuietly(conversationId, run.id, log);
        return fail("timeout", `Turn timed out after ${timeoutMs}ms`);
      }

      run = await this.service.getRun(conversationId, run.id);

      switch (run.status) {
        case "queued":
        case "in_progress":
          continue;

        case "requires_action": {
          const outputs = await this.resolveToolCalls(run);
          run = await this.service.submitToolOutputs(run, outputs);
          toolRounds++;
          log.debug({ toolRounds, outputs: outputs.length }, "tool outputs submitted");

          if (maxToolRounds !== undefined && toolRounds >= maxToolRounds) {
            await this.cancelQuietly(conversationId, run.id, log);
            return fail("tool_round_limit", `Exceeded ${maxToolRounds} tool rounds`);
          }
          continue;
        }

        case "completed": {
          const messages = await this.service.listMessages(conversationId, {
            order: "desc",
            limit: REPLY_SCAN_LIMIT,
          });
          const text = latestAgentText(messages);
          if (text === undefined) log.warn("run completed without an agent message");
          log.info({ toolRounds, elapsedMs: this.now() - startedAt }, "turn completed");
          return { ok: true, conversationId, runId: run.id, text: text ?? NO_RESPONSE, toolRounds };
        }

        case "failed":
          return fail("run_failed", run.lastError?.message ?? "Run failed without an error message");

        case "cancelled":
          return fail("run_cancelled", run.lastError?.message ?? "Run was cancelled");

        default: {
          const unreachable: never = run.status;
          throw new AgentServiceError("PROTOCOL_ERROR", "getRun", `Unhandled run status ${String(unreachable)}`);
        }
      }
    }
  }

  /**
   * Run a turn over the streaming API, handing each text fragment to
   * `onDelta` as it arrives. The reply is the fragments joined in order.
   * Streamed turns do not resolve tool calls: a run that pauses for them is
   * cancelled and reported as failed. Timeouts are not enforced here.
   */
  async streamTurn(request: TurnRequest, onDelta: (text: string) => void): Promise<TurnOutcome> {
    const startedAt = this.now();
    const conversationId = request.conversationId ?? (await this.openConversation());
    await this.service.appendMessage(conversationId, "user", request.message);

    let run: Run | undefined;
    const fragments: string[] = [];
    let completedText: string | undefined;
    for await (const event of this.service.createRunStream(conversationId, request.agent.id)) {
      switch (event.kind) {
        case "status":
          run = event.run;
          break;
        case "delta":
          fragments.push(event.text);
          onDelta(event.text);
          break;
        case "message":
          if (event.message.role === "agent") completedText = messageText(event.message);
          break;
      }
    }
    if (!run) {
      throw new AgentServiceError("PROTOCOL_ERROR", "createRunStream", "Stream ended before reporting the run");
    }

    const runId = run.id;
    const log = this.logger.child({ conversationId, runId, agent: request.agent.name });
    const fail = (kind: TurnFailureKind, message: string): TurnOutcome => {
      log.warn({ kind }, message);
      return { ok: false, conversationId, runId, failure: { kind, message } };
    };

    switch (run.status) {
      case "completed": {
        const text = fragments.length > 0 ? fragments.join("") : completedText;
        log.info({ fragments: fragments.length, elapsedMs: this.now() - startedAt }, "streamed turn completed");
        return { ok: true, conversationId, runId, text: text || NO_RESPONSE, toolRounds: 0 };
      }
      case "failed":
        return fail("run_failed", run.lastError?.message ?? "Run failed without an error message");
      case "cancelled":
        return fail("run_cancelled", run.lastError?.message ?? "Run was cancelled");
      case "requires_action":
        await this.cancelQuietly(conversationId, runId, log);
        return fail("run_failed", "Streamed turns cannot resolve tool calls");
      case "queued":
      case "in_progress":
        return fail("run_failed", `Stream ended while the run was ${run.status}`);
    }
  }

  /** Dispatch every pending call in order; one output per call, ids preserved. */
  private async resolveToolCalls(run: Run): Promise<ToolOutput[]> {
    const calls = run.requiredAction?.toolCalls ?? [];
    if (calls.length === 0) {
      throw new AgentServiceError("PROTOCOL_ERROR", "getRun", `Run ${run.id} requires action but lists no tool calls`);
    }

    const outputs: ToolOutput[] = [];
    for (const call of calls) {
      const result = await this.tools.dispatch(call.name, call.arguments);
      this.logger.info({ runId: run.id, tool: call.name, toolCallId: call.id }, "tool call resolved");
      this.observer?.onToolCall?.(call, result);
      outputs.push({ toolCallId: call.id, output: serializePayload(result) });
    }
    return outputs;
  }

  private async cancelQuietly(conversationId: ConversationId, runId: RunId, log: Logger): Promise<void> {
    try {
      await this.service.cancelRun(conversationId, runId);
      log.info("run cancel requested");
    } catch (err) {
      log.warn({ err }, "run cancel failed");
    }
  }
}
