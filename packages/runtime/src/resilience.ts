import type { ConversationId } from "@agentdeck/types";
import {
  AgentServiceError,
  TurnFailedError,
  createSilentLogger,
  errorMessage,
  type Logger,
} from "@agentdeck/core";
import { ExponentialBackoff, handleWhen, noJitterGenerator, retry as retryPolicy } from "cockatiel";
import type { TurnExecutor, TurnRequest } from "./turn-executor.js";

/** Shown in place of a reply once every attempt at a turn has failed. */
export const FALLBACK_RESPONSE = "[Service temporarily unavailable. Please try again later.]";

/** What `retry` does after the last failed attempt. */
export type ExhaustionPolicy<T> =
  | { readonly kind: "propagate" }
  | { readonly kind: "fallback"; readonly value: T };

export interface RetryAttempt {
  readonly operationName: string;
  /** The attempt that just failed. */
  readonly attempt: number;
  readonly maxAttempts: number;
  /** Wait before the next attempt. */
  readonly delayMs: number;
  readonly error: unknown;
}

export interface RetryOptions<T> {
  maxAttempts: number;
  baseDelayMs: number;
  operationName: string;
  onExhausted: ExhaustionPolicy<T>;
  /** Errors for which this returns false end the retry loop at once. */
  shouldRetry?: (err: unknown) => boolean;
  /** Called before each wait, e.g. to print progress. */
  onRetry?: (attempt: RetryAttempt) => void;
  logger?: Logger;
}

/**
 * Run `operation` up to `maxAttempts` times. The wait before attempt n (n ≥ 2)
 * is base × 2^(n-2), without jitter. The operation receives the 1-based
 * attempt number.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<T>
): Promise<T> {
  const { maxAttempts, baseDelayMs, operationName, onExhausted } = options;
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  const logger = (options.logger ?? createSilentLogger()).child({ component: "retry", operation: operationName });
  const shouldRetry = options.shouldRetry ?? (() => true);

  // cockatiel counts retries, not attempts.
  const policy = retryPolicy(
    handleWhen((err) => {
      if (shouldRetry(err)) return true;
      logger.warn({ reason: errorMessage(err) }, "error is not retryable");
      return false;
    }),
    {
      maxAttempts: maxAttempts - 1,
      backoff: new ExponentialBackoff({
        initialDelay: baseDelayMs,
        maxDelay: Number.MAX_SAFE_INTEGER,
        exponent: 2,
        generator: noJitterGenerator,
      }),
    }
  );

  const subscription = policy.onRetry((reason) => {
    const error = "error" in reason ? reason.error : reason.value;
    logger.warn(
      { attempt: reason.attempt, maxAttempts, delayMs: reason.delay, reason: errorMessage(error) },
      "attempt failed, retrying"
    );
    options.onRetry?.({ operationName, attempt: reason.attempt, maxAttempts, delayMs: reason.delay, error });
  });

  try {
    return await policy.execute(({ attempt }) => operation(attempt + 1));
  } catch (err) {
    switch (onExhausted.kind) {
      case "fallback":
        logger.error({ reason: errorMessage(err) }, "attempts exhausted, using fallback");
        return onExhausted.value;
      case "propagate":
        logger.error({ reason: errorMessage(err) }, "attempts exhausted");
        throw err;
    }
  } finally {
    subscription.dispose();
  }
}

/**
 * Default retry predicate: service errors carry their own verdict, anything
 * else (including failed turns) is worth another attempt.
 */
export function isRetryable(err: unknown): boolean {
  return err instanceof AgentServiceError ? err.retryable : true;
}

export interface ResilientTurnOptions {
  /** Default 2. */
  maxAttempts?: number;
  /** Wall-clock limit per attempt. Default 60 s. */
  timeoutMs?: number;
  /** Default 1000 ms. */
  baseDelayMs?: number;
  maxToolRounds?: number;
  /** Default `FALLBACK_RESPONSE`. */
  fallback?: string;
  onRetry?: (attempt: RetryAttempt) => void;
  logger?: Logger;
}

export interface ResilientTurnResult {
  readonly text: string;
  /** Absent only when no attempt got as far as creating a conversation. */
  readonly conversationId?: ConversationId;
  readonly attempts: number;
  readonly usedFallback: boolean;
}

export const DEFAULT_TURN_TIMEOUT_MS = 60_000;
export const DEFAULT_TURN_ATTEMPTS = 2;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

/**
 * `executeTurn` under retry with the fallback policy. A failed outcome counts
 * as a failed attempt. Every attempt runs in the conversation opened by the
 * first one and appends the user message again.
 */
export async function executeTurnWithRetry(
  executor: TurnExecutor,
  request: TurnRequest,
  options: ResilientTurnOptions = {}
): Promise<ResilientTurnResult> {
  let conversationId = request.conversationId;
  let attempts = 0;
  let succeeded = false;

  const text = await retry(
    async (attempt) => {
      attempts = attempt;
      conversationId ??= await executor.openConversation();
      const outcome = await executor.executeTurn({
        ...request,
        conversationId,
        timeoutMs: options.timeoutMs ?? request.timeoutMs ?? DEFAULT_TURN_TIMEOUT_MS,
        maxToolRounds: options.maxToolRounds ?? request.maxToolRounds,
      });
      if (!outcome.ok) throw new TurnFailedError(outcome.failure, outcome.conversationId);
      succeeded = true;
      return outcome.text;
    },
    {
      maxAttempts: options.maxAttempts ?? DEFAULT_TURN_ATTEMPTS,
      baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
      operationName: "executeTurn",
      onExhausted: { kind: "fallback", value: options.fallback ?? FALLBACK_RESPONSE },
      onRetry: options.onRetry,
      logger: options.logger,
    }
  );

  return { text, conversationId, attempts, usedFallback: !succeeded };
}
