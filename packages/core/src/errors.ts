import type { AgentDeckErrorCode, ConversationId, TurnFailure } from "@agentdeck/types";

/**
 * Base error class for all agentdeck errors.
 * `code` is a discriminant for exhaustive handling at call sites.
 */
export class AgentDeckError extends Error {
  readonly code: AgentDeckErrorCode;

  constructor(code: AgentDeckErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentDeckError";
    this.code = code;
  }
}

/** A remote call to the agent service failed. */
export class AgentServiceError extends AgentDeckError {
  /** The service operation that failed, e.g. "createRun". */
  readonly operation: string;
  /** HTTP status, when the service answered at all. */
  readonly status?: number;
  /** Whether repeating the same call may succeed. */
  readonly retryable: boolean;

  constructor(
    code: Extract<AgentDeckErrorCode, "TRANSPORT_ERROR" | "HTTP_ERROR" | "PROTOCOL_ERROR">,
    operation: string,
    message: string,
    options: { status?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(code, `${operation}: ${message}`, { cause: options.cause });
    this.name = "AgentServiceError";
    this.operation = operation;
    this.status = options.status;
    this.retryable = options.retryable ?? code === "TRANSPORT_ERROR";
  }
}

/** A turn ended without a usable response (failed, cancelled, timed out, or looped). */
export class TurnFailedError extends AgentDeckError {
  readonly failure: TurnFailure;
  readonly conversationId?: ConversationId;

  constructor(failure: TurnFailure, conversationId?: ConversationId) {
    super("TURN_FAILED", failure.message);
    this.name = "TurnFailedError";
    this.failure = failure;
    this.conversationId = conversationId;
  }
}

export class ConfigError extends AgentDeckError {
  readonly issues: ReadonlyArray<string>;

  constructor(message: string, issues: ReadonlyArray<string> = []) {
    super("CONFIG_ERROR", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Best human-readable message for anything that was thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    const json = JSON.stringify(err);
    return typeof json === "string" ? json : String(err);
  } catch {
    return String(err);
  }
}
