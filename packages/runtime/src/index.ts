export {
  TurnExecutor,
  NO_RESPONSE,
  DEFAULT_POLL_INTERVAL_MS,
  REPLY_SCAN_LIMIT,
  realSleep,
} from "./turn-executor.js";
export type {
  TurnRequest,
  TurnOutcome,
  TurnObserver,
  TurnExecutorOptions,
  Sleep,
  Clock,
} from "./turn-executor.js";
export {
  retry,
  isRetryable,
  executeTurnWithRetry,
  FALLBACK_RESPONSE,
  DEFAULT_TURN_TIMEOUT_MS,
  DEFAULT_TURN_ATTEMPTS,
  DEFAULT_RETRY_BASE_DELAY_MS,
} from "./resilience.js";
export type {
  ExhaustionPolicy,
  RetryAttempt,
  RetryOptions,
  ResilientTurnOptions,
  ResilientTurnResult,
} from "./resilience.js";
export { ResourceScope, withResources } from "./resource-scope.js";
export type { ResourceRef, ReleaseReport, ResourceScopeOptions } from "./resource-scope.js";
export { isTerminal, messageText, latestAgentText } from "./run-state.js";
export { RestAgentService, toRun } from "./rest-agent-service.js";
export type { RestAgentServiceOptions } from "./rest-agent-service.js";
export { MockAgentService } from "./mock-agent-service.js";
export type { MockAgentServiceOptions, MockOperation } from "./mock-agent-service.js";
export { planRun, composeReply, detectToolCalls, sampleFromSchema } from "./mock-planner.js";
export type {
  ScriptedStep,
  MockToolCallSpec,
  ReplyContext,
  PlanContext,
  RunPlanner,
  SubmittedOutput,
} from "./mock-planner.js";
