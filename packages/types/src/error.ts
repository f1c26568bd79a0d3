/**
 * Error codes shared by every agentdeck package.
 * String union rather than a numeric enum for debuggability.
 */
export type AgentDeckErrorCode =
  | "TRANSPORT_ERROR"     // Network failure before a response arrived
  | "HTTP_ERROR"          // Service answered with a non-2xx status
  | "PROTOCOL_ERROR"      // Response did not match the expected wire shape
  | "TURN_FAILED"         // A turn ended without a usable response
  | "CONFIG_ERROR"        // Configuration file or environment is invalid
  | "RESOURCE_ERROR"      // A remote resource never became usable
  | "INTERNAL_ERROR";     // Unexpected local failure

/** Why a turn ended without a response. */
export type TurnFailureKind =
  | "run_failed"
  | "run_cancelled"
  | "timeout"
  | "tool_round_limit";

export interface TurnFailure {
  readonly kind: TurnFailureKind;
  readonly message: string;
}
