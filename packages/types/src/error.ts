/**
 * Error codes for all Switchboard errors.
 * Uses discriminated union pattern for exhaustive error handling.
 */
export type SwitchboardErrorCode =
  | "ROUTING_ERROR"       // Tool call matches no handoff/escalate/registered tool
  | "GRAPH_CONFIG_ERROR"  // Topology rejected at construction
  | "RETRY_EXHAUSTED"     // Model kept returning empty output
  | "TIMEOUT"             // Model or tool call exceeded its time limit
  | "RECURSION_LIMIT"     // A single turn ran more steps than allowed
  | "CONTRACT_VIOLATION"  // Message log invariant broken
  | "MODEL_ERROR"         // Provider request failed or returned garbage
  | "TOOL_NOT_FOUND"      // Tool name not registered for the agent
  | "CONFIG_ERROR"        // Config file unreadable or invalid
  | "CHECKPOINT_ERROR";   // Stored snapshot unreadable

export interface SwitchboardErrorShape {
  readonly code: SwitchboardErrorCode;
  readonly message: string;
  /** The original error, if wrapping a lower-level failure. */
  readonly cause?: unknown;
}
