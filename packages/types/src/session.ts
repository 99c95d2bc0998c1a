import type { AgentContext } from "./agent.js";
import type { Message } from "./message.js";

/**
 * A dialog stack mutation. `noop` leaves the stack alone, `pop` removes
 * the tail, `push` appends. Existing entries are never reordered.
 */
export type DialogStackOp =
  | { readonly kind: "noop" }
  | { readonly kind: "pop" }
  | { readonly kind: "push"; readonly value: AgentContext };

/**
 * The unit of persistence for one conversation thread.
 */
export interface SessionState {
  /** Append-only conversation log. */
  readonly messages: ReadonlyArray<Message>;
  /** Active specialised agents, innermost last. */
  readonly dialogState: ReadonlyArray<AgentContext>;
}

/**
 * What a graph node returns. Messages are concatenated onto the log in
 * order; the dialog op goes through the stack reducer.
 */
export interface SessionUpdate {
  readonly messages?: ReadonlyArray<Message>;
  readonly dialogState?: DialogStackOp;
}
