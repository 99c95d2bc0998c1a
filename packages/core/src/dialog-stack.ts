import type { AgentContext, CoordinatorName, DialogStackOp } from "@switchboard/types";
import { COORDINATOR } from "./agents.js";

export const noopDialog = (): DialogStackOp => ({ kind: "noop" });
export const popDialog = (): DialogStackOp => ({ kind: "pop" });
export const pushDialog = (value: AgentContext): DialogStackOp => ({ kind: "push", value });

/**
 * Push or pop the dialog stack. Only the tail ever changes; an absent op
 * leaves the stack as it is, and popping an empty stack is a no-op.
 */
export function reduceDialogStack(
  stack: ReadonlyArray<AgentContext>,
  op: DialogStackOp | undefined,
): ReadonlyArray<AgentContext> {
  if (!op) return stack;
  switch (op.kind) {
    case "noop":
      return stack;
    case "pop":
      return stack.slice(0, -1);
    case "push":
      return [...stack, op.value];
    default: {
      const unreachable: never = op;
      return unreachable;
    }
  }
}

/** Top of the stack, or the coordinator when nothing is delegated. */
export function activeAgent(stack: ReadonlyArray<AgentContext>): AgentContext | CoordinatorName {
  return stack.length > 0 ? stack[stack.length - 1] : COORDINATOR;
}
