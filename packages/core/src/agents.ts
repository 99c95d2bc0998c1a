import type { AgentContext, CoordinatorName } from "@switchboard/types";

/** Every specialised agent, in handoff-tool order. */
export const AGENT_CONTEXTS = [
  "architect_assistant",
  "coder_assistant",
  "tester_assistant",
] as const satisfies ReadonlyArray<AgentContext>;

export const COORDINATOR: CoordinatorName = "primary_assistant";

/**
 * Convert a snake_case name into a human-friendly label,
 * e.g. `coder_assistant` → `Coder Assistant`.
 */
export function formatName(name: string): string {
  return name
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
    .join(" ");
}
