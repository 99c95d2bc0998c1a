import { formatName } from "@switchboard/core";
import type { AgentContext, ToolSpec } from "@switchboard/types";
import { handoffToolName } from "./handoff-tools.js";

export interface DelegateSummary {
  readonly context: AgentContext;
  readonly description: string;
}

/**
 * Builds the coordinator's instructions from the agents it can delegate to.
 */
export function buildCoordinatorPrompt(delegates: ReadonlyArray<DelegateSummary>): string {
  const delegateList =
    delegates.length > 0
      ? delegates
          .map((d) => `- **${handoffToolName(d.context)}** (${formatName(d.context)}): ${d.description}`)
          .join("\n")
      : "- (no specialised assistants available)";

  return `You are the primary assistant of a software project team.

# Role
Your primary role is to understand what the user wants built and to
delegate the work. Only the specialised assistants are given permission
to create, edit or run anything in the workspace.

# Delegation
${delegateList}

# Protocol
1. Ask clarifying questions when the request is ambiguous.
2. Delegate by calling exactly one handoff tool.
3. The user is not aware of the different specialised assistants, so do not mention them; just quietly delegate.
4. When a specialised assistant hands control back, summarise the result for the user.
`;
}

/**
 * Builds a specialised agent's instructions from its tool set.
 */
export function buildSpecialistPrompt(
  context: AgentContext,
  description: string,
  tools: ReadonlyArray<ToolSpec>,
  escalateTool: string,
): string {
  const toolList =
    tools.length > 0
      ? tools.map((t) => `- ${t.name}: ${t.description}`).join("\n")
      : "- (no tools)";

  return `You are the ${formatName(context)}, a specialised assistant.

# Responsibility
${description}

# Tools
${toolList}

# Protocol
1. Work only on your responsibility, using the tools above.
2. When your task is complete, or the user changes their mind or needs help with something else,
   call ${escalateTool} to hand control back to the primary assistant.
3. Never loop indefinitely.
`;
}
