import { z } from "zod";
import type { AgentContext, ToolSpec } from "@switchboard/types";
import { toolSpec } from "./tools.js";

export const ESCALATE_TOOL = "complete_or_escalate";

export const HandoffArgsSchema = z.object({
  request: z
    .string()
    .describe("Any necessary followup questions the specialised assistant should clarify before proceeding."),
});

export const EscalateArgsSchema = z.object({
  cancel: z.boolean().default(true),
  reason: z.string(),
});

const HANDOFF_DESCRIPTIONS: Record<AgentContext, string> = {
  architect_assistant:
    "Transfers work to a specialised assistant that designs the project layout and creates its directories and files.",
  coder_assistant:
    "Transfers work to a specialised assistant that writes the implementation into the project's files.",
  tester_assistant:
    "Transfers work to a specialised assistant that writes and runs tests for the implementation.",
};

export function handoffToolName(agent: AgentContext): string {
  return `to_${agent}`;
}

/** Coordinator-side tool whose call delegates control to `agent`. */
export function handoffTool(agent: AgentContext, description?: string): ToolSpec {
  return toolSpec(
    handoffToolName(agent),
    description ?? HANDOFF_DESCRIPTIONS[agent],
    HandoffArgsSchema,
  );
}

/** Specialist-side tool whose call hands control back to the coordinator. */
export const escalateTool: ToolSpec = toolSpec(
  ESCALATE_TOOL,
  "A tool to mark the current task as completed and/or to escalate control of the dialog to the main assistant," +
    " who can re-route the dialog based on the user's needs.",
  EscalateArgsSchema,
);
