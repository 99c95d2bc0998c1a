import type { AgentContext, ToolCall } from "@switchboard/types";
import { formatName } from "./agents.js";
import { popDialog, pushDialog } from "./dialog-stack.js";
import { ContractViolationError } from "./errors.js";
import type { GraphNode } from "./graph.js";
import { lastMessage, toolCallsOf, toolMessage } from "./messages.js";

export const LEAVE_SKILL = "leave_skill";

const skippedReply = (call: ToolCall) =>
  `Tool call "${call.name}" was not executed: control of the dialog changed before it ran.`;

export interface EntryNodeOptions {
  readonly agent: AgentContext;
  /** Human-readable label; defaults to the formatted agent name. */
  readonly label?: string;
  readonly escalateTool: string;
}

function entryInstructions(label: string, escalateTool: string): string {
  return (
    `The assistant is now the ${label}. Reflect on the above conversation between the primary assistant and the user.` +
    ` The user's intent is unsatisfied. Use the provided tools to assist the user. Remember, you are ${label},` +
    " and the task is not complete until after you have successfully invoked the appropriate tool." +
    ` If the user changes their mind or needs help for other tasks, call the ${escalateTool} function to let the primary assistant take control.` +
    " Do not mention who you are - just act as the proxy for the assistant."
  );
}

/**
 * Entry handler for a specialised agent: pushes it on the dialog stack and
 * answers the handoff call with instructions for the new owner.
 */
export function createEntryNode(options: EntryNodeOptions): GraphNode {
  const label = options.label ?? formatName(options.agent);
  const name = `enter_${options.agent}`;

  return {
    name,
    run(state) {
      const calls = toolCallsOf(lastMessage(state.messages));
      if (calls.length === 0) {
        throw new ContractViolationError(`${name} reached without a handoff tool call`);
      }

      const [handoff, ...rest] = calls;
      return {
        messages: [
          toolMessage(entryInstructions(label, options.escalateTool), handoff.id, {
            name: handoff.name,
          }),
          ...rest.map((call) => toolMessage(skippedReply(call), call.id, { name: call.name })),
        ],
        dialogState: pushDialog(options.agent),
      };
    },
  };
}

export interface ExitNodeOptions {
  readonly name?: string;
  readonly escalateTool: string;
}

const RESUME_TEXT =
  "Resuming dialog with the primary assistant. Please reflect on the past conversation and assist the user as needed.";

/**
 * Exit handler shared by every specialised agent. Pops the dialog stack
 * and, when the escalating message carried tool calls, answers each of
 * them: the escalate call with the hand-back text, the rest as skipped.
 */
export function createExitNode(options: ExitNodeOptions): GraphNode {
  return {
    name: options.name ?? LEAVE_SKILL,
    run(state) {
      const calls = toolCallsOf(lastMessage(state.messages));
      const escalation = calls.find((call) => call.name === options.escalateTool) ?? calls[0];

      return {
        messages: calls.map((call) =>
          call === escalation
            ? toolMessage(RESUME_TEXT, call.id, { name: call.name })
            : toolMessage(skippedReply(call), call.id, { name: call.name }),
        ),
        dialogState: popDialog(),
      };
    },
  };
}
