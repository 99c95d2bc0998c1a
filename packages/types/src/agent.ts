/**
 * The closed set of specialised agents. The coordinator is never one of
 * these: it is the implicit owner of the conversation when the dialog
 * stack is empty.
 */
export type AgentContext =
  | "architect_assistant"
  | "coder_assistant"
  | "tester_assistant";

export type CoordinatorName = "primary_assistant";
