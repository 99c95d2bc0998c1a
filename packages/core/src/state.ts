import type { SessionState, SessionUpdate } from "@switchboard/types";
import { appendMessages, assertToolRepliesCorrelated } from "./messages.js";
import { reduceDialogStack } from "./dialog-stack.js";

export function emptySessionState(): SessionState {
  return { messages: [], dialogState: [] };
}

/**
 * Merge a node's output into session state. New tool replies are checked
 * against the calls they answer.
 */
export function applyUpdate(state: SessionState, update: SessionUpdate): SessionState {
  const added = update.messages ?? [];
  const messages = added.length > 0 ? appendMessages(state.messages, added) : state.messages;
  if (added.length > 0) {
    assertToolRepliesCorrelated(messages, state.messages.length);
  }

  return {
    messages,
    dialogState: reduceDialogStack(state.dialogState, update.dialogState),
  };
}
