import { v7 as uuidv7 } from "uuid";
import type {
  AssistantMessage,
  Message,
  MessageContent,
  ToolCall,
  ToolMessage,
  UserMessage,
} from "@switchboard/types";
import { ContractViolationError } from "./errors.js";

const now = () => new Date().toISOString();

export function userMessage(content: MessageContent, name?: string): UserMessage {
  return { id: uuidv7(), timestamp: now(), role: "user", content, ...(name ? { name } : {}) };
}

export function assistantMessage(
  content: MessageContent,
  toolCalls: ReadonlyArray<ToolCall> = [],
  name?: string,
): AssistantMessage {
  return {
    id: uuidv7(),
    timestamp: now(),
    role: "assistant",
    content,
    toolCalls,
    ...(name ? { name } : {}),
  };
}

export function toolMessage(
  content: string,
  toolCallId: string,
  options: { name?: string; isError?: boolean } = {},
): ToolMessage {
  return {
    id: uuidv7(),
    timestamp: now(),
    role: "tool",
    content,
    toolCallId,
    ...(options.name ? { name: options.name } : {}),
    ...(options.isError ? { isError: true } : {}),
  };
}

export function lastMessage(messages: ReadonlyArray<Message>): Message | undefined {
  return messages[messages.length - 1];
}

/** Tool calls of an assistant message; empty for every other role. */
export function toolCallsOf(message: Message | undefined): ReadonlyArray<ToolCall> {
  return message?.role === "assistant" ? message.toolCalls : [];
}

/** Flatten content to plain text. */
export function contentText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content.map((part) => part.text ?? "").join("");
}

/**
 * Whether content carries usable text. Structured content counts only when
 * its first part has text.
 */
export function hasText(content: MessageContent): boolean {
  if (typeof content === "string") return content.trim().length > 0;
  const first = content[0];
  return first !== undefined && (first.text ?? "").trim().length > 0;
}

/** No tool calls and no text: the model produced nothing to act on. */
export function isEmptyResponse(output: {
  readonly content: MessageContent;
  readonly toolCalls?: ReadonlyArray<ToolCall>;
}): boolean {
  return (output.toolCalls?.length ?? 0) === 0 && !hasText(output.content);
}

/** Message log merge rule: concatenate in arrival order. */
export function appendMessages(
  log: ReadonlyArray<Message>,
  added: ReadonlyArray<Message>,
): Message[] {
  return [...log, ...added];
}

/**
 * Check that every tool message at or after `fromIndex` answers a call of
 * the assistant message that opened its run of tool replies.
 */
export function assertToolRepliesCorrelated(
  messages: ReadonlyArray<Message>,
  fromIndex = 0,
): void {
  for (let i = fromIndex; i < messages.length; i++) {
    const message = messages[i];
    if (message.role !== "tool") continue;

    let j = i - 1;
    while (j >= 0 && messages[j].role === "tool") j--;
    const owner = j >= 0 ? messages[j] : undefined;

    if (!toolCallsOf(owner).some((call) => call.id === message.toolCallId)) {
      throw new ContractViolationError(
        `Tool message ${message.id} replies to unknown tool call "${message.toolCallId}"`,
      );
    }
  }
}

/**
 * Error replies for calls of the log's last assistant message that no tool
 * message answers. A turn that failed after an agent asked for tools
 * leaves such calls behind; providers reject a history containing them.
 */
export function interruptedCallReplies(messages: ReadonlyArray<Message>): ToolMessage[] {
  const answered = new Set<string>();
  let i = messages.length - 1;
  for (; i >= 0; i--) {
    const message = messages[i];
    if (message.role !== "tool") break;
    answered.add(message.toolCallId);
  }

  return toolCallsOf(i >= 0 ? messages[i] : undefined)
    .filter((call) => !answered.has(call.id))
    .map((call) =>
      toolMessage(
        `Tool call "${call.name}" was not executed: the previous turn ended before it ran.`,
        call.id,
        { name: call.name, isError: true },
      ),
    );
}
