import type { Timestamp } from "./foundational.js";

/**
 * One element of structured model output. Providers that return content
 * blocks instead of a plain string produce these; only `text` matters to
 * the router core.
 */
export interface ContentPart {
  readonly type: string;
  readonly text?: string;
}

export type MessageContent = string | ReadonlyArray<ContentPart>;

/**
 * A structured invocation request emitted by an agent's model output.
 * `id` is unique within the emitting message and correlates the later
 * ToolMessage reply.
 */
export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: Record<string, unknown>;
}

interface BaseMessage {
  readonly id: string;
  readonly timestamp: Timestamp;
}

export interface UserMessage extends BaseMessage {
  readonly role: "user";
  readonly content: MessageContent;
  readonly name?: string;
}

export interface AssistantMessage extends BaseMessage {
  readonly role: "assistant";
  readonly content: MessageContent;
  readonly toolCalls: ReadonlyArray<ToolCall>;
  /** The node that produced this turn (coordinator or specialised agent). */
  readonly name?: string;
}

export interface ToolMessage extends BaseMessage {
  readonly role: "tool";
  readonly content: string;
  /** Must match a ToolCall id of the nearest preceding assistant message. */
  readonly toolCallId: string;
  readonly name?: string;
  readonly isError?: boolean;
}

/** One conversational turn. Discriminated on `role`. */
export type Message = UserMessage | AssistantMessage | ToolMessage;

export type MessageRole = Message["role"];
