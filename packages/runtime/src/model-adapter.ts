import { ModelError } from "@switchboard/core";
import type { Message, MessageContent, ToolCall, ToolSpec } from "@switchboard/types";

/**
 * One model invocation: the conversation so far, the tools the agent may
 * call, and the agent's instructions. The system prompt is never part of
 * the persisted log.
 */
export interface ModelRequest {
  readonly system?: string;
  readonly messages: ReadonlyArray<Message>;
  readonly tools: ReadonlyArray<ToolSpec>;
  readonly signal?: AbortSignal;
}

export interface GenerationResult {
  readonly content: MessageContent;
  readonly toolCalls?: ReadonlyArray<ToolCall>;
}

/**
 * Abstraction over the underlying LLM.
 * `generate()` receives the full conversation and returns the model's response.
 */
export interface ModelAdapter {
  generate(request: ModelRequest): Promise<GenerationResult>;
}

/**
 * Decode tool-call arguments that a provider sends as a JSON string.
 */
export function parseToolArguments(raw: unknown, toolName: string): Record<string, unknown> {
  let value = raw;
  if (typeof raw === "string") {
    try {
      value = raw.trim() === "" ? {} : JSON.parse(raw);
    } catch (err) {
      throw new ModelError(`Tool call "${toolName}" has malformed arguments`, { cause: err });
    }
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ModelError(`Tool call "${toolName}" arguments must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

export type ScriptStep =
  | GenerationResult
  | ((request: ModelRequest) => GenerationResult | Promise<GenerationResult>);

/**
 * A mock model adapter for tests: answers with pre-programmed responses in
 * order and records every request it received.
 */
export class ScriptedModelAdapter implements ModelAdapter {
  readonly requests: ModelRequest[] = [];
  private cursor = 0;

  constructor(private readonly script: ReadonlyArray<ScriptStep>) {}

  async generate(request: ModelRequest): Promise<GenerationResult> {
    this.requests.push({ ...request, messages: [...request.messages] });
    if (this.cursor >= this.script.length) {
      throw new Error(`Script exhausted after ${this.script.length} responses`);
    }
    const step = this.script[this.cursor++];
    return typeof step === "function" ? step(request) : step;
  }

  get callCount(): number {
    return this.requests.length;
  }
}
