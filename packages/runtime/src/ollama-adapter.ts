import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import { ModelError, contentText, silentLogger, type Logger } from "@switchboard/core";
import type { Message } from "@switchboard/types";
import {
  parseToolArguments,
  type GenerationResult,
  type ModelAdapter,
  type ModelRequest,
} from "./model-adapter.js";

export interface OllamaAdapterOptions {
  readonly model: string;
  readonly baseUrl?: string;
  readonly temperature?: number;
  /** Ollama `num_predict`; -1 is unlimited, -2 fills the context. */
  readonly numPredict?: number;
  readonly logger?: Logger;
}

const OllamaChatResponseSchema = z.object({
  model: z.string(),
  message: z.object({
    role: z.string(),
    content: z.string().default(""),
    tool_calls: z
      .array(
        z.object({
          function: z.object({
            name: z.string(),
            arguments: z.union([z.record(z.unknown()), z.string()]),
          }),
        }),
      )
      .optional(),
  }),
  done: z.boolean(),
});

type OllamaMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string;
      tool_calls?: { function: { name: string; arguments: Record<string, unknown> } }[];
    }
  | { role: "tool"; content: string; tool_name?: string };

/**
 * ModelAdapter for a local Ollama instance, using `/api/chat` with native
 * tool calling. Defaults to http://localhost:11434.
 */
export class OllamaAdapter implements ModelAdapter {
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(private readonly options: OllamaAdapterOptions) {
    this.baseUrl = (options.baseUrl ?? "http://localhost:11434").replace(/\/+$/, "");
    this.logger = options.logger ?? silentLogger;
  }

  async generate(request: ModelRequest): Promise<GenerationResult> {
    const url = `${this.baseUrl}/api/chat`;
    const body = {
      model: this.options.model,
      messages: this.convertMessages(request),
      ...(request.tools.length > 0
        ? {
            tools: request.tools.map((tool) => ({
              type: "function",
              function: {
                name: tool.name,
                description: tool.description,
                parameters: tool.parameters,
              },
            })),
          }
        : {}),
      stream: false,
      options: {
        ...(this.options.temperature !== undefined ? { temperature: this.options.temperature } : {}),
        ...(this.options.numPredict !== undefined ? { num_predict: this.options.numPredict } : {}),
      },
    };

    this.logger.debug("Ollama request", {
      model: this.options.model,
      messages: body.messages.length,
      tools: request.tools.length,
    });

    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal: request.signal,
    });

    if (!response.ok) {
      throw new ModelError(`Ollama API error ${response.status}: ${await response.text()}`);
    }

    const parsed = OllamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelError("Ollama returned an unexpected response shape", { cause: parsed.error });
    }

    const { message } = parsed.data;
    return {
      content: message.content,
      toolCalls: (message.tool_calls ?? []).map((call) => ({
        // Ollama does not assign call ids.
        id: `call_${uuidv7()}`,
        name: call.function.name,
        arguments: parseToolArguments(call.function.arguments, call.function.name),
      })),
    };
  }

  private convertMessages(request: ModelRequest): OllamaMessage[] {
    const converted: OllamaMessage[] = request.system
      ? [{ role: "system", content: request.system }]
      : [];
    for (const message of request.messages) {
      converted.push(this.convertMessage(message));
    }
    return converted;
  }

  private convertMessage(message: Message): OllamaMessage {
    switch (message.role) {
      case "user":
        return { role: "user", content: contentText(message.content) };
      case "assistant":
        return {
          role: "assistant",
          content: contentText(message.content),
          ...(message.toolCalls.length > 0
            ? {
                tool_calls: message.toolCalls.map((call) => ({
                  function: { name: call.name, arguments: call.arguments },
                })),
              }
            : {}),
        };
      case "tool":
        return {
          role: "tool",
          content: message.content,
          ...(message.name ? { tool_name: message.name } : {}),
        };
    }
  }
}
