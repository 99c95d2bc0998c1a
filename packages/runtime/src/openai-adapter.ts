import { z } from "zod";
import { ModelError, contentText, silentLogger, type Logger } from "@switchboard/core";
import type { Message } from "@switchboard/types";
import {
  parseToolArguments,
  type GenerationResult,
  type ModelAdapter,
  type ModelRequest,
} from "./model-adapter.js";

export interface OpenAIAdapterOptions {
  readonly apiKey: string;
  readonly model?: string;
  /** Any OpenAI-compatible endpoint. */
  readonly baseUrl?: string;
  readonly temperature?: number;
  readonly logger?: Logger;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().default(null),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() }),
              }),
            )
            .optional(),
        }),
      }),
    )
    .min(1),
});

type OpenAIMessage =
  | { role: "system" | "user"; content: string }
  | {
      role: "assistant";
      content: string | null;
      tool_calls?: {
        id: string;
        type: "function";
        function: { name: string; arguments: string };
      }[];
    }
  | { role: "tool"; tool_call_id: string; content: string };

/**
 * ModelAdapter for the OpenAI chat completions API.
 * Uses the REST API directly with native function calling.
 */
export class OpenAIAdapter implements ModelAdapter {
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly logger: Logger;

  constructor(private readonly options: OpenAIAdapterOptions) {
    if (!options.apiKey) throw new ModelError("OpenAI API key is required");
    this.model = options.model ?? "gpt-4o";
    this.baseUrl = (options.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.logger = options.logger ?? silentLogger;
  }

  async generate(request: ModelRequest): Promise<GenerationResult> {
    const body = {
      model: this.model,
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
      ...(this.options.temperature !== undefined ? { temperature: this.options.temperature } : {}),
    };

    this.logger.debug("OpenAI request", { model: this.model, messages: body.messages.length });

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.options.apiKey}`,
      },
      body: JSON.stringify(body),
      signal: request.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ModelError(`OpenAI API error ${response.status}: ${errorText}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelError("OpenAI returned an unexpected response shape", { cause: parsed.error });
    }

    const { message } = parsed.data.choices[0];
    return {
      content: message.content ?? "",
      toolCalls: (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: parseToolArguments(call.function.arguments, call.function.name),
      })),
    };
  }

  private convertMessages(request: ModelRequest): OpenAIMessage[] {
    const converted: OpenAIMessage[] = request.system
      ? [{ role: "system", content: request.system }]
      : [];
    return converted.concat(request.messages.map((m) => this.convertMessage(m)));
  }

  private convertMessage(message: Message): OpenAIMessage {
    switch (message.role) {
      case "user":
        return { role: "user", content: contentText(message.content) };
      case "assistant": {
        const text = contentText(message.content);
        if (message.toolCalls.length === 0) return { role: "assistant", content: text };
        return {
          role: "assistant",
          content: text === "" ? null : text,
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
      case "tool":
        return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
    }
  }
}
