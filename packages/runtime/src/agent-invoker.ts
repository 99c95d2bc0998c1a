import {
  ModelError,
  RetryExhaustedError,
  SwitchboardError,
  assistantMessage,
  createEvent,
  isEmptyResponse,
  userMessage,
  withTimeout,
  type GraphNode,
  type NodeContext,
} from "@switchboard/core";
import type { EventBus, Message, SessionState, SessionUpdate, ToolSpec } from "@switchboard/types";
import type { GenerationResult, ModelAdapter } from "./model-adapter.js";

export const RETRY_DIRECTIVE = "Respond with a real output.";
export const APOLOGY_TEXT =
  "I'm sorry, I was unable to produce a response. Could you rephrase your request?";
export const DEFAULT_MAX_RETRIES = 3;

/** What to do once every retry came back empty. */
export type ExhaustionPolicy = "error" | "apology";

export interface AgentInvokerOptions {
  readonly name: string;
  readonly model: ModelAdapter;
  readonly tools?: ReadonlyArray<ToolSpec>;
  readonly systemPrompt?: string;
  /** Extra model calls after the first one came back empty. */
  readonly maxRetries?: number;
  readonly onExhausted?: ExhaustionPolicy;
  readonly timeoutMs?: number;
  readonly bus?: EventBus;
}

/**
 * Graph node wrapping one model-backed agent.
 *
 * Re-invokes the model while it returns neither text nor tool calls,
 * appending a corrective directive to a working copy of the conversation.
 * Only the final usable response reaches the message log.
 */
export class AgentInvoker implements GraphNode {
  readonly name: string;
  private readonly model: ModelAdapter;
  private readonly tools: ReadonlyArray<ToolSpec>;
  private readonly systemPrompt?: string;
  private readonly maxRetries: number;
  private readonly onExhausted: ExhaustionPolicy;
  private readonly timeoutMs?: number;
  private readonly bus?: EventBus;

  constructor(options: AgentInvokerOptions) {
    this.name = options.name;
    this.model = options.model;
    this.tools = options.tools ?? [];
    this.systemPrompt = options.systemPrompt;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.onExhausted = options.onExhausted ?? "error";
    this.timeoutMs = options.timeoutMs;
    this.bus = options.bus;
  }

  async run(state: SessionState, ctx: NodeContext): Promise<SessionUpdate> {
    let working: Message[] = [...state.messages];

    for (let attempt = 1; ; attempt++) {
      const result = await this.generate(working);
      if (!isEmptyResponse(result)) {
        return {
          messages: [assistantMessage(result.content, result.toolCalls ?? [], this.name)],
        };
      }

      if (attempt > this.maxRetries) {
        ctx.logger.error("Model output empty after all retries", {
          agent: this.name,
          attempts: attempt,
          policy: this.onExhausted,
        });
        if (this.onExhausted === "error") {
          throw new RetryExhaustedError(this.name, attempt);
        }
        return { messages: [assistantMessage(APOLOGY_TEXT, [], this.name)] };
      }

      ctx.logger.warn("Empty model output, retrying", { agent: this.name, attempt });
      await this.bus?.publish(
        createEvent("invoker.retry", { agent: this.name, attempt }, ctx.traceCtx),
      );
      working = [...working, userMessage(RETRY_DIRECTIVE)];
    }
  }

  private async generate(messages: ReadonlyArray<Message>): Promise<GenerationResult> {
    try {
      return await withTimeout(`model call for ${this.name}`, this.timeoutMs, (signal) =>
        this.model.generate({
          system: this.systemPrompt,
          messages,
          tools: this.tools,
          signal,
        }),
      );
    } catch (err) {
      if (err instanceof SwitchboardError) throw err;
      throw new ModelError(`Model call for ${this.name} failed`, { cause: err });
    }
  }
}
