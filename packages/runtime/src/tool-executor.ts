import {
  ToolNotFoundError,
  createEvent,
  describeError,
  lastMessage,
  toolCallsOf,
  toolMessage,
  withTimeout,
  type GraphNode,
} from "@switchboard/core";
import type { EventBus, NativeToolRegistry, ToolMessage } from "@switchboard/types";

export interface ToolNodeOptions {
  readonly name: string;
  readonly tools: NativeToolRegistry;
  readonly timeoutMs?: number;
  readonly bus?: EventBus;
}

/** Text sent back for every call of a batch that failed. */
export function toolErrorText(err: unknown): string {
  return `Error: ${describeError(err)}\n please fix your mistakes.`;
}

/** Serialise a tool's return value into the tool message body. */
export function formatToolOutput(output: unknown): string {
  if (typeof output === "string") return output;
  if (output === undefined) return "";
  return JSON.stringify(output);
}

/**
 * Executes every tool call of the preceding assistant message in order.
 *
 * A failure anywhere in the batch is not raised: the node instead answers
 * each call of the batch with the error text, so the model sees what went
 * wrong and can correct itself.
 */
export function createToolNode(options: ToolNodeOptions): GraphNode {
  return {
    name: options.name,
    async run(state, ctx) {
      const calls = toolCallsOf(lastMessage(state.messages));

      try {
        const messages: ToolMessage[] = [];
        for (const call of calls) {
          const tool = options.tools.get(call.name);
          if (!tool) throw new ToolNotFoundError(call.name);

          ctx.logger.debug("Executing tool", { tool: call.name, callId: call.id });
          const output = await withTimeout(`tool ${call.name}`, options.timeoutMs, (signal) =>
            tool.execute(call.arguments, { signal }),
          );
          messages.push(toolMessage(formatToolOutput(output), call.id, { name: call.name }));
        }
        return { messages };
      } catch (err) {
        const error = describeError(err);
        const toolCallIds = calls.map((call) => call.id);
        ctx.logger.warn("Tool batch failed, reporting error to the model", { error, toolCallIds });
        await options.bus?.publish(
          createEvent("tools.fallback", { node: options.name, toolCallIds, error }, ctx.traceCtx),
        );
        return {
          messages: calls.map((call) =>
            toolMessage(toolErrorText(err), call.id, { name: call.name, isError: true }),
          ),
        };
      }
    },
  };
}
