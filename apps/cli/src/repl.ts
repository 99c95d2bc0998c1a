import { createInterface } from "node:readline/promises";
import { describeError, type Logger } from "@switchboard/core";
import type { SessionId } from "@switchboard/types";

export const GOODBYE = "Assistant: Goodbye!";
const EXIT_COMMANDS = new Set(["exit", "quit"]);

export interface ConversationHandler {
  handleMessage(sessionId: SessionId, text: string): Promise<string>;
}

export interface ReplOptions {
  readonly handler: ConversationHandler;
  readonly sessionId: SessionId;
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
  readonly logger: Logger;
}

/**
 * Read user lines until `exit`, `quit`, end of input or a goodbye reply.
 * A failed turn is reported and the loop keeps going.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const { handler, sessionId, output, logger } = options;
  const rl = createInterface({ input: options.input, terminal: false });
  const prompt = () => output.write("User: ");

  try {
    prompt();
    for await (const line of rl) {
      const text = line.trim();
      if (EXIT_COMMANDS.has(text.toLowerCase())) break;
      if (text === "") {
        prompt();
        continue;
      }

      try {
        const reply = await handler.handleMessage(sessionId, text);
        output.write(`${reply}\n`);
        if (reply === GOODBYE) break;
      } catch (err) {
        logger.error("Turn failed", { sessionId, error: describeError(err) });
        output.write(`Error: ${describeError(err)}\n`);
      }
      prompt();
    }
  } finally {
    rl.close();
  }
}
