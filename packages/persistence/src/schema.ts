import { z } from "zod";
import { AGENT_CONTEXTS, CheckpointError } from "@switchboard/core";
import type { SessionState } from "@switchboard/types";

const ContentSchema = z.union([
  z.string(),
  z.array(z.object({ type: z.string(), text: z.string().optional() })),
]);

const ToolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
});

const MessageSchema = z.discriminatedUnion("role", [
  z.object({
    id: z.string(),
    timestamp: z.string(),
    role: z.literal("user"),
    content: ContentSchema,
    name: z.string().optional(),
  }),
  z.object({
    id: z.string(),
    timestamp: z.string(),
    role: z.literal("assistant"),
    content: ContentSchema,
    toolCalls: z.array(ToolCallSchema),
    name: z.string().optional(),
  }),
  z.object({
    id: z.string(),
    timestamp: z.string(),
    role: z.literal("tool"),
    content: z.string(),
    toolCallId: z.string(),
    name: z.string().optional(),
    isError: z.boolean().optional(),
  }),
]);

export const SessionStateSchema = z.object({
  messages: z.array(MessageSchema),
  dialogState: z.array(z.enum(AGENT_CONTEXTS)),
});

/**
 * Decode a serialised session state, rejecting anything that would not
 * round-trip into a valid SessionState.
 */
export function decodeSessionState(json: string): SessionState {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new CheckpointError("Checkpoint state is not valid JSON", { cause: err });
  }

  const parsed = SessionStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CheckpointError(
      `Checkpoint state is malformed: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

export function encodeSessionState(state: SessionState): string {
  return JSON.stringify(state);
}
