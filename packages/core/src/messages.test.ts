import { describe, it, expect } from "vitest";
import {
  assertToolRepliesCorrelated,
  assistantMessage,
  contentText,
  hasText,
  interruptedCallReplies,
  isEmptyResponse,
  toolCallsOf,
  toolMessage,
  userMessage,
} from "./messages.js";
import { ContractViolationError } from "./errors.js";
import { formatName } from "./agents.js";

describe("message helpers", () => {
  it("reports tool calls only for assistant messages", () => {
    const call = { id: "call_1", name: "read_file", arguments: { path: "a.ts" } };
    expect(toolCallsOf(assistantMessage("", [call]))).toEqual([call]);
    expect(toolCallsOf(userMessage("hi"))).toEqual([]);
    expect(toolCallsOf(undefined)).toEqual([]);
  });

  it("detects empty model output", () => {
    expect(isEmptyResponse({ content: "" })).toBe(true);
    expect(isEmptyResponse({ content: "   " })).toBe(true);
    expect(isEmptyResponse({ content: [] })).toBe(true);
    expect(isEmptyResponse({ content: [{ type: "text" }, { type: "text", text: "late" }] })).toBe(true);
    expect(isEmptyResponse({ content: [{ type: "text", text: "ok" }] })).toBe(false);
    expect(isEmptyResponse({ content: "ok" })).toBe(false);
    expect(
      isEmptyResponse({ content: "", toolCalls: [{ id: "c", name: "x", arguments: {} }] }),
    ).toBe(false);
  });

  it("flattens structured content to text", () => {
    expect(contentText([{ type: "text", text: "a" }, { type: "image" }, { type: "text", text: "b" }])).toBe("ab");
    expect(hasText("x")).toBe(true);
  });

  it("formats snake_case names as labels", () => {
    expect(formatName("coder_assistant")).toBe("Coder Assistant");
    expect(formatName("JOHN_doe")).toBe("John Doe");
  });
});

describe("assertToolRepliesCorrelated", () => {
  const call = (id: string) => ({ id, name: "read_file", arguments: {} });

  it("accepts replies to calls of the preceding assistant message", () => {
    const log = [
      userMessage("go"),
      assistantMessage("", [call("a"), call("b")]),
      toolMessage("A", "a"),
      toolMessage("B", "b"),
    ];
    expect(() => assertToolRepliesCorrelated(log)).not.toThrow();
  });

  it("rejects a reply with an unknown id", () => {
    const log = [assistantMessage("", [call("a")]), toolMessage("?", "zzz")];
    expect(() => assertToolRepliesCorrelated(log)).toThrow(ContractViolationError);
  });

  it("rejects a reply that follows a user message", () => {
    const log = [assistantMessage("", [call("a")]), userMessage("wait"), toolMessage("A", "a")];
    expect(() => assertToolRepliesCorrelated(log)).toThrow(ContractViolationError);
  });

  it("only checks from the given index", () => {
    const log = [toolMessage("orphan", "x"), assistantMessage("", [call("a")]), toolMessage("A", "a")];
    expect(() => assertToolRepliesCorrelated(log, 1)).not.toThrow();
  });
});

describe("interruptedCallReplies", () => {
  const call = (id: string) => ({ id, name: "run_command", arguments: {} });

  it("answers the calls no tool message replied to", () => {
    const log = [userMessage("go"), assistantMessage("", [call("a"), call("b")]), toolMessage("A", "a")];

    const replies = interruptedCallReplies(log);

    expect(replies).toHaveLength(1);
    expect(replies[0]).toMatchObject({
      role: "tool",
      toolCallId: "b",
      name: "run_command",
      isError: true,
      content: 'Tool call "run_command" was not executed: the previous turn ended before it ran.',
    });
    expect(() => assertToolRepliesCorrelated([...log, ...replies])).not.toThrow();
  });

  it("returns nothing when the log ends answered or without calls", () => {
    expect(interruptedCallReplies([])).toEqual([]);
    expect(interruptedCallReplies([userMessage("hi"), assistantMessage("hello")])).toEqual([]);
    expect(interruptedCallReplies([assistantMessage("", [call("a")]), toolMessage("A", "a")])).toEqual([]);
  });
});
