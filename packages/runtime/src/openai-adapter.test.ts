import { describe, it, expect, vi, afterEach } from "vitest";
import { ModelError, assistantMessage, toolMessage, userMessage } from "@switchboard/core";
import { OpenAIAdapter } from "./openai-adapter.js";

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn(
    async (_url: string, _init: RequestInit) => new Response(JSON.stringify(body), { status }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("OpenAIAdapter", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requires an API key", () => {
    expect(() => new OpenAIAdapter({ apiKey: "" })).toThrow(ModelError);
  });

  it("sends function-calling messages and decodes tool calls", async () => {
    const fetchMock = stubFetch({
      choices: [
        {
          message: {
            content: null,
            tool_calls: [
              {
                id: "call_abc",
                type: "function",
                function: { name: "complete_or_escalate", arguments: '{"cancel":false,"reason":"done"}' },
              },
            ],
          },
        },
      ],
    });
    const adapter = new OpenAIAdapter({ apiKey: "test-secret", model: "gpt-4o-mini" });

    const result = await adapter.generate({
      messages: [
        userMessage("hi"),
        assistantMessage("", [{ id: "c1", name: "run_command", arguments: { command: "ls" } }]),
        toolMessage("main.py", "c1"),
      ],
      tools: [],
    });

    expect(result).toEqual({
      content: "",
      toolCalls: [{ id: "call_abc", name: "complete_or_escalate", arguments: { cancel: false, reason: "done" } }],
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.openai.com/v1/chat/completions");
    expect(new Headers(init.headers).get("Authorization")).toBe("Bearer test-secret");
    expect(JSON.parse(String(init.body))).toEqual({
      model: "gpt-4o-mini",
      messages: [
        { role: "user", content: "hi" },
        {
          role: "assistant",
          content: null,
          tool_calls: [
            { id: "c1", type: "function", function: { name: "run_command", arguments: '{"command":"ls"}' } },
          ],
        },
        { role: "tool", tool_call_id: "c1", content: "main.py" },
      ],
    });
  });

  it("rejects malformed tool arguments", async () => {
    stubFetch({
      choices: [
        { message: { content: null, tool_calls: [{ id: "x", function: { name: "f", arguments: "{oops" } }] } },
      ],
    });
    const adapter = new OpenAIAdapter({ apiKey: "test-secret" });

    await expect(adapter.generate({ messages: [userMessage("hi")], tools: [] })).rejects.toThrow(
      'Tool call "f" has malformed arguments',
    );
  });

  it("raises ModelError on an HTTP error", async () => {
    stubFetch({ error: { message: "bad key" } }, 401);
    const adapter = new OpenAIAdapter({ apiKey: "test-secret" });

    await expect(adapter.generate({ messages: [userMessage("hi")], tools: [] })).rejects.toThrow(
      /^OpenAI API error 401: /,
    );
  });
});
