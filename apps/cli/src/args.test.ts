import { describe, it, expect } from "vitest";
import { parseCliArgs } from "./args.js";

describe("parseCliArgs", () => {
  it("defaults to thread 0 with logging on", () => {
    expect(parseCliArgs([])).toEqual({
      primaryModel: undefined,
      architectModel: undefined,
      coderModel: undefined,
      testerModel: undefined,
      threadId: "0",
      silent: false,
      configPath: undefined,
      drawGraph: undefined,
      help: false,
    });
  });

  it("reads short and long flags", () => {
    const options = parseCliArgs([
      "-p",
      "qwen2.5:14b",
      "-a",
      "llama3.1:70b",
      "-c",
      "codellama:13b",
      "--tester-model-name",
      "llama3.2:3b",
      "-t",
      "project-7",
      "-s",
      "--config",
      "team.yaml",
      "--draw-graph",
      "graph.mmd",
    ]);

    expect(options).toMatchObject({
      primaryModel: "qwen2.5:14b",
      architectModel: "llama3.1:70b",
      coderModel: "codellama:13b",
      testerModel: "llama3.2:3b",
      threadId: "project-7",
      silent: true,
      configPath: "team.yaml",
      drawGraph: "graph.mmd",
    });
  });

  it("treats a blank thread id as the default thread", () => {
    expect(parseCliArgs(["--thread-id", "  "]).threadId).toBe("0");
  });

  it("rejects unknown flags", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow();
  });
});
