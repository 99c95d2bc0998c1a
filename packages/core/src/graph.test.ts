import { describe, it, expect } from "vitest";
import type {
  Checkpoint,
  CheckpointStore,
  SessionId,
  SessionState,
} from "@switchboard/types";
import { InMemoryEventBus } from "./bus.js";
import { END, START } from "./constants.js";
import { GraphConfigError, RecursionLimitError, RoutingError } from "./errors.js";
import { CompiledGraph, type GraphDefinition, type GraphNode } from "./graph.js";
import { assistantMessage, contentText, lastMessage, toolCallsOf, toolMessage, userMessage } from "./messages.js";
import type { Router } from "./routing.js";

class RecordingStore implements CheckpointStore {
  readonly writes: Checkpoint[] = [];

  async get(sessionId: SessionId): Promise<Checkpoint | undefined> {
    return this.writes.filter((c) => c.sessionId === sessionId).at(-1);
  }

  async put(checkpoint: Checkpoint): Promise<void> {
    this.writes.push(checkpoint);
  }

  async list(sessionId: SessionId): Promise<Checkpoint[]> {
    return this.writes.filter((c) => c.sessionId === sessionId);
  }
}

const SESSION = "thread-1" as SessionId;

const router = (name: string, targets: string[], route: (state: SessionState) => string): Router => ({
  name,
  targets,
  route,
});

const endWhenNoCalls = router("agent_router", ["tools", END], (state) =>
  toolCallsOf(lastMessage(state.messages)).length > 0 ? "tools" : END,
);

/** Calls a tool on the first turn, answers with the tool output after. */
const agent: GraphNode = {
  name: "agent",
  run(state) {
    const last = lastMessage(state.messages);
    if (last?.role === "tool") {
      return { messages: [assistantMessage(`tool said ${last.content}`)] };
    }
    return { messages: [assistantMessage("", [{ id: "c1", name: "clock", arguments: {} }])] };
  },
};

const tools: GraphNode = {
  name: "tools",
  run(state) {
    const [call] = toolCallsOf(lastMessage(state.messages));
    return { messages: [toolMessage("noon", call.id)] };
  },
};

const definition: GraphDefinition = {
  nodes: [agent, tools],
  edges: [
    { from: "agent", router: endWhenNoCalls },
    { from: "tools", to: "agent" },
  ],
  entry: router("start", ["agent"], () => "agent"),
};

describe("graph construction", () => {
  it("rejects a router target that is not a declared node", () => {
    const bad: GraphDefinition = {
      ...definition,
      edges: [
        { from: "agent", router: router("agent_router", ["tools", "leave_skill", END], () => END) },
        { from: "tools", to: "agent" },
      ],
    };
    expect(() => new CompiledGraph(bad, { checkpointer: new RecordingStore() })).toThrow(
      new GraphConfigError('Edge from "agent" targets undeclared node "leave_skill"'),
    );
  });

  it("rejects duplicate nodes, missing edges and unknown sources", () => {
    const store = new RecordingStore();
    expect(() => new CompiledGraph({ ...definition, nodes: [agent, tools, agent] }, { checkpointer: store })).toThrow(
      'Node "agent" already exists',
    );
    expect(
      () => new CompiledGraph({ ...definition, edges: [{ from: "tools", to: "agent" }] }, { checkpointer: store }),
    ).toThrow('Node "agent" has no outgoing edge');
    expect(
      () =>
        new CompiledGraph(
          { ...definition, edges: [...definition.edges, { from: "ghost", to: "agent" }] },
          { checkpointer: store },
        ),
    ).toThrow('Edge source "ghost" is not a declared node');
    expect(
      () =>
        new CompiledGraph(
          { ...definition, edges: [...definition.edges, { from: "tools", to: END }] },
          { checkpointer: store },
        ),
    ).toThrow('Node "tools" has more than one outgoing edge');
  });

  it("does not allow the entry router to end a turn before any node runs", () => {
    expect(
      () =>
        new CompiledGraph(
          { ...definition, entry: router("start", ["agent", END], () => "agent") },
          { checkpointer: new RecordingStore() },
        ),
    ).toThrow(GraphConfigError);
  });

  it("renders the topology as mermaid", () => {
    const graph = new CompiledGraph(definition, { checkpointer: new RecordingStore() });
    expect(graph.toMermaid()).toBe(
      [
        "flowchart TD",
        `  ${START} -.-> agent`,
        "  agent -.-> tools",
        `  agent -.-> ${END}`,
        "  tools --> agent",
      ].join("\n"),
    );
  });
});

describe("graph execution", () => {
  it("runs node by node until END and checkpoints every step", async () => {
    const store = new RecordingStore();
    const bus = new InMemoryEventBus();
    const visited: string[] = [];
    bus.subscribe("graph.step", (event) => {
      visited.push(`${event.payload.node}->${event.payload.next}`);
    });
    const graph = new CompiledGraph(definition, { checkpointer: store, bus });

    const state = await graph.invoke(SESSION, { messages: [userMessage("what time is it?")] });

    expect(visited).toEqual(["agent->tools", "tools->agent", `agent->${END}`]);
    expect(store.writes.map((c) => [c.step, c.node])).toEqual([
      [1, START],
      [2, "agent"],
      [3, "tools"],
      [4, "agent"],
    ]);
    expect(state.messages.map((m) => m.role)).toEqual(["user", "assistant", "tool", "assistant"]);
    expect(contentText(state.messages[3].content)).toBe("tool said noon");
    expect(await graph.getState(SESSION)).toEqual(state);
  });

  it("continues step numbering across turns of the same session", async () => {
    const store = new RecordingStore();
    const graph = new CompiledGraph(definition, { checkpointer: store });
    await graph.invoke(SESSION, { messages: [userMessage("one")] });
    await graph.invoke(SESSION, { messages: [userMessage("two")] });

    expect(store.writes.map((c) => c.step)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    expect((await graph.getState(SESSION)).messages).toHaveLength(8);
  });

  it("stops a turn that exceeds the step limit", async () => {
    const forever: GraphDefinition = {
      nodes: [
        { name: "ping", run: () => ({ messages: [userMessage("ping")] }) },
        { name: "pong", run: () => ({ messages: [userMessage("pong")] }) },
      ],
      edges: [
        { from: "ping", to: "pong" },
        { from: "pong", to: "ping" },
      ],
      entry: router("start", ["ping"], () => "ping"),
    };
    const store = new RecordingStore();
    const graph = new CompiledGraph(forever, { checkpointer: store, maxSteps: 5 });

    await expect(graph.invoke(SESSION, {})).rejects.toThrow(RecursionLimitError);
    expect(store.writes).toHaveLength(6);
  });

  it("fails when a router returns a target it did not declare", async () => {
    const liar: GraphDefinition = {
      ...definition,
      edges: [
        { from: "agent", router: router("agent_router", ["tools", END], () => "elsewhere") },
        { from: "tools", to: "agent" },
      ],
    };
    const bus = new InMemoryEventBus();
    const errors: string[] = [];
    bus.subscribe("graph.run.error", (event) => {
      errors.push(`${event.payload.node}: ${event.payload.error}`);
    });
    const graph = new CompiledGraph(liar, { checkpointer: new RecordingStore(), bus });

    await expect(graph.invoke(SESSION, { messages: [userMessage("hi")] })).rejects.toThrow(RoutingError);
    expect(errors).toEqual([
      'agent: RoutingError("Router \\"agent_router\\" returned undeclared target \\"elsewhere\\"")',
    ]);
  });

  it("answers tool calls left open by a failed turn before the next one", async () => {
    const store = new RecordingStore();
    const broken = new CompiledGraph(
      {
        ...definition,
        edges: [
          { from: "agent", router: router("agent_router", ["tools", END], () => "elsewhere") },
          { from: "tools", to: "agent" },
        ],
      },
      { checkpointer: store },
    );
    await expect(broken.invoke(SESSION, { messages: [userMessage("hi")] })).rejects.toThrow(RoutingError);
    expect(toolCallsOf(lastMessage((await broken.getState(SESSION)).messages))).toHaveLength(1);

    const graph = new CompiledGraph(definition, { checkpointer: store });
    await graph.invoke(SESSION, { messages: [userMessage("again")] });

    const resumed = store.writes[2];
    expect(resumed.node).toBe(START);
    expect(resumed.state.messages.map((m) => m.role)).toEqual(["user", "assistant", "tool", "user"]);
    expect(resumed.state.messages[2]).toMatchObject({
      role: "tool",
      toolCallId: "c1",
      name: "clock",
      isError: true,
      content: 'Tool call "clock" was not executed: the previous turn ended before it ran.',
    });
  });

  it("serializes turns of the same session", async () => {
    const slow: GraphDefinition = {
      nodes: [
        {
          name: "echo",
          async run(state) {
            await new Promise((resolve) => setTimeout(resolve, 10));
            const last = lastMessage(state.messages);
            return { messages: [assistantMessage(`echo ${last ? contentText(last.content) : ""}`)] };
          },
        },
      ],
      edges: [{ from: "echo", to: END }],
      entry: router("start", ["echo"], () => "echo"),
    };
    const graph = new CompiledGraph(slow, { checkpointer: new RecordingStore() });

    await Promise.all([
      graph.invoke(SESSION, { messages: [userMessage("first")] }),
      graph.invoke(SESSION, { messages: [userMessage("second")] }),
    ]);

    const state = await graph.getState(SESSION);
    expect(state.messages.map((m) => contentText(m.content))).toEqual([
      "first",
      "echo first",
      "second",
      "echo second",
    ]);
  });
});
