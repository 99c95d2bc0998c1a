import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";

import { InMemoryEventBus, contentText, silentLogger } from "@switchboard/core";
import { SQLiteCheckpointStore } from "@switchboard/persistence";
import { AgentWorkflow, ScriptedModelAdapter, type ScriptStep } from "@switchboard/runtime";
import type { SessionId } from "@switchboard/types";

describe("State Recovery", () => {
  let dbPath: string;
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "switchboard-recovery-"));
    dbPath = path.join(tmpDir, "switchboard.db");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  /**
   * Builds a full workflow on a SQLite checkpointer. Returns the workflow,
   * its store and the node names it executed.
   */
  function createStack(scripts: { primary: ScriptStep[]; tester: ScriptStep[] }) {
    const store = new SQLiteCheckpointStore(dbPath);
    const bus = new InMemoryEventBus(silentLogger);
    const executed: string[] = [];
    bus.subscribe("graph.step", (event) => {
      executed.push(event.payload.node);
    });

    const workflow = new AgentWorkflow({
      coordinator: { model: new ScriptedModelAdapter(scripts.primary) },
      specialists: [{ context: "tester_assistant", model: new ScriptedModelAdapter(scripts.tester) }],
      checkpointer: store,
      bus,
    });
    return { workflow, store, executed };
  }

  it("resumes the delegated agent after a restart", async () => {
    const sessionId = "thread-7" as SessionId;

    // === PHASE 1: hand off to the tester, then shut down ===
    const first = createStack({
      primary: [
        {
          content: "",
          toolCalls: [{ id: "call-1", name: "to_tester_assistant", arguments: { request: "test calc.py" } }],
        },
      ],
      tester: [{ content: "Should I cover division by zero?" }],
    });

    const reply1 = await first.workflow.handleMessage(sessionId, "Please test calc.py");
    expect(reply1).toBe("Should I cover division by zero?");
    first.store.close();

    // === PHASE 2: new process, same database ===
    const second = createStack({
      primary: [],
      tester: [
        (request) => ({
          content: `Covering it. You first asked: ${contentText(request.messages[0].content)}`,
        }),
      ],
    });

    const reply2 = await second.workflow.handleMessage(sessionId, "Yes, cover it");

    expect(reply2).toBe("Covering it. You first asked: Please test calc.py");
    expect(second.executed).toEqual(["tester_assistant"]);

    const state = await second.workflow.getState(sessionId);
    expect(state.dialogState).toEqual(["tester_assistant"]);
    expect(state.messages.map((m) => m.role)).toEqual([
      "user",
      "assistant",
      "tool",
      "assistant",
      "user",
      "assistant",
    ]);
    expect((await second.store.list(sessionId)).map((c) => c.node)).toEqual([
      "__start__",
      "primary_assistant",
      "enter_tester_assistant",
      "tester_assistant",
      "__start__",
      "tester_assistant",
    ]);
    second.store.close();
  });
});
