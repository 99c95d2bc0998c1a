import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import { CheckpointError, assistantMessage, toolMessage, userMessage } from "@switchboard/core";
import type { Checkpoint, SessionId, SessionState } from "@switchboard/types";
import { SQLiteCheckpointStore } from "./sqlite-store.js";

const SESSION = "thread-1" as SessionId;

const checkpoint = (step: number, node: string, state: SessionState): Checkpoint => ({
  sessionId: SESSION,
  step,
  node,
  state,
  createdAt: `2026-01-01T00:00:0${step}.000Z`,
});

describe("SQLiteCheckpointStore", () => {
  let tmpDir: string;
  let dbPath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "switchboard-store-"));
    dbPath = path.join(tmpDir, "nested", "switchboard.db");
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("returns the latest checkpoint and keeps history in step order", async () => {
    const store = new SQLiteCheckpointStore(dbPath);
    const first: SessionState = { messages: [userMessage("hi")], dialogState: [] };
    const second: SessionState = {
      messages: [
        ...first.messages,
        assistantMessage("", [{ id: "c1", name: "to_coder_assistant", arguments: { request: "x" } }]),
        toolMessage("entered", "c1", { name: "to_coder_assistant" }),
      ],
      dialogState: ["coder_assistant"],
    };

    await store.put(checkpoint(1, "__start__", first));
    await store.put(checkpoint(2, "enter_coder_assistant", second));

    expect(await store.get(SESSION)).toEqual(checkpoint(2, "enter_coder_assistant", second));
    expect((await store.list(SESSION)).map((c) => [c.step, c.node])).toEqual([
      [1, "__start__"],
      [2, "enter_coder_assistant"],
    ]);
    expect(await store.get("other" as SessionId)).toBeUndefined();
    store.close();
  });

  it("survives reopening the database", async () => {
    const state: SessionState = { messages: [userMessage("remember me")], dialogState: ["tester_assistant"] };
    const writer = new SQLiteCheckpointStore(dbPath);
    await writer.put(checkpoint(1, "__start__", state));
    writer.close();

    const reader = new SQLiteCheckpointStore(dbPath);
    expect((await reader.get(SESSION))?.state).toEqual(state);
    reader.close();
  });

  it("refuses to overwrite an existing step", async () => {
    const store = new SQLiteCheckpointStore(dbPath);
    const state: SessionState = { messages: [], dialogState: [] };
    await store.put(checkpoint(1, "__start__", state));

    await expect(store.put(checkpoint(1, "primary_assistant", state))).rejects.toBeInstanceOf(CheckpointError);
    store.close();
  });

  it("rejects a corrupted state row", async () => {
    const store = new SQLiteCheckpointStore(dbPath);
    store.close();

    const db = new Database(dbPath);
    db.prepare(
      "INSERT INTO checkpoints (session_id, step, node, state, created_at) VALUES (?, ?, ?, ?, ?)",
    ).run(SESSION, 1, "__start__", '{"messages":[],"dialogState":["janitor"]}', "2026-01-01T00:00:00.000Z");
    db.close();

    const reopened = new SQLiteCheckpointStore(dbPath);
    await expect(reopened.get(SESSION)).rejects.toThrow(/^Checkpoint state is malformed: dialogState\.0: /);
    reopened.close();
  });
});
