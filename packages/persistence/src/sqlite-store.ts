import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { CheckpointError } from "@switchboard/core";
import type { Checkpoint, CheckpointStore, SessionId } from "@switchboard/types";
import { decodeSessionState, encodeSessionState } from "./schema.js";

const CheckpointRowSchema = z.object({
  step: z.number().int(),
  node: z.string(),
  state: z.string(),
  created_at: z.string(),
});

/**
 * SQLite-backed implementation of CheckpointStore.
 *
 * Uses an append-only `checkpoints` table keyed by (session, step); the
 * latest row of a session is its current state, older rows are history.
 */
export class SQLiteCheckpointStore implements CheckpointStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  /** Run schema migrations. Idempotent. */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        session_id  TEXT NOT NULL,
        step        INTEGER NOT NULL,
        node        TEXT NOT NULL,
        state       TEXT NOT NULL,
        created_at  TEXT NOT NULL,
        PRIMARY KEY (session_id, step)
      );
    `);
  }

  async get(sessionId: SessionId): Promise<Checkpoint | undefined> {
    const row = this.db
      .prepare(
        "SELECT step, node, state, created_at FROM checkpoints WHERE session_id = ? ORDER BY step DESC LIMIT 1",
      )
      .get(sessionId);

    return row === undefined ? undefined : this.toCheckpoint(sessionId, row);
  }

  async put(checkpoint: Checkpoint): Promise<void> {
    try {
      this.db
        .prepare(
          "INSERT INTO checkpoints (session_id, step, node, state, created_at) VALUES (?, ?, ?, ?, ?)",
        )
        .run(
          checkpoint.sessionId,
          checkpoint.step,
          checkpoint.node,
          encodeSessionState(checkpoint.state),
          checkpoint.createdAt,
        );
    } catch (err) {
      throw new CheckpointError(
        `Failed to write checkpoint ${checkpoint.step} for session ${checkpoint.sessionId}`,
        { cause: err },
      );
    }
  }

  async list(sessionId: SessionId): Promise<Checkpoint[]> {
    const rows = this.db
      .prepare("SELECT step, node, state, created_at FROM checkpoints WHERE session_id = ? ORDER BY step ASC")
      .all(sessionId);

    return rows.map((row) => this.toCheckpoint(sessionId, row));
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }

  private toCheckpoint(sessionId: SessionId, raw: unknown): Checkpoint {
    const row = CheckpointRowSchema.safeParse(raw);
    if (!row.success) {
      throw new CheckpointError(`Malformed checkpoint row for session ${sessionId}`, { cause: row.error });
    }
    return {
      sessionId,
      step: row.data.step,
      node: row.data.node,
      state: decodeSessionState(row.data.state),
      createdAt: row.data.created_at,
    };
  }
}
