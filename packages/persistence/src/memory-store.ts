import { CheckpointError } from "@switchboard/core";
import type { Checkpoint, CheckpointStore, SessionId } from "@switchboard/types";

/**
 * Process-local checkpointer. Checkpoints are deep-copied on the way in so
 * later mutation of a caller's objects cannot rewrite history.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly sessions = new Map<SessionId, Checkpoint[]>();

  async get(sessionId: SessionId): Promise<Checkpoint | undefined> {
    return this.sessions.get(sessionId)?.at(-1);
  }

  async put(checkpoint: Checkpoint): Promise<void> {
    const history = this.sessions.get(checkpoint.sessionId) ?? [];
    const latest = history.at(-1);
    if (latest && checkpoint.step <= latest.step) {
      throw new CheckpointError(
        `Checkpoint step ${checkpoint.step} for session ${checkpoint.sessionId} is not after step ${latest.step}`,
      );
    }
    history.push(structuredClone(checkpoint));
    this.sessions.set(checkpoint.sessionId, history);
  }

  async list(sessionId: SessionId): Promise<Checkpoint[]> {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  /** Number of sessions with at least one checkpoint. */
  get size(): number {
    return this.sessions.size;
  }
}
