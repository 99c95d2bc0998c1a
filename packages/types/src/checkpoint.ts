import type { SessionId, Timestamp } from "./foundational.js";
import type { SessionState } from "./session.js";

/**
 * A durable snapshot of session state, written after every graph step.
 */
export interface Checkpoint {
  readonly sessionId: SessionId;
  /** Monotonic per session. */
  readonly step: number;
  /** The node whose output this snapshot includes (`__start__` for input). */
  readonly node: string;
  readonly state: SessionState;
  readonly createdAt: Timestamp;
}

export interface CheckpointStore {
  /** Latest checkpoint for the session, if any. */
  get(sessionId: SessionId): Promise<Checkpoint | undefined>;
  /** Write a new latest checkpoint. */
  put(checkpoint: Checkpoint): Promise<void>;
  /** Every checkpoint of the session in step order. */
  list(sessionId: SessionId): Promise<Checkpoint[]>;
}
