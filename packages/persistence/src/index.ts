export { InMemoryCheckpointStore } from "./memory-store.js";
export { SQLiteCheckpointStore } from "./sqlite-store.js";
export { SessionStateSchema, decodeSessionState, encodeSessionState } from "./schema.js";
