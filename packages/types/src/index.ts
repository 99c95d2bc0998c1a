export type { SessionId, TraceId, SpanId, EventId, Timestamp } from "./foundational.js";
export type {
  ContentPart,
  MessageContent,
  ToolCall,
  UserMessage,
  AssistantMessage,
  ToolMessage,
  Message,
  MessageRole,
} from "./message.js";
export type { AgentContext, CoordinatorName } from "./agent.js";
export type { DialogStackOp, SessionState, SessionUpdate } from "./session.js";
export type { Checkpoint, CheckpointStore } from "./checkpoint.js";
export type { ToolSpec, ToolContext, NativeTool, NativeToolRegistry } from "./tool.js";
export type { SwitchboardErrorCode, SwitchboardErrorShape } from "./error.js";
export type { TraceContext, LogLevel, LogEntry } from "./observability.js";
export type {
  SwitchboardEvent,
  EventPayloads,
  EventTopic,
  EventHandler,
  Subscription,
  EventBus,
} from "./event-bus.js";
