import type { EventId, SessionId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";
import type { Message } from "./message.js";
import type { AgentContext } from "./agent.js";

/**
 * Every observable thing the engine does is published as a `SwitchboardEvent`.
 *
 * @typeParam K - The topic; the payload type follows from it.
 */
export interface SwitchboardEvent<K extends EventTopic = EventTopic> {
  readonly id: EventId;
  readonly topic: K;
  readonly payload: EventPayloads[K];
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
}

/** Payload shape per topic. */
export interface EventPayloads {
  "graph.run.start": { readonly sessionId: SessionId; readonly entry: string };
  "graph.step": {
    readonly sessionId: SessionId;
    readonly step: number;
    readonly node: string;
    readonly next: string;
    readonly messages: ReadonlyArray<Message>;
    readonly dialogState: ReadonlyArray<AgentContext>;
  };
  "graph.run.complete": { readonly sessionId: SessionId; readonly steps: number };
  "graph.run.error": { readonly sessionId: SessionId; readonly node?: string; readonly error: string };
  "invoker.retry": { readonly agent: string; readonly attempt: number };
  "tools.fallback": {
    readonly node: string;
    readonly toolCallIds: ReadonlyArray<string>;
    readonly error: string;
  };
}

/**
 * Using a string union rather than a numeric enum for debuggability.
 */
export type EventTopic = keyof EventPayloads;

/** Callback signature for event subscribers. */
export type EventHandler<K extends EventTopic = EventTopic> = (
  event: SwitchboardEvent<K>,
) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBus {
  /** Publish an event to all subscribers of its topic. */
  publish<K extends EventTopic>(event: SwitchboardEvent<K>): Promise<void>;

  /** Subscribe to one topic. */
  subscribe<K extends EventTopic>(topic: K, handler: EventHandler<K>): Subscription;
}
