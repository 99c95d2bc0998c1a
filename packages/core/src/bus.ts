import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  EventHandler,
  EventId,
  EventPayloads,
  EventTopic,
  SpanId,
  Subscription,
  SwitchboardEvent,
  TraceContext,
  TraceId,
} from "@switchboard/types";
import { createLogger, type Logger } from "./logger.js";

interface Subscriber {
  readonly id: string;
  readonly topic: EventTopic;
  deliver(event: SwitchboardEvent): void | Promise<void>;
}

function isTopic<K extends EventTopic>(
  event: SwitchboardEvent,
  topic: K,
): event is SwitchboardEvent<K> {
  return event.topic === topic;
}

/**
 * In-memory implementation of the Switchboard event bus.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<Subscriber>();

  constructor(private readonly logger: Logger = createLogger({ component: "bus" })) {}

  async publish<K extends EventTopic>(event: SwitchboardEvent<K>): Promise<void> {
    const promises: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (sub.topic !== event.topic) continue;
      try {
        const result = sub.deliver(event);
        if (result instanceof Promise) {
          promises.push(result);
        }
      } catch (err) {
        this.logger.error("Error in event handler", { topic: event.topic, error: String(err) });
      }
    }

    // Handlers are awaited so a publish completes only after dispatch.
    const results = await Promise.allSettled(promises);
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.error("Error in event handler", {
          topic: event.topic,
          error: String(result.reason),
        });
      }
    }
  }

  subscribe<K extends EventTopic>(topic: K, handler: EventHandler<K>): Subscription {
    const id = uuidv7();
    const sub: Subscriber = {
      id,
      topic,
      deliver: (event) => (isTopic(event, topic) ? handler(event) : undefined),
    };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<K extends EventTopic>(
  topic: K,
  payload: EventPayloads[K],
  traceCtx: TraceContext,
): SwitchboardEvent<K> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
