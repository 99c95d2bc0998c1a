/** Branded opaque identifier types for compile-time safety. */
type Brand<T, B extends string> = T & { readonly __brand: B };

export type SessionId = Brand<string, "SessionId">;
export type TraceId = Brand<string, "TraceId">;
export type SpanId = Brand<string, "SpanId">;
export type EventId = Brand<string, "EventId">;

/** ISO 8601 timestamp. */
export type Timestamp = string;
