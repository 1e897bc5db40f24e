import type { ColumnSchema } from '../model/ColumnSchema.js';
import type { QueryFailure } from '../model/QueryResult.js';

/** Emitted once, during construction, after the leading sample has been scanned. */
export interface SchemaInferredEvent {
  readonly type: 'schema:inferred';
  readonly columns: number;
  readonly sampledRows: number;
  readonly schema: ColumnSchema;
  /** Display names of `schema`, e.g. `['INTEGER', 'STRING']`. */
  readonly columnTypes: readonly string[];
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly timestamp: number;
}

/** Emitted after every successful value lookup, including missing values. */
export interface ValueReadEvent {
  readonly type: 'value:read';
  readonly columnIndex: number;
  readonly rowOffset: number;
  readonly missing: boolean;
  readonly value: string;
  readonly timestamp: number;
}

/** Emitted when a query fails with `UNKNOWN_COLUMN` or `OFFSET_OUT_OF_RANGE`. */
export interface QueryFailedEvent {
  readonly type: 'query:failed';
  readonly failure: QueryFailure;
  readonly timestamp: number;
}

/** Emitted when `close()` releases the underlying source. */
export interface InterpreterClosedEvent {
  readonly type: 'interpreter:closed';
  readonly timestamp: number;
}

export type DomainEvent = SchemaInferredEvent | ValueReadEvent | QueryFailedEvent | InterpreterClosedEvent;

export type EventType = DomainEvent['type'];

/** Extract the event interface for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

export function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
