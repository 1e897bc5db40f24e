// Main entry point
export { SorInterpreter, withSorInterpreter } from './SorInterpreter.js';
export type { SorInterpreterOptions } from './SorInterpreter.js';

// Domain model
export { TypeRank, promote, displayTypeRank } from './domain/model/TypeRank.js';
export type { Field, Row } from './domain/model/Field.js';
export { MISSING_VALUE, presentField, missingField } from './domain/model/Field.js';
export type { ColumnSchema, InferredSchema } from './domain/model/ColumnSchema.js';
export { describeSchema } from './domain/model/ColumnSchema.js';
export type { AccessWindow } from './domain/model/AccessWindow.js';
export type { QueryResult, QueryFailure, QueryErrorCode } from './domain/model/QueryResult.js';
export { SorQueryError, okResult, failedResult, unwrapResult } from './domain/model/QueryResult.js';

// Domain services (for building custom readers)
export { extractBodies, classifyBody, tokenizeRow } from './domain/services/RowTokenizer.js';
export { SchemaInferencer, DEFAULT_SAMPLE_ROWS } from './domain/services/SchemaInferencer.js';
export { RowLocator } from './domain/services/RowLocator.js';

// Ports (for custom implementations)
export type { LineSource, Line, LineSourceMetadata } from './domain/ports/LineSource.js';

// Events
export { EventBus } from './application/EventBus.js';
export type { EventHandler, WildcardHandler } from './application/EventBus.js';
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SchemaInferredEvent,
  ValueReadEvent,
  QueryFailedEvent,
  InterpreterClosedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { FileLineSource } from './infrastructure/sources/FileLineSource.js';
export type { FileLineSourceOptions } from './infrastructure/sources/FileLineSource.js';
export { BufferLineSource } from './infrastructure/sources/BufferLineSource.js';
