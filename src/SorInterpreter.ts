import type { ColumnSchema } from './domain/model/ColumnSchema.js';
import type { QueryResult } from './domain/model/QueryResult.js';
import type { TypeRank } from './domain/model/TypeRank.js';
import type { LineSource } from './domain/ports/LineSource.js';
import type { EventType } from './domain/events/DomainEvents.js';
import type { EventHandler, WildcardHandler } from './application/EventBus.js';
import type { InterpreterSettings } from './application/InterpreterContext.js';
import { InterpreterContext } from './application/InterpreterContext.js';
import { InferSchema } from './application/usecases/InferSchema.js';
import { GetValue } from './application/usecases/GetValue.js';
import { GetColumnType } from './application/usecases/GetColumnType.js';
import { CloseInterpreter } from './application/usecases/CloseInterpreter.js';
import { MISSING_VALUE } from './domain/model/Field.js';
import { unwrapResult } from './domain/model/QueryResult.js';
import { displayTypeRank } from './domain/model/TypeRank.js';
import { DEFAULT_SAMPLE_ROWS } from './domain/services/SchemaInferencer.js';
import { FileLineSource } from './infrastructure/sources/FileLineSource.js';

/** Configuration for an interpreter instance. Fixed at construction. */
export interface SorInterpreterOptions {
  /** Byte offset where the access window starts. Default: `0`. */
  readonly startByte?: number;
  /** Length of the access window in bytes. Default: unbounded (read to end of file). */
  readonly lengthBytes?: number;
  /** Maximum number of leading lines sampled for schema inference. Default: `500`. */
  readonly sampleRows?: number;
  /** Encoding for decoding lines of a file path. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for file reads. Default: `65536` (64KB). */
  readonly highWaterMark?: number;
  /** Resume forward scans from the last row reached instead of the window start. Default: `true`. */
  readonly cachePositions?: boolean;
  /** Called with the `schema:inferred` event, which fires before `on()` can be used. */
  readonly onSchemaInferred?: EventHandler<'schema:inferred'>;
}

function assertNonNegativeInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isSafeInteger(value) || value < 0)) {
    throw new Error(`SorInterpreter: '${name}' must be a non-negative integer, got ${String(value)}`);
  }
}

function assertPositiveInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isSafeInteger(value) || value < 1)) {
    throw new Error(`SorInterpreter: '${name}' must be a positive integer, got ${String(value)}`);
  }
}

function resolveSettings(options: SorInterpreterOptions): InterpreterSettings {
  assertNonNegativeInteger('startByte', options.startByte);
  assertNonNegativeInteger('lengthBytes', options.lengthBytes);
  assertPositiveInteger('sampleRows', options.sampleRows);
  assertPositiveInteger('highWaterMark', options.highWaterMark);

  const startByte = options.startByte ?? 0;
  return {
    window: options.lengthBytes !== undefined ? { startByte, lengthBytes: options.lengthBytes } : { startByte },
    sampleRows: options.sampleRows ?? DEFAULT_SAMPLE_ROWS,
    cachePositions: options.cachePositions ?? true,
  };
}

/**
 * Reads field values from a Schema-on-Read file: one record per line, each field
 * wrapped in `<` … `>`.
 *
 * The column schema is inferred once, in the constructor, from the first
 * `sampleRows` lines of the file. Value queries are restricted to the access
 * window `(startByte, lengthBytes)` and report values looser than their column
 * type as missing (`''`).
 *
 * The source stays open until `close()`. Instances are synchronous and not safe
 * for concurrent use; serialize queries against a single instance.
 *
 * @example
 * ```typescript
 * const sor = new SorInterpreter('data.sor', { startByte: 1024, lengthBytes: 4096 });
 * try {
 *   const type = sor.getColumnTypeName(2);
 *   const value = sor.getValue(2, 0);
 * } finally {
 *   sor.close();
 * }
 * ```
 */
export class SorInterpreter {
  private readonly ctx: InterpreterContext;

  /** Open a file path, or wrap an existing `LineSource`, and infer its schema. */
  constructor(input: string | LineSource, options: SorInterpreterOptions = {}) {
    const settings = resolveSettings(options);
    const source =
      typeof input === 'string'
        ? new FileLineSource(input, { encoding: options.encoding, highWaterMark: options.highWaterMark })
        : input;

    this.ctx = new InterpreterContext(source, settings);
    if (options.onSchemaInferred) {
      this.ctx.eventBus.on('schema:inferred', options.onSchemaInferred);
    }

    try {
      new InferSchema(this.ctx).execute();
    } catch (error) {
      source.close();
      throw error;
    }
  }

  /** Inferred column ranks. Frozen. */
  get schema(): ColumnSchema {
    return this.ctx.schema;
  }

  get columnCount(): number {
    return this.ctx.schema.length;
  }

  /** Number of lines read during inference. */
  get sampledRows(): number {
    return this.ctx.sampledRows;
  }

  /** Inferred rank of a column. Throws `SorQueryError` (`UNKNOWN_COLUMN`) past the schema. */
  getColumnType(columnIndex: number): TypeRank {
    return unwrapResult(this.tryGetColumnType(columnIndex));
  }

  getColumnTypeName(columnIndex: number): string {
    return displayTypeRank(this.getColumnType(columnIndex));
  }

  tryGetColumnType(columnIndex: number): QueryResult<TypeRank> {
    return new GetColumnType(this.ctx).execute(columnIndex);
  }

  /**
   * Value at `rowOffset` (0-based, within the access window) in `columnIndex`.
   * Returns `''` for missing values; throws `SorQueryError` for unknown columns or unreachable rows.
   */
  getValue(columnIndex: number, rowOffset: number): string {
    return unwrapResult(this.tryGetValue(columnIndex, rowOffset));
  }

  /** Non-throwing form of `getValue()`. */
  tryGetValue(columnIndex: number, rowOffset: number): QueryResult<string> {
    return new GetValue(this.ctx).execute(columnIndex, rowOffset);
  }

  isMissing(columnIndex: number, rowOffset: number): boolean {
    return this.getValue(columnIndex, rowOffset) === MISSING_VALUE;
  }

  /** Subscribe to interpreter events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  offAny(handler: WildcardHandler): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /** Release the underlying source. Idempotent; later queries throw. */
  close(): void {
    new CloseInterpreter(this.ctx).execute();
  }
}

/**
 * Open an interpreter, run `fn` with it, and close it whether `fn` returns or throws.
 * `fn` must finish its work synchronously.
 */
export function withSorInterpreter<T>(
  input: string | LineSource,
  options: SorInterpreterOptions,
  fn: (interpreter: SorInterpreter) => T,
): T {
  const interpreter = new SorInterpreter(input, options);
  try {
    return fn(interpreter);
  } finally {
    interpreter.close();
  }
}
