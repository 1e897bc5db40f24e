import type { AccessWindow } from '../domain/model/AccessWindow.js';
import type { ColumnSchema, InferredSchema } from '../domain/model/ColumnSchema.js';
import type { LineSource } from '../domain/ports/LineSource.js';
import { RowLocator } from '../domain/services/RowLocator.js';
import { EventBus } from './EventBus.js';

/** Resolved interpreter settings, defaults applied. */
export interface InterpreterSettings {
  readonly window: AccessWindow;
  readonly sampleRows: number;
  readonly cachePositions: boolean;
}

/**
 * State shared by the interpreter's use cases.
 *
 * Internal class, not exported from the public API. The schema is applied once,
 * right after inference; queries before that point or after `close()` throw.
 */
export class InterpreterContext {
  readonly eventBus: EventBus;
  readonly source: LineSource;
  readonly settings: InterpreterSettings;

  closed = false;
  private inferred: InferredSchema | null = null;
  private rowLocator: RowLocator | null = null;

  constructor(source: LineSource, settings: InterpreterSettings) {
    this.source = source;
    this.settings = settings;
    this.eventBus = new EventBus();
  }

  applySchema(inferred: InferredSchema): void {
    if (this.inferred !== null) {
      throw new Error('InterpreterContext: schema has already been inferred');
    }
    this.inferred = inferred;
    this.rowLocator = new RowLocator(this.source, inferred.schema, this.settings.window, this.settings.cachePositions);
  }

  get schema(): ColumnSchema {
    return this.requireInferred().schema;
  }

  get sampledRows(): number {
    return this.requireInferred().sampledRows;
  }

  get locator(): RowLocator {
    this.requireOpen();
    if (this.rowLocator === null) {
      throw new Error('SorInterpreter: schema has not been inferred yet');
    }
    return this.rowLocator;
  }

  requireOpen(): void {
    if (this.closed) {
      throw new Error('SorInterpreter: interpreter has been closed');
    }
  }

  private requireInferred(): InferredSchema {
    if (this.inferred === null) {
      throw new Error('SorInterpreter: schema has not been inferred yet');
    }
    return this.inferred;
  }
}
