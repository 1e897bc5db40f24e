import type { InferredSchema } from '../../domain/model/ColumnSchema.js';
import type { InterpreterContext } from '../InterpreterContext.js';
import { describeSchema } from '../../domain/model/ColumnSchema.js';
import { SchemaInferencer } from '../../domain/services/SchemaInferencer.js';

/** Use case: scan the leading sample from byte 0 and fix the column schema. */
export class InferSchema {
  constructor(private readonly ctx: InterpreterContext) {}

  execute(): InferredSchema {
    this.ctx.requireOpen();
    const inferred = new SchemaInferencer(this.ctx.settings.sampleRows).infer(this.ctx.source);
    this.ctx.applySchema(inferred);
    const { fileName, fileSize } = this.ctx.source.metadata();

    this.ctx.eventBus.emit({
      type: 'schema:inferred',
      columns: inferred.schema.length,
      sampledRows: inferred.sampledRows,
      schema: inferred.schema,
      columnTypes: describeSchema(inferred.schema),
      fileName,
      fileSize,
      timestamp: Date.now(),
    });

    return inferred;
  }
}
