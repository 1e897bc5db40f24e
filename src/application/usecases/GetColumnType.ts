import type { QueryResult } from '../../domain/model/QueryResult.js';
import type { TypeRank } from '../../domain/model/TypeRank.js';
import type { InterpreterContext } from '../InterpreterContext.js';
import { failedResult, okResult, unknownColumn } from '../../domain/model/QueryResult.js';

/** Use case: look up the inferred rank of a column. */
export class GetColumnType {
  constructor(private readonly ctx: InterpreterContext) {}

  execute(columnIndex: number): QueryResult<TypeRank> {
    this.ctx.requireOpen();
    const schema = this.ctx.schema;
    const rank = Number.isSafeInteger(columnIndex) && columnIndex >= 0 ? schema[columnIndex] : undefined;

    if (rank === undefined) {
      const failure = unknownColumn(columnIndex, schema.length);
      this.ctx.eventBus.emit({ type: 'query:failed', failure, timestamp: Date.now() });
      return failedResult(failure);
    }
    return okResult(rank);
  }
}
