import type { QueryResult } from '../../domain/model/QueryResult.js';
import type { InterpreterContext } from '../InterpreterContext.js';
import { MISSING_VALUE } from '../../domain/model/Field.js';

/** Use case: read one field from the access window, reconciled against the schema. */
export class GetValue {
  constructor(private readonly ctx: InterpreterContext) {}

  execute(columnIndex: number, rowOffset: number): QueryResult<string> {
    const result = this.ctx.locator.lookup(columnIndex, rowOffset);

    if (result.ok) {
      this.ctx.eventBus.emit({
        type: 'value:read',
        columnIndex,
        rowOffset,
        missing: result.value === MISSING_VALUE,
        value: result.value,
        timestamp: Date.now(),
      });
    } else {
      this.ctx.eventBus.emit({ type: 'query:failed', failure: result.error, timestamp: Date.now() });
    }

    return result;
  }
}
