import type { AccessWindow } from '../model/AccessWindow.js';
import type { ColumnSchema } from '../model/ColumnSchema.js';
import type { QueryResult } from '../model/QueryResult.js';
import type { Line, LineSource } from '../ports/LineSource.js';
import { isBounded } from '../model/AccessWindow.js';
import { MISSING_VALUE } from '../model/Field.js';
import { failedResult, offsetOutOfRange, okResult, unknownColumn } from '../model/QueryResult.js';
import { tokenizeRow } from './RowTokenizer.js';

/** Last row reached and the window bytes consumed before its line, used to resume forward scans. */
interface RowCursor {
  readonly row: number;
  readonly consumedBefore: number;
}

/**
 * Random access to individual field values inside an access window.
 *
 * Each lookup behaves as a fresh scan from the window start: seek, discard the
 * straddling line when `startByte` is nonzero, then count lines until the target
 * row, end of data, or the byte bound. Bytes consumed are summed from each line's
 * `byteLength`, the discarded line included. With `cachePositions`, a lookup for
 * the same or a later row resumes from the last row reached; the per-line bound
 * checks are the same, so results do not change.
 *
 * Not safe for concurrent use: the source cursor is shared.
 */
export class RowLocator {
  private cursor: RowCursor | null = null;

  constructor(
    private readonly source: LineSource,
    private readonly schema: ColumnSchema,
    private readonly window: AccessWindow,
    private readonly cachePositions: boolean = true,
  ) {}

  /** Text of row `rowOffset` within the window, or `null` when the row is not reached. */
  locate(rowOffset: number): string | null {
    const cached = this.cachePositions ? this.cursor : null;
    let row = -1;
    let consumed = 0;
    let current: Line | null = null;
    let currentBefore = 0;

    if (cached !== null && cached.row > 0 && cached.row <= rowOffset) {
      this.source.seek(this.window.startByte + cached.consumedBefore);
      row = cached.row - 1;
      consumed = cached.consumedBefore;
    } else {
      this.source.seek(this.window.startByte);
      if (this.window.startByte > 0) {
        consumed += this.source.readLine()?.byteLength ?? 0;
      }

      currentBefore = consumed;
      current = this.source.readLine();
      if (current === null) return null;
      consumed += current.byteLength;
      // Row 0 only counts while strictly inside the bound.
      if (isBounded(this.window) && consumed >= this.window.lengthBytes) return null;
      row = 0;
    }

    while (row < rowOffset) {
      const before = consumed;
      const next = this.source.readLine();
      if (next === null) return null;
      consumed += next.byteLength;
      if (isBounded(this.window) && consumed > this.window.lengthBytes) return null;

      row++;
      current = next;
      currentBefore = before;
    }

    if (current === null) return null;
    this.cursor = { row, consumedBefore: currentBefore };
    return current.text;
  }

  /**
   * Value at (`columnIndex`, `rowOffset`), reconciled against the fixed schema.
   *
   * Returns `MISSING_VALUE` when the row has no such field, the field is missing,
   * or its rank is looser than the column's inferred rank.
   */
  lookup(columnIndex: number, rowOffset: number): QueryResult<string> {
    if (!Number.isSafeInteger(rowOffset) || rowOffset < 0) {
      return failedResult(offsetOutOfRange(columnIndex, rowOffset));
    }

    const line = this.locate(rowOffset);
    if (line === null) {
      return failedResult(offsetOutOfRange(columnIndex, rowOffset));
    }

    const schemaRank = Number.isSafeInteger(columnIndex) && columnIndex >= 0 ? this.schema[columnIndex] : undefined;
    if (schemaRank === undefined) {
      return failedResult(unknownColumn(columnIndex, this.schema.length, rowOffset));
    }

    const field = tokenizeRow(line, this.schema)[columnIndex];
    if (field === undefined || field.missing || field.rank > schemaRank) {
      return okResult(MISSING_VALUE);
    }
    return okResult(field.value);
  }
}
