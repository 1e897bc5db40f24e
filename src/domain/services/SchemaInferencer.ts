import type { InferredSchema } from '../model/ColumnSchema.js';
import type { TypeRank } from '../model/TypeRank.js';
import type { LineSource } from '../ports/LineSource.js';
import { tokenizeRow } from './RowTokenizer.js';

/** Default number of leading lines sampled for inference. */
export const DEFAULT_SAMPLE_ROWS = 500;

/**
 * Derives the per-column type ranks from the first `sampleRows` lines of a source.
 *
 * Always scans from byte 0; the access window does not apply. Each column ends up
 * with the loosest rank observed for it in the sample. Columns first seen after
 * the sample are not represented.
 */
export class SchemaInferencer {
  private readonly sampleRows: number;

  constructor(sampleRows: number = DEFAULT_SAMPLE_ROWS) {
    this.sampleRows = sampleRows;
  }

  infer(source: LineSource): InferredSchema {
    const schema: TypeRank[] = [];
    let sampledRows = 0;

    source.seek(0);
    while (sampledRows < this.sampleRows) {
      const line = source.readLine();
      if (line === null) break;
      sampledRows++;

      const row = tokenizeRow(line.text, schema);
      row.forEach((field, columnIndex) => {
        // Ranks are already promoted against the existing entry, so overwrite or append.
        schema[columnIndex] = field.rank;
      });
    }

    return { schema: Object.freeze(schema), sampledRows };
  }
}
