import { describe, it, expect } from 'vitest';
import { SchemaInferencer, DEFAULT_SAMPLE_ROWS } from '../../../src/domain/services/SchemaInferencer.js';
import { BufferLineSource } from '../../../src/infrastructure/sources/BufferLineSource.js';
import { TypeRank } from '../../../src/domain/model/TypeRank.js';
import { describeSchema } from '../../../src/domain/model/ColumnSchema.js';

function infer(content: string, sampleRows?: number) {
  return new SchemaInferencer(sampleRows).infer(new BufferLineSource(content));
}

describe('SchemaInferencer', () => {
  it('should promote a column to the loosest rank observed', () => {
    const result = infer('<1>\n<0>\n<2>\n');
    expect(result.schema).toEqual([TypeRank.INTEGER]);
    expect(result.sampledRows).toBe(3);
  });

  it('should append columns as they first appear', () => {
    const result = infer('<1><abc>\n<2.5>\n<x><y><3>\n');
    expect(result.schema).toEqual([TypeRank.STRING, TypeRank.STRING, TypeRank.INTEGER]);
  });

  it('should rank empty fields as BOOL', () => {
    expect(infer('<><>\n').schema).toEqual([TypeRank.BOOL, TypeRank.BOOL]);
  });

  it('should stop after the configured sample size', () => {
    const result = infer('<1>\n<2>\n<abc><1>\n', 2);
    expect(result.schema).toEqual([TypeRank.INTEGER]);
    expect(result.sampledRows).toBe(2);
  });

  it('should sample 500 lines by default', () => {
    const lines = [...Array.from({ length: 500 }, () => '<1>'), '<abc><1>', '<xyz>'];
    const result = infer(lines.join('\n'));

    expect(DEFAULT_SAMPLE_ROWS).toBe(500);
    expect(result.schema).toEqual([TypeRank.BOOL]);
    expect(result.sampledRows).toBe(500);
  });

  it('should scan from byte 0 even when the source cursor has moved', () => {
    const source = new BufferLineSource('<abc>\n<1>\n');
    source.seek(6);
    expect(new SchemaInferencer().infer(source).schema).toEqual([TypeRank.STRING]);
  });

  it('should count blank lines as sampled rows', () => {
    const result = infer('<1>\n\n<2>\n');
    expect(result.sampledRows).toBe(3);
    expect(result.schema).toEqual([TypeRank.INTEGER]);
  });

  it('should return an empty schema for empty input', () => {
    expect(infer('')).toEqual({ schema: [], sampledRows: 0 });
  });

  it('should describe a schema by display name', () => {
    expect(describeSchema(infer('<1><a><2.5>\n').schema)).toEqual(['BOOL', 'STRING', 'FLOAT']);
  });

  it('should return a frozen schema', () => {
    expect(Object.isFrozen(infer('<1>\n').schema)).toBe(true);
  });

  it('should never lower a rank as more rows are sampled', () => {
    const content = ['<0><1>', '<5>', '<1.5><x>', '<1><2>', '<abc><>', '<0><0><0>'].join('\n');

    let previous: readonly TypeRank[] = [];
    for (let rows = 1; rows <= 6; rows++) {
      const { schema } = infer(content, rows);
      expect(schema.length).toBeGreaterThanOrEqual(previous.length);
      previous.forEach((rank, column) => {
        expect(schema[column]).toBeGreaterThanOrEqual(rank);
      });
      previous = schema;
    }

    expect(previous).toEqual([TypeRank.STRING, TypeRank.STRING, TypeRank.BOOL]);
  });
});
