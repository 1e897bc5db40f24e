import type { ColumnSchema } from '../model/ColumnSchema.js';
import type { Field, Row } from '../model/Field.js';
import { rankAt } from '../model/ColumnSchema.js';
import { missingField, presentField } from '../model/Field.js';
import { TypeRank, promote } from '../model/TypeRank.js';

/**
 * Characters allowed inside a field body, except the double quote:
 * Unicode letters and digits, `_`, whitespace and a fixed punctuation set. `<` and `>` are never allowed.
 */
const FIELD_PATTERN = /<([\p{L}\p{N}_\s.,;:!?'()[\]{}+\-*/=@#$%&|~^`\\"]*)>/gu;

const BOOL_PATTERN = /^[01]\s*$/;
const INTEGER_PATTERN = /^[+-]?\d+\s*$/;
// Accepts `1.2.3`, `1-2` and `.` as well; kept lenient.
const FLOAT_PATTERN = /^[+-]?[\d.][\d.+-]*\s*$/;
const QUOTED_STRING_PATTERN = /^"[\p{L}\p{N}_\s.,;:!?'()[\]{}+\-*/=@#$%&|~^`\\]*"$/u;
const UNQUOTED_STRING_PATTERN = /^[\p{L}\p{N}_\s.,;:!?'()[\]{}+\-*/=@#$%&|~^`\\]+$/u;

interface Classification {
  readonly rank: TypeRank;
  readonly value: string;
}

interface ClassificationRule {
  readonly name: string;
  classify(body: string): Classification | null;
}

function numericRule(name: string, pattern: RegExp, rank: TypeRank): ClassificationRule {
  return {
    name,
    classify: (body) => (pattern.test(body) ? { rank, value: body.trimEnd() } : null),
  };
}

/** Ordered cascade: the first rule that returns a classification wins. */
const RULES: readonly ClassificationRule[] = [
  numericRule('bool', BOOL_PATTERN, TypeRank.BOOL),
  numericRule('integer', INTEGER_PATTERN, TypeRank.INTEGER),
  numericRule('float', FLOAT_PATTERN, TypeRank.FLOAT),
  {
    name: 'string',
    classify: (body) => {
      if (QUOTED_STRING_PATTERN.test(body)) {
        return { rank: TypeRank.STRING, value: body };
      }
      if (UNQUOTED_STRING_PATTERN.test(body)) {
        return { rank: TypeRank.STRING, value: `"${body}"` };
      }
      return null;
    },
  },
];

/** Return the bracket-delimited field bodies of a line, markers stripped, in source order. */
export function extractBodies(line: string): string[] {
  const bodies: string[] = [];
  for (const match of line.matchAll(FIELD_PATTERN)) {
    bodies.push(match[1] ?? '');
  }
  return bodies;
}

/**
 * Classify a single field body.
 *
 * The returned rank is always promoted against `currentRank`, so the same call
 * serves schema building (accumulate the loosest rank) and schema checking
 * (compare against the fixed rank). Empty and unclassifiable bodies are missing.
 */
export function classifyBody(body: string, currentRank: TypeRank = TypeRank.BOOL): Field {
  if (body === '') {
    return missingField(promote(currentRank, TypeRank.BOOL));
  }

  for (const rule of RULES) {
    const result = rule.classify(body);
    if (result) {
      return presentField(promote(currentRank, result.rank), result.value);
    }
  }

  return missingField(promote(currentRank, TypeRank.BOOL));
}

/** Tokenize one line, classifying each field against the rank its column has in `schema`. */
export function tokenizeRow(line: string, schema: ColumnSchema = []): Row {
  return extractBodies(line).map((body, columnIndex) => classifyBody(body, rankAt(schema, columnIndex)));
}
