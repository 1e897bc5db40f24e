/** Error codes produced by interpreter queries. */
export type QueryErrorCode = 'UNKNOWN_COLUMN' | 'OFFSET_OUT_OF_RANGE';

/** Why a query could not be answered. A missing value is not a failure. */
export interface QueryFailure {
  /** Machine-readable error code. */
  readonly code: QueryErrorCode;
  /** Human-readable error message. */
  readonly message: string;
  readonly columnIndex: number;
  /** Requested row, for value queries. */
  readonly rowOffset?: number;
}

export type QueryResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: QueryFailure };

export function okResult<T>(value: T): QueryResult<T> {
  return { ok: true, value };
}

export function failedResult<T>(error: QueryFailure): QueryResult<T> {
  return { ok: false, error };
}

export function unknownColumn(columnIndex: number, columnCount: number, rowOffset?: number): QueryFailure {
  const failure: QueryFailure = {
    code: 'UNKNOWN_COLUMN',
    message: `Unknown column ${String(columnIndex)}: schema has ${String(columnCount)} column(s)`,
    columnIndex,
  };
  return rowOffset !== undefined ? { ...failure, rowOffset } : failure;
}

export function offsetOutOfRange(columnIndex: number, rowOffset: number): QueryFailure {
  return {
    code: 'OFFSET_OUT_OF_RANGE',
    message: `Row offset ${String(rowOffset)} is out of range for the configured window`,
    columnIndex,
    rowOffset,
  };
}

/** Thrown by the throwing query methods. Carries the same data as `QueryFailure`. */
export class SorQueryError extends Error {
  readonly code: QueryErrorCode;
  readonly failure: QueryFailure;

  constructor(failure: QueryFailure) {
    super(failure.message);
    this.name = 'SorQueryError';
    this.code = failure.code;
    this.failure = failure;
  }
}

/** Return the value of a successful result, or throw its failure as a `SorQueryError`. */
export function unwrapResult<T>(result: QueryResult<T>): T {
  if (!result.ok) {
    throw new SorQueryError(result.error);
  }
  return result.value;
}
