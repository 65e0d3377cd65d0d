import type { SearchStatistics } from "./types.js";

/**
 * Reason a {@link MatrixUsageError} was raised.
 *
 * @category Errors
 */
export type MatrixUsageErrorCode =
  | "COLUMN_OUT_OF_RANGE"
  | "ROW_OUT_OF_RANGE"
  | "DUPLICATE_COLUMN"
  | "DUPLICATE_LABEL"
  | "UNKNOWN_LABEL"
  | "MATRIX_LEASED"
  | "COLUMNS_COVERED"
  | "ALREADY_COVERED"
  | "NOT_COVERED"
  | "UNCOVER_ORDER";

/**
 * Error thrown when a matrix is built or manipulated incorrectly.
 *
 * Raised at the call that caused it; the matrix is left unchanged and stays
 * usable for subsequent valid calls.
 *
 * @category Errors
 */
export class MatrixUsageError extends Error {
  public readonly code: MatrixUsageErrorCode;
  public readonly data: unknown;

  constructor(message: string, code: MatrixUsageErrorCode, data?: unknown) {
    super(message);
    this.name = "MatrixUsageError";
    this.code = code;
    this.data = data;
  }
}

/**
 * Error thrown by a solver when its `maxNodes` budget is exhausted.
 *
 * The matrix has already been restored when this is thrown.
 *
 * @category Errors
 */
export class SearchLimitExceededError extends Error {
  public readonly limit: number;
  public readonly statistics: SearchStatistics;

  constructor(limit: number, statistics: SearchStatistics) {
    super(`Search exceeded the limit of ${limit} nodes`);
    this.name = "SearchLimitExceededError";
    this.limit = limit;
    this.statistics = statistics;
  }
}

/**
 * A broken internal invariant. Indicates a bug, never recovered from.
 *
 * @category Errors
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) throw new InvariantError(message);
}
