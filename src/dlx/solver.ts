import { MatrixUsageError, SearchLimitExceededError } from "../errors.js";
import { createPrefixedLogger, noopLogger, type Logger } from "../logger.js";
import { SolveOptionsSchema } from "../schemas.js";
import type {
  ColumnId,
  RowId,
  SearchStatistics,
  Solution,
  SolveOptions,
  SolverState,
} from "../types.js";
import type { Matrix, MatrixLease } from "./matrix.js";

/**
 * Lazy Algorithm X search over a {@link Matrix}.
 *
 * Solutions are produced one at a time; the search is suspended between
 * calls to `next()`. Stopping early (via `return()`, `break` in a
 * `for...of` loop, destructuring, or leaving the scope of a `using`
 * declaration) unwinds every pending cover, so the matrix is back in its
 * original state as soon as the solver is closed, exhausted, or fails.
 *
 * The matrix is leased on the first `next()` and released when the search
 * ends. While leased, the matrix rejects cover, uncover and construction
 * calls from anywhere else.
 *
 * @category Solver
 */
export class Solver implements IterableIterator<Solution>, Disposable {
  readonly #matrix: Matrix;
  readonly #maxNodes: number | undefined;
  readonly #initialColumns: readonly ColumnId[];
  readonly #logger: Logger;

  #generator: Generator<Solution, void, undefined> | undefined;
  #selection: RowId[] = [];
  #state: SolverState = "PENDING";
  #stats: SearchStatistics = { nodes: 0, updates: 0, solutions: 0, maxDepth: 0 };

  /**
   * @throws ZodError when the options are malformed
   * @throws MatrixUsageError when an initial column is unknown or repeated
   */
  constructor(matrix: Matrix, options: SolveOptions = {}) {
    const { maxNodes, initialColumns = [], logger } = SolveOptionsSchema.parse(options);

    const seen = new Set<ColumnId>();
    for (const column of initialColumns) {
      if (column >= matrix.columnCount) {
        throw new MatrixUsageError(
          `Initial column ${column} is out of range (matrix has ${matrix.columnCount} columns)`,
          "COLUMN_OUT_OF_RANGE",
          { column, columnCount: matrix.columnCount },
        );
      }
      if (seen.has(column)) {
        throw new MatrixUsageError(
          `Initial column ${column} is listed more than once`,
          "DUPLICATE_COLUMN",
          { column },
        );
      }
      seen.add(column);
    }

    this.#matrix = matrix;
    this.#maxNodes = maxNodes;
    this.#initialColumns = initialColumns;
    this.#logger = logger ? createPrefixedLogger("exact-cover", logger) : noopLogger;
  }

  get state(): SolverState {
    return this.#state;
  }

  /** Counters so far. Returns a copy. */
  get statistics(): SearchStatistics {
    return { ...this.#stats };
  }

  /**
   * Rows chosen on the current search path. While suspended after a
   * solution this is that solution; empty before the search starts and
   * after it ends. Returns a copy.
   */
  get partialSolution(): Solution {
    return [...this.#selection];
  }

  /**
   * Resumes the search until the next solution.
   *
   * @throws SearchLimitExceededError when `maxNodes` is exceeded
   * @throws MatrixUsageError when the matrix is already leased or has covered columns
   */
  next(): IteratorResult<Solution, undefined> {
    if (this.#state !== "PENDING" && this.#state !== "RUNNING") {
      return { done: true, value: undefined };
    }

    if (this.#generator === undefined) {
      this.#generator = this.#run();
      this.#state = "RUNNING";
    }

    let result: IteratorResult<Solution, void>;
    try {
      result = this.#generator.next();
    } catch (error) {
      throw this.#fail(error);
    }

    if (result.done) {
      this.#state = "EXHAUSTED";
      return { done: true, value: undefined };
    }
    return { done: false, value: result.value };
  }

  /** Stops the search and restores the matrix. Safe to call more than once. */
  return(): IteratorResult<Solution, undefined> {
    if (this.#state === "RUNNING") {
      this.#generator?.return();
    }
    if (this.#state === "PENDING" || this.#state === "RUNNING") {
      this.#state = "CLOSED";
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Same as {@link Solver.return}; lets `using` scope a search. */
  [Symbol.dispose](): void {
    this.return();
  }

  /** Records why the search stopped and hands back the error to rethrow. */
  #fail(error: unknown): unknown {
    if (!(error instanceof SearchLimitExceededError)) {
      this.#state = "CLOSED";
      return error;
    }
    this.#state = "SEARCH_LIMIT_EXCEEDED";
    try {
      this.#logger.warn("Node limit exceeded", { limit: error.limit, ...error.statistics });
    } finally {
      // A failing logger must not replace the limit error
      return error;
    }
  }

  *#run(): Generator<Solution, void, undefined> {
    const lease = this.#matrix.acquire();
    const covered: ColumnId[] = [];
    try {
      this.#logger.debug("Search started", {
        columns: this.#matrix.columnCount,
        rows: this.#matrix.rowCount,
        initialColumns: this.#initialColumns.length,
        maxNodes: this.#maxNodes,
      });
      for (const column of this.#initialColumns) {
        this.#stats.updates += lease.cover(column);
        covered.push(column);
      }
      yield* this.#search(lease, this.#selection);
    } finally {
      for (const column of covered.toReversed()) {
        lease.uncover(column);
      }
      lease.release();
    }
    this.#logger.debug("Search finished", { ...this.#stats });
  }

  *#search(lease: MatrixLease, selection: RowId[]): Generator<Solution, void, undefined> {
    this.#stats.nodes++;
    if (this.#maxNodes !== undefined && this.#stats.nodes > this.#maxNodes) {
      throw new SearchLimitExceededError(this.#maxNodes, this.statistics);
    }
    this.#stats.maxDepth = Math.max(this.#stats.maxDepth, selection.length);

    const column = lease.selectColumn();
    if (column === undefined) {
      this.#stats.solutions++;
      yield [...selection];
      return;
    }
    if (lease.columnSize(column) === 0) return;

    this.#stats.updates += lease.cover(column);
    try {
      const header = lease.header(column);
      for (let row = lease.down(header); row !== header; row = lease.down(row)) {
        selection.push(lease.rowOf(row));
        for (let node = lease.right(row); node !== row; node = lease.right(node)) {
          this.#stats.updates += lease.cover(lease.columnOf(node));
        }

        try {
          yield* this.#search(lease, selection);
        } finally {
          for (let node = lease.left(row); node !== row; node = lease.left(node)) {
            lease.uncover(lease.columnOf(node));
          }
          selection.pop();
        }
      }
    } finally {
      lease.uncover(column);
    }
  }
}

/**
 * Starts a lazy exact-cover search.
 *
 * @example
 * ```typescript
 * for (const solution of solve(matrix)) {
 *   console.log(solution); // row ids, in the order they were chosen
 * }
 * ```
 *
 * @category Solver
 */
export function solve(matrix: Matrix, options?: SolveOptions): Solver {
  return new Solver(matrix, options);
}
