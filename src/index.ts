/**
 * Exact cover solver built on dancing links and Algorithm X.
 *
 * Describe a problem as columns (constraints) and rows (candidates that
 * satisfy some of the constraints). The solver enumerates selections of rows
 * that cover every primary column exactly once and every secondary column
 * at most once.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Matrix**: The sparse incidence structure. Columns are added first (or
 * interleaved with rows), then rows as lists of column ids. {@link Matrix}
 * supports `cover`/`uncover`, the reversible operations the search is built
 * on.
 *
 * **Primary vs Secondary columns**: A primary column must be covered by
 * exactly one selected row. A secondary column may be covered at most once;
 * use it for constraints that only forbid overlap, such as the diagonals in
 * N-queens.
 *
 * **Solving**: {@link solve} returns a lazy {@link Solver}. Each `next()`
 * resumes the search until the next solution. Abandoning the iterator
 * restores the matrix, so the same matrix can be searched again.
 * {@link collectSolutions} drains a search into memory and reports why it
 * stopped.
 *
 * **Problems**: {@link defineProblem} and {@link fromRows} validate a
 * complete instance once and hand out a fresh matrix per search.
 *
 * @example Build and solve a matrix
 * ```typescript
 * import { Matrix, solve } from "exact-cover-dlx";
 *
 * const matrix = new Matrix();
 * matrix.addColumns(4);
 * matrix.addRow([0, 1]);
 * matrix.addRow([2, 3]);
 * matrix.addRow([0, 2]);
 * matrix.addRow([1, 3]);
 *
 * for (const solution of solve(matrix)) {
 *   console.log(solution); // [0, 1] then [2, 3]
 * }
 * ```
 *
 * @example Bound the search
 * ```typescript
 * import { collectSolutions, SEARCH_STATUS } from "exact-cover-dlx";
 *
 * const result = collectSolutions(matrix, { maxNodes: 10_000, limit: 2 });
 * if (result.status === SEARCH_STATUS.SEARCH_LIMIT_EXCEEDED) {
 *   console.log(`Gave up after ${result.statistics.nodes} nodes`);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Types
// ============================================================================

export type {
  ColumnId,
  RowId,
  Solution,
  ColumnKind,
  ColumnSpec,
  ColumnRef,
  RowSpec,
  ExactCoverProblemDefinition,
  SolveOptions,
  CollectOptions,
  SolverState,
  SearchStatus,
  SearchStatistics,
} from "./types.js";

export { SEARCH_STATUS } from "./types.js";

export {
  ColumnKindSchema,
  ColumnSpecSchema,
  RowSpecSchema,
  ExactCoverProblemSchema,
  SolveOptionsSchema,
  CollectOptionsSchema,
  SearchStatusSchema,
  SearchStatisticsSchema,
} from "./schemas.js";

// ============================================================================
// Errors
// ============================================================================

export {
  MatrixUsageError,
  SearchLimitExceededError,
  InvariantError,
} from "./errors.js";

export type { MatrixUsageErrorCode } from "./errors.js";

// ============================================================================
// Logging
// ============================================================================

export type { Logger } from "./logger.js";

export { noopLogger } from "./logger.js";

// ============================================================================
// Matrix
// ============================================================================

export { Matrix } from "./dlx/matrix.js";

export type { ColumnOptions, MatrixSnapshot, MatrixLease } from "./dlx/matrix.js";

// ============================================================================
// Solver
// ============================================================================

export { Solver, solve } from "./dlx/solver.js";

export {
  collectSolutions,
  firstSolution,
  countSolutions,
  resolveSolution,
} from "./dlx/results.js";

export type { SolveResult } from "./dlx/results.js";

// ============================================================================
// Problem Definition API
// ============================================================================

export { defineProblem, fromRows } from "./problem.js";

export type { ExactCoverProblem, FromRowsOptions } from "./problem.js";
