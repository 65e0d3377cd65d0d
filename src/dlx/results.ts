import { SearchLimitExceededError } from "../errors.js";
import { CollectOptionsSchema } from "../schemas.js";
import {
  SEARCH_STATUS,
  type CollectOptions,
  type RowId,
  type SearchStatistics,
  type SearchStatus,
  type Solution,
  type SolveOptions,
} from "../types.js";
import type { Matrix } from "./matrix.js";
import { solve } from "./solver.js";

/**
 * Outcome of draining a search into memory.
 *
 * @category Solver
 */
export interface SolveResult {
  /** Why the search stopped. */
  status: SearchStatus;
  /** Solutions found before stopping, in search order. */
  solutions: Solution[];
  /** Counters at the point the search stopped. */
  statistics: SearchStatistics;
}

/**
 * Runs a search and collects its solutions.
 *
 * Reports an exceeded node budget as the `"SEARCH_LIMIT_EXCEEDED"` status
 * rather than throwing, keeping the solutions found before it. When `limit`
 * solutions are found the status is `"SOLUTION_LIMIT"`, even if no further
 * solution exists.
 *
 * @example
 * ```typescript
 * const { status, solutions } = collectSolutions(matrix, { limit: 10 });
 * if (status === SEARCH_STATUS.EXHAUSTED) {
 *   console.log(`All ${solutions.length} solutions found`);
 * }
 * ```
 *
 * @category Solver
 */
export function collectSolutions(matrix: Matrix, options: CollectOptions = {}): SolveResult {
  const { limit, ...solveOptions } = CollectOptionsSchema.parse(options);
  const solver = solve(matrix, solveOptions);
  const solutions: Solution[] = [];

  try {
    for (const solution of solver) {
      solutions.push(solution);
      if (limit !== undefined && solutions.length >= limit) {
        return {
          status: SEARCH_STATUS.SOLUTION_LIMIT,
          solutions,
          statistics: solver.statistics,
        };
      }
    }
  } catch (error) {
    if (error instanceof SearchLimitExceededError) {
      return {
        status: SEARCH_STATUS.SEARCH_LIMIT_EXCEEDED,
        solutions,
        statistics: error.statistics,
      };
    }
    throw error;
  }

  return { status: SEARCH_STATUS.EXHAUSTED, solutions, statistics: solver.statistics };
}

/**
 * Finds the first solution, or `undefined` when there is none.
 *
 * @throws SearchLimitExceededError when `maxNodes` runs out first
 *
 * @category Solver
 */
export function firstSolution(matrix: Matrix, options?: SolveOptions): Solution | undefined {
  const solver = solve(matrix, options);
  try {
    const result = solver.next();
    return result.done ? undefined : result.value;
  } finally {
    solver.return();
  }
}

/**
 * Counts every solution without keeping them.
 *
 * @throws SearchLimitExceededError when `maxNodes` runs out first
 *
 * @category Solver
 */
export function countSolutions(matrix: Matrix, options?: SolveOptions): number {
  let count = 0;
  for (const _solution of solve(matrix, options)) {
    count++;
  }
  return count;
}

/**
 * Maps the row ids of a solution to row labels. Rows without a label are
 * rendered as their id.
 *
 * @category Solver
 */
export function resolveSolution(
  solution: Solution,
  rowLabels: ReadonlyArray<string | undefined>,
): string[] {
  return solution.map((row: RowId) => rowLabels[row] ?? String(row));
}
