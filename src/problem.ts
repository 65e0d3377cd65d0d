/**
 * Declarative exact-cover instances.
 *
 * A problem lists its columns and rows up front, is validated once, and can
 * then be searched any number of times. Each search works on its own
 * {@link Matrix}, so several searches over the same problem never interfere.
 *
 * @example
 * ```typescript
 * import { defineProblem } from "exact-cover-dlx";
 *
 * const tiling = defineProblem({
 *   columns: [{ label: "a" }, { label: "b" }, { label: "c" }],
 *   rows: [
 *     { label: "ab", columns: ["a", "b"] },
 *     { label: "c", columns: ["c"] },
 *     { label: "bc", columns: ["b", "c"] },
 *     { label: "a", columns: ["a"] },
 *   ],
 * });
 *
 * const { solutions } = tiling.solveAll();
 * solutions.map((s) => tiling.resolve(s)); // [["ab", "c"], ["a", "bc"]]
 * ```
 *
 * @module
 */

import { MatrixUsageError } from "./errors.js";
import { Matrix } from "./dlx/matrix.js";
import { collectSolutions, firstSolution, resolveSolution } from "./dlx/results.js";
import type { SolveResult } from "./dlx/results.js";
import { solve, type Solver } from "./dlx/solver.js";
import { ExactCoverProblemSchema, SolveOptionsSchema } from "./schemas.js";
import type {
  CollectOptions,
  ColumnId,
  ColumnRef,
  ColumnSpec,
  ExactCoverProblemDefinition,
  RowId,
  RowSpec,
  Solution,
  SolveOptions,
} from "./types.js";

/**
 * A validated exact-cover instance.
 *
 * @category Problem
 */
export interface ExactCoverProblem {
  readonly columnCount: number;
  readonly rowCount: number;
  /** Column ids of a row, in the order given. */
  rowColumns(row: RowId): readonly ColumnId[];
  rowLabel(row: RowId): string | undefined;
  /** Builds a fresh matrix for this problem. */
  toMatrix(): Matrix;
  /** Starts a lazy search on a fresh matrix. */
  solve(options?: SolveOptions): Solver;
  /** Collects solutions on a fresh matrix. */
  solveAll(options?: CollectOptions): SolveResult;
  solveFirst(options?: SolveOptions): Solution | undefined;
  /** Row labels of a solution; unlabeled rows appear as their id. */
  resolve(solution: Solution): string[];
}

interface ResolvedRow {
  label: string | undefined;
  columns: ColumnId[];
}

function resolveColumnRef(
  ref: ColumnRef,
  labels: ReadonlyMap<string, ColumnId>,
  rowIndex: number,
): ColumnId {
  if (typeof ref === "number") return ref;
  const id = labels.get(ref);
  if (id === undefined) {
    throw new MatrixUsageError(
      `Row ${rowIndex} refers to unknown column "${ref}"`,
      "UNKNOWN_LABEL",
      { label: ref, row: rowIndex },
    );
  }
  return id;
}

function resolveRow(
  spec: RowSpec,
  labels: ReadonlyMap<string, ColumnId>,
  rowIndex: number,
): ResolvedRow {
  const { label, columns } = Array.isArray(spec) ? { label: undefined, columns: spec } : spec;
  return {
    label,
    columns: columns.map((ref) => resolveColumnRef(ref, labels, rowIndex)),
  };
}

function buildMatrix(columns: readonly ColumnSpec[], rows: readonly ResolvedRow[]): Matrix {
  const matrix = new Matrix();
  for (const column of columns) {
    matrix.addColumn(column);
  }
  for (const row of rows) {
    matrix.addRow(row.columns);
  }
  return matrix;
}

/**
 * Validates a problem definition and returns a reusable problem.
 *
 * The matrix is built once here so that every construction error (unknown
 * column id or label, repeated column, duplicate label) is reported at
 * definition time.
 *
 * @param definition - Columns and rows of the instance
 * @param defaults - Solve options applied to every search unless overridden
 *
 * @throws ZodError when the definition is malformed
 * @throws MatrixUsageError when a row refers to a column that does not exist
 *
 * @category Problem
 */
export function defineProblem(
  definition: ExactCoverProblemDefinition,
  defaults: SolveOptions = {},
): ExactCoverProblem {
  const parsed = ExactCoverProblemSchema.parse(definition);
  const defaultOptions = SolveOptionsSchema.parse(defaults);

  const columns: ColumnSpec[] =
    typeof parsed.columns === "number"
      ? Array.from({ length: parsed.columns }, () => ({}))
      : parsed.columns;

  const labels = new Map<string, ColumnId>();
  columns.forEach((column, id) => {
    if (column.label !== undefined && !labels.has(column.label)) labels.set(column.label, id);
  });

  const rows = parsed.rows.map((spec, index) => resolveRow(spec, labels, index));
  const rowLabels = rows.map((row) => row.label);

  // Surface construction errors now rather than on first solve
  buildMatrix(columns, rows);

  // Options left undefined fall back to the defaults
  const withDefaults = (options: CollectOptions = {}): CollectOptions => ({
    maxNodes: options.maxNodes ?? defaultOptions.maxNodes,
    initialColumns: options.initialColumns ?? defaultOptions.initialColumns,
    logger: options.logger ?? defaultOptions.logger,
    limit: options.limit,
  });

  return {
    columnCount: columns.length,
    rowCount: rows.length,
    rowColumns: (row) => {
      const resolved = rows[row];
      if (resolved === undefined) {
        throw new MatrixUsageError(`Row ${row} does not exist`, "ROW_OUT_OF_RANGE", { row });
      }
      return [...resolved.columns];
    },
    rowLabel: (row) => rowLabels[row],
    toMatrix: () => buildMatrix(columns, rows),
    solve: (options) => solve(buildMatrix(columns, rows), withDefaults(options)),
    solveAll: (options) => collectSolutions(buildMatrix(columns, rows), withDefaults(options)),
    solveFirst: (options) => firstSolution(buildMatrix(columns, rows), withDefaults(options)),
    resolve: (solution) => resolveSolution(solution, rowLabels),
  };
}

/**
 * Options for {@link fromRows}.
 */
export interface FromRowsOptions {
  /** Columns that may be covered at most once instead of exactly once. */
  secondaryColumns?: readonly ColumnId[];
  /** Columns treated as already satisfied in every search. */
  initialColumns?: readonly ColumnId[];
}

/**
 * Builds a problem from bare rows of column ids.
 *
 * The column count is one more than the largest id mentioned in the rows or
 * options (zero when none is), and all columns are primary unless listed in
 * `secondaryColumns`.
 *
 * @example
 * ```typescript
 * // Columns 0 and 2 are already satisfied; only row 2 covers the rest
 * const problem = fromRows(
 *   [[0, 1], [0, 2], [1, 3], [2, 3], [0, 1, 2], [1, 2, 3]],
 *   { initialColumns: [0, 2] },
 * );
 * problem.solveAll().solutions; // [[2]]
 * ```
 *
 * @category Problem
 */
export function fromRows(
  rows: ReadonlyArray<readonly ColumnId[]>,
  options: FromRowsOptions = {},
): ExactCoverProblem {
  const { secondaryColumns = [], initialColumns = [] } = options;

  const mentioned = [...rows.flat(), ...secondaryColumns, ...initialColumns];
  const columnCount = mentioned.reduce((max, id) => Math.max(max, id), -1) + 1;
  const secondary = new Set(secondaryColumns);

  return defineProblem(
    {
      columns: Array.from({ length: columnCount }, (_, id) => ({
        kind: secondary.has(id) ? ("secondary" as const) : ("primary" as const),
      })),
      rows: rows.map((row) => [...row]),
    },
    initialColumns.length > 0 ? { initialColumns: [...initialColumns] } : {},
  );
}
