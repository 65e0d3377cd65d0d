/**
 * Structural checks and a brute-force oracle for exercising the solver.
 *
 * @example
 * ```typescript
 * import { checkMatrixInvariants } from "exact-cover-dlx/testing";
 *
 * matrix.cover(0);
 * expect(checkMatrixInvariants(matrix)).toEqual([]);
 * ```
 */

import type { Matrix } from "../dlx/matrix.js";
import type { ColumnId, ColumnKind, RowId, Solution } from "../types.js";

function sameIds(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

/**
 * Compares what the links say against what the covered columns imply.
 *
 * - the active ring holds exactly the uncovered primary columns, in creation order
 * - every column's size equals the number of rows linked under it
 * - an uncovered column links exactly the rows that touch it and no covered
 *   column, in creation order
 *
 * Returns one message per broken property; an empty array means consistent.
 */
export function checkMatrixInvariants(matrix: Matrix): string[] {
  const issues: string[] = [];
  const covered = new Set(matrix.coveredColumns());
  const columnIds = Array.from({ length: matrix.columnCount }, (_, id) => id);
  const rowIds = Array.from({ length: matrix.rowCount }, (_, id) => id);

  const expectedActive = columnIds.filter(
    (column) => matrix.columnKind(column) === "primary" && !covered.has(column),
  );
  const active = matrix.activeColumns();
  if (!sameIds(active, expectedActive)) {
    issues.push(`active columns [${active.join(",")}], expected [${expectedActive.join(",")}]`);
  }

  const liveRows = rowIds.filter((row) =>
    matrix.rowColumns(row).every((column) => !covered.has(column)),
  );

  for (const column of columnIds) {
    const linked = matrix.activeRows(column);
    const size = matrix.columnSize(column);
    if (linked.length !== size) {
      issues.push(`column ${column} has size ${size} but ${linked.length} linked rows`);
    }
    if (covered.has(column)) continue;

    const expected = liveRows.filter((row) => matrix.rowColumns(row).includes(column));
    if (!sameIds(linked, expected)) {
      issues.push(`column ${column} links rows [${linked.join(",")}], expected [${expected.join(",")}]`);
    }
  }

  return issues;
}

/**
 * Enumerates every exact cover by trying all row subsets. Exponential; meant
 * for instances with a handful of rows.
 *
 * Rows that touch no primary column are never selected, as in Algorithm X.
 * Each solution lists its rows in ascending order.
 */
export function bruteForceSolutions(
  columns: readonly ColumnKind[],
  rows: ReadonlyArray<readonly ColumnId[]>,
): RowId[][] {
  const counts = columns.map(() => 0);
  const selection: RowId[] = [];
  const solutions: RowId[][] = [];

  const visit = (row: RowId): void => {
    if (row === rows.length) {
      const complete = columns.every((kind, column) => kind === "secondary" || counts[column] === 1);
      if (complete) solutions.push([...selection]);
      return;
    }

    visit(row + 1);

    const candidate = rows[row] ?? [];
    if (!candidate.some((column) => columns[column] === "primary")) return;
    if (candidate.some((column) => (counts[column] ?? 0) > 0)) return;
    for (const column of candidate) counts[column] = 1;
    selection.push(row);
    visit(row + 1);
    selection.pop();
    for (const column of candidate) counts[column] = 0;
  };

  visit(0);
  return normalizeSolutions(solutions);
}

/**
 * Sorts the rows within each solution and then the solutions themselves,
 * so that solution sets can be compared regardless of search order.
 */
export function normalizeSolutions(solutions: readonly Solution[]): RowId[][] {
  const compare = (a: readonly RowId[], b: readonly RowId[]): number => {
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
      const diff = (a[i] ?? 0) - (b[i] ?? 0);
      if (diff !== 0) return diff;
    }
    return a.length - b.length;
  };

  return solutions.map((solution) => [...solution].sort((a, b) => a - b)).sort(compare);
}
