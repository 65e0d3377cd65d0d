import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { Matrix } from "../../src/dlx/matrix.js";
import {
  collectSolutions,
  countSolutions,
  firstSolution,
  resolveSolution,
} from "../../src/dlx/results.js";
import { SearchLimitExceededError } from "../../src/errors.js";
import { SEARCH_STATUS, type ColumnId } from "../../src/types.js";

function matrixOf(columnCount: number, rows: ColumnId[][]): Matrix {
  const matrix = new Matrix();
  matrix.addColumns(columnCount);
  for (const row of rows) matrix.addRow(row);
  return matrix;
}

const square = (): Matrix =>
  matrixOf(4, [
    [0, 1],
    [2, 3],
    [0, 2],
    [1, 3],
  ]);

describe("collectSolutions", () => {
  it("collects every solution of an exhausted search", () => {
    const result = collectSolutions(square());

    expect(result).toEqual({
      status: "EXHAUSTED",
      solutions: [
        [0, 1],
        [2, 3],
      ],
      statistics: { nodes: 5, updates: 6, solutions: 2, maxDepth: 2 },
    });
  });

  it("reports an empty exhausted search", () => {
    const result = collectSolutions(matrixOf(1, []));

    expect(result.status).toBe(SEARCH_STATUS.EXHAUSTED);
    expect(result.solutions).toEqual([]);
  });

  it("stops at the solution limit and restores the matrix", () => {
    const matrix = square();
    const before = matrix.snapshot();

    const result = collectSolutions(matrix, { limit: 1 });

    expect(result.status).toBe(SEARCH_STATUS.SOLUTION_LIMIT);
    expect(result.solutions).toEqual([[0, 1]]);
    expect(matrix.isLeased).toBe(false);
    expect(matrix.snapshot()).toEqual(before);
  });

  it("reports an exceeded node budget as a status", () => {
    const matrix = matrixOf(1, [[0], [0]]);

    const result = collectSolutions(matrix, { maxNodes: 2 });

    expect(result.status).toBe(SEARCH_STATUS.SEARCH_LIMIT_EXCEEDED);
    expect(result.solutions).toEqual([[0]]);
    expect(result.statistics.nodes).toBe(3);
    expect(matrix.isLeased).toBe(false);
  });

  it("passes initial columns through to the search", () => {
    const matrix = matrixOf(3, [[0, 1], [2], [1, 2]]);

    expect(collectSolutions(matrix, { initialColumns: [0] }).solutions).toEqual([[2]]);
  });

  it("rejects a zero limit", () => {
    expect(() => collectSolutions(square(), { limit: 0 })).toThrow(ZodError);
  });
});

describe("firstSolution", () => {
  it("returns the first solution and releases the matrix", () => {
    const matrix = square();
    const before = matrix.snapshot();

    expect(firstSolution(matrix)).toEqual([0, 1]);
    expect(matrix.isLeased).toBe(false);
    expect(matrix.snapshot()).toEqual(before);
  });

  it("returns undefined when there is no solution", () => {
    expect(firstSolution(matrixOf(2, [[0]]))).toBeUndefined();
  });

  it("throws when the budget runs out first", () => {
    expect(() => firstSolution(matrixOf(1, [[0], [0]]), { maxNodes: 1 })).toThrow(
      SearchLimitExceededError,
    );
  });
});

describe("countSolutions", () => {
  it("counts without collecting", () => {
    expect(countSolutions(square())).toBe(2);
    expect(countSolutions(new Matrix())).toBe(1);
    expect(countSolutions(matrixOf(2, [[0]]))).toBe(0);
  });
});

describe("resolveSolution", () => {
  it("maps row ids to labels and falls back to the id", () => {
    expect(resolveSolution([2, 0, 1], ["first", undefined, "third"])).toEqual([
      "third",
      "first",
      "1",
    ]);
  });
});
