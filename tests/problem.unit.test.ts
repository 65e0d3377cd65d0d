import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { MatrixUsageError } from "../src/errors.js";
import { defineProblem, fromRows } from "../src/problem.js";
import { normalizeSolutions } from "../src/testing/index.js";

const tiling = () =>
  defineProblem({
    columns: [{ label: "a" }, { label: "b" }, { label: "c" }],
    rows: [
      { label: "ab", columns: ["a", "b"] },
      { label: "c", columns: ["c"] },
      { label: "bc", columns: ["b", "c"] },
      { label: "a", columns: ["a"] },
    ],
  });

describe("defineProblem", () => {
  it("resolves column labels and solves", () => {
    const problem = tiling();

    const { status, solutions } = problem.solveAll();

    expect(status).toBe("EXHAUSTED");
    expect(solutions).toEqual([
      [0, 1],
      [3, 2],
    ]);
    expect(solutions.map((s) => problem.resolve(s))).toEqual([
      ["ab", "c"],
      ["a", "bc"],
    ]);
  });

  it("describes its rows and columns", () => {
    const problem = tiling();

    expect(problem.columnCount).toBe(3);
    expect(problem.rowCount).toBe(4);
    expect(problem.rowColumns(2)).toEqual([1, 2]);
    expect(problem.rowLabel(3)).toBe("a");
  });

  it("accepts a column count and plain rows", () => {
    const problem = defineProblem({ columns: 2, rows: [[0], [1], [0, 1]] });

    expect(problem.solveAll().solutions).toEqual([[0, 1], [2]]);
    expect(problem.resolve([2])).toEqual(["2"]);
  });

  it("mixes ids and labels within a row", () => {
    const problem = defineProblem({
      columns: [{ label: "x" }, {}, { label: "z", kind: "secondary" }],
      rows: [["x", 1, "z"], ["x"], [1]],
    });

    expect(problem.rowColumns(0)).toEqual([0, 1, 2]);
    expect(problem.solveAll().solutions).toEqual([[0], [1, 2]]);
  });

  it("reports unknown labels at definition time", () => {
    let thrown: unknown;
    try {
      defineProblem({ columns: [{ label: "a" }], rows: [["a"], ["b"]] });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(MatrixUsageError);
    expect(thrown).toMatchObject({ code: "UNKNOWN_LABEL", data: { label: "b", row: 1 } });
  });

  it("reports out-of-range columns at definition time", () => {
    expect(() => defineProblem({ columns: 2, rows: [[0, 2]] })).toThrow(
      "Column 2 is out of range (matrix has 2 columns)",
    );
  });

  it("rejects malformed definitions", () => {
    expect(() => defineProblem({ columns: -1, rows: [] })).toThrow(ZodError);
    expect(() => defineProblem({ columns: 1, rows: [[0.5]] })).toThrow(ZodError);
  });

  it("gives every search its own matrix", () => {
    const problem = tiling();
    const first = problem.solve();
    const second = problem.solve();

    expect(first.next().value).toEqual([0, 1]);
    expect(second.next().value).toEqual([0, 1]);
    expect(first.next().value).toEqual([3, 2]);
    expect(problem.toMatrix().isLeased).toBe(false);
  });

  it("finds the first solution", () => {
    expect(tiling().solveFirst()).toEqual([0, 1]);
    expect(defineProblem({ columns: 1, rows: [] }).solveFirst()).toBeUndefined();
  });

  it("applies default options unless overridden", () => {
    const problem = defineProblem({ columns: 1, rows: [[0], [0]] }, { maxNodes: 2 });

    expect(problem.solveAll().status).toBe("SEARCH_LIMIT_EXCEEDED");
    expect(problem.solveAll({ maxNodes: 10 }).status).toBe("EXHAUSTED");
    expect(problem.solveAll({ limit: 1 }).status).toBe("SOLUTION_LIMIT");
  });

  it("keeps a default when a search passes the option as undefined", () => {
    const problem = defineProblem({ columns: 1, rows: [[0], [0]] }, { maxNodes: 2 });

    expect(problem.solveAll({ maxNodes: undefined }).status).toBe("SEARCH_LIMIT_EXCEEDED");
  });
});

describe("fromRows", () => {
  const rows = [
    [0, 1],
    [0, 2],
    [1, 3],
    [2, 3],
    [0, 1, 2],
    [1, 2, 3],
  ];

  it("infers the column count from the rows", () => {
    expect(fromRows(rows).columnCount).toBe(4);
    expect(fromRows([]).columnCount).toBe(0);
  });

  it("solves with initial columns already satisfied", () => {
    const problem = fromRows(rows, { initialColumns: [0, 2] });

    expect(problem.solveAll().solutions).toEqual([[2]]);
  });

  it("lets a search override the initial columns", () => {
    const problem = fromRows(rows, { initialColumns: [0, 2] });

    expect(normalizeSolutions(problem.solveAll({ initialColumns: [] }).solutions)).toEqual([
      [0, 3],
      [1, 2],
    ]);
  });

  it("keeps the initial columns when a search passes them as undefined", () => {
    const problem = fromRows(rows, { initialColumns: [0, 2] });

    expect(problem.solveAll({ initialColumns: undefined }).solutions).toEqual([[2]]);
    expect(problem.solveFirst({ initialColumns: undefined })).toEqual([2]);
  });

  it("marks listed columns as secondary", () => {
    const problem = fromRows([[0, 1], [0], [2]], { secondaryColumns: [1, 3] });

    expect(problem.columnCount).toBe(4);
    expect(problem.toMatrix().columnKind(3)).toBe("secondary");
    expect(normalizeSolutions(problem.solveAll().solutions)).toEqual([
      [0, 2],
      [1, 2],
    ]);
  });

  it("yields the empty selection for no rows", () => {
    expect(fromRows([]).solveAll().solutions).toEqual([[]]);
  });
});
