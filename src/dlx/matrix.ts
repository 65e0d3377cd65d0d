import { invariant, MatrixUsageError } from "../errors.js";
import type { ColumnId, ColumnKind, RowId } from "../types.js";

/**
 * Sparse incidence matrix for exact cover, stored as "dancing links".
 *
 * Every row × column intersection is a node in a flat arena. Nodes are
 * addressed by integer index and carry `left/right/up/down` links to their
 * neighbours, so cover and uncover are plain index updates that can be
 * reversed exactly.
 *
 * Arena layout:
 * - node 0 is the root; its horizontal ring holds the active primary columns
 * - each column has a header node; its vertical ring holds the rows below it
 * - secondary column headers are linked only to themselves horizontally
 */

const ROOT = 0;
const NO_ROW = -1;

/**
 * Options for {@link Matrix.addColumn}.
 */
export interface ColumnOptions {
  /** Defaults to `"primary"`. */
  kind?: ColumnKind;
  /** Unique name for lookups through {@link Matrix.columnId}. */
  label?: string;
}

/**
 * Copy of a matrix's link state, for comparing two points in time.
 */
export interface MatrixSnapshot {
  readonly left: readonly number[];
  readonly right: readonly number[];
  readonly up: readonly number[];
  readonly down: readonly number[];
  readonly sizes: readonly number[];
  readonly coveredColumns: readonly ColumnId[];
}

/**
 * Exclusive access to a matrix for the duration of a search.
 *
 * Operations on a lease skip the argument checks done by the public
 * {@link Matrix} methods. Nodes are arena indices.
 */
export interface MatrixLease {
  /** Header node of a column. */
  header(column: ColumnId): number;
  down(node: number): number;
  right(node: number): number;
  left(node: number): number;
  columnOf(node: number): ColumnId;
  rowOf(node: number): RowId;
  columnSize(column: ColumnId): number;
  /** Covers a column and returns the number of row nodes unlinked. */
  cover(column: ColumnId): number;
  uncover(column: ColumnId): void;
  /**
   * The active primary column with the fewest rows, first in ring order on
   * ties; `undefined` when no primary column is active.
   */
  selectColumn(): ColumnId | undefined;
  /** Gives the matrix back. Every column covered through the lease must be uncovered first. */
  release(): void;
}

/**
 * The exact-cover matrix.
 *
 * @example
 * ```typescript
 * const matrix = new Matrix();
 * const [a, b] = matrix.addColumns(2);
 * matrix.addRow([a, b]);
 * matrix.addRow([a]);
 * matrix.addRow([b]);
 * ```
 *
 * @category Matrix
 */
export class Matrix {
  #left: number[] = [ROOT];
  #right: number[] = [ROOT];
  #up: number[] = [ROOT];
  #down: number[] = [ROOT];
  /** Column id of each node; -1 for the root. */
  #column: number[] = [-1];
  /** Row id of each node; -1 for the root and column headers. */
  #row: number[] = [NO_ROW];

  #headers: number[] = [];
  #sizes: number[] = [];
  #kinds: ColumnKind[] = [];
  #labels: (string | undefined)[] = [];
  #labelIndex = new Map<string, ColumnId>();
  #rows: ColumnId[][] = [];
  #rowNodeCount = 0;

  #coverStack: ColumnId[] = [];
  #covered: boolean[] = [];
  #leased = false;

  get columnCount(): number {
    return this.#headers.length;
  }

  get rowCount(): number {
    return this.#rows.length;
  }

  /** Number of row × column intersections. */
  get nodeCount(): number {
    return this.#rowNodeCount;
  }

  /** Whether a search currently holds this matrix. */
  get isLeased(): boolean {
    return this.#leased;
  }

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  /**
   * Appends a column. Primary columns join the end of the active ring.
   *
   * @throws MatrixUsageError while leased, while columns are covered, or on a duplicate label
   */
  addColumn(options: ColumnOptions = {}): ColumnId {
    this.#assertMutable();

    const { kind = "primary", label } = options;
    if (label !== undefined && this.#labelIndex.has(label)) {
      throw new MatrixUsageError(`Column label "${label}" is already in use`, "DUPLICATE_LABEL", {
        label,
      });
    }

    const id = this.#headers.length;
    const header = this.#newNode(id, NO_ROW);

    if (kind === "primary") {
      const last = this.#left[ROOT] ?? ROOT;
      this.#left[header] = last;
      this.#right[header] = ROOT;
      this.#right[last] = header;
      this.#left[ROOT] = header;
    }

    this.#headers.push(header);
    this.#sizes.push(0);
    this.#kinds.push(kind);
    this.#labels.push(label);
    this.#covered.push(false);
    if (label !== undefined) this.#labelIndex.set(label, id);

    return id;
  }

  /** Appends `count` unlabeled columns of the same kind. */
  addColumns(count: number, options: Omit<ColumnOptions, "label"> = {}): ColumnId[] {
    return Array.from({ length: count }, () => this.addColumn(options));
  }

  /**
   * Appends a row covering the given columns. The row is linked at the
   * bottom of each column, and its nodes keep the order given.
   *
   * Nothing is modified when the call throws.
   *
   * @throws MatrixUsageError for an unknown or repeated column, while leased, or while columns are covered
   */
  addRow(columns: readonly ColumnId[]): RowId {
    this.#assertMutable();

    const seen = new Set<ColumnId>();
    for (const column of columns) {
      this.#assertColumn(column);
      if (seen.has(column)) {
        throw new MatrixUsageError(
          `Column ${column} appears more than once in row ${this.#rows.length}`,
          "DUPLICATE_COLUMN",
          { column, row: this.#rows.length },
        );
      }
      seen.add(column);
    }

    const rowId = this.#rows.length;
    let first = NO_ROW;
    let prev = NO_ROW;

    for (const column of columns) {
      const node = this.#newNode(column, rowId);
      const header = this.#header(column);

      // Bottom of the column's vertical ring
      const above = this.#up[header] ?? header;
      this.#up[node] = above;
      this.#down[node] = header;
      this.#down[above] = node;
      this.#up[header] = node;
      this.#adjustSize(column, 1);

      if (first === NO_ROW) {
        first = node;
      } else {
        this.#left[node] = prev;
        this.#right[node] = first;
        this.#right[prev] = node;
        this.#left[first] = node;
      }
      prev = node;
    }

    this.#rows.push([...columns]);
    this.#rowNodeCount += columns.length;
    return rowId;
  }

  // --------------------------------------------------------------------------
  // Cover / uncover
  // --------------------------------------------------------------------------

  /**
   * Removes a column from the active ring and every row intersecting it
   * from all other columns.
   *
   * @throws MatrixUsageError while leased, for an unknown column, or if it is already covered
   */
  cover(column: ColumnId): void {
    this.#assertNotLeased();
    this.#assertColumn(column);
    if (this.#covered[column]) {
      throw new MatrixUsageError(`Column ${column} is already covered`, "ALREADY_COVERED", {
        column,
      });
    }
    this.#cover(column);
  }

  /**
   * Restores the most recently covered column.
   *
   * @throws MatrixUsageError while leased, for an unknown or uncovered column, or out of order
   */
  uncover(column: ColumnId): void {
    this.#assertNotLeased();
    this.#assertColumn(column);
    if (!this.#covered[column]) {
      throw new MatrixUsageError(`Column ${column} is not covered`, "NOT_COVERED", { column });
    }
    const top = this.#coverStack.at(-1);
    if (top !== column) {
      throw new MatrixUsageError(
        `Column ${column} cannot be uncovered before column ${top}`,
        "UNCOVER_ORDER",
        { column, expected: top },
      );
    }
    this.#uncover(column);
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  /** Active primary columns, left to right from the root. */
  activeColumns(): ColumnId[] {
    const result: ColumnId[] = [];
    for (let h = this.#link(this.#right, ROOT); h !== ROOT; h = this.#link(this.#right, h)) {
      result.push(this.#columnOf(h));
    }
    return result;
  }

  /** Rows currently linked under a column, top to bottom. */
  activeRows(column: ColumnId): RowId[] {
    this.#assertColumn(column);
    const header = this.#header(column);
    const result: RowId[] = [];
    for (let n = this.#link(this.#down, header); n !== header; n = this.#link(this.#down, n)) {
      result.push(this.#rowOf(n));
    }
    return result;
  }

  columnSize(column: ColumnId): number {
    this.#assertColumn(column);
    return this.#sizes[column] ?? 0;
  }

  columnKind(column: ColumnId): ColumnKind {
    this.#assertColumn(column);
    return this.#kinds[column] ?? "primary";
  }

  columnLabel(column: ColumnId): string | undefined {
    this.#assertColumn(column);
    return this.#labels[column];
  }

  /** Looks up a column by label. */
  columnId(label: string): ColumnId | undefined {
    return this.#labelIndex.get(label);
  }

  rowColumns(row: RowId): readonly ColumnId[] {
    const columns = this.#rows[row];
    if (!Number.isInteger(row) || columns === undefined) {
      throw new MatrixUsageError(`Row ${row} does not exist`, "ROW_OUT_OF_RANGE", { row });
    }
    return [...columns];
  }

  isCovered(column: ColumnId): boolean {
    this.#assertColumn(column);
    return this.#covered[column] ?? false;
  }

  /** Covered columns, in the order they were covered. */
  coveredColumns(): ColumnId[] {
    return [...this.#coverStack];
  }

  snapshot(): MatrixSnapshot {
    return {
      left: [...this.#left],
      right: [...this.#right],
      up: [...this.#up],
      down: [...this.#down],
      sizes: [...this.#sizes],
      coveredColumns: [...this.#coverStack],
    };
  }

  // --------------------------------------------------------------------------
  // Leasing
  // --------------------------------------------------------------------------

  /**
   * Takes exclusive control of the matrix. Until the lease is released,
   * public cover, uncover and construction calls are rejected.
   *
   * @throws MatrixUsageError if already leased or if columns are covered
   */
  acquire(): MatrixLease {
    this.#assertNotLeased();
    if (this.#coverStack.length > 0) {
      throw new MatrixUsageError(
        `Cannot search while columns ${this.#coverStack.join(", ")} are covered`,
        "COLUMNS_COVERED",
        { columns: [...this.#coverStack] },
      );
    }
    this.#leased = true;

    let released = false;
    const assertHeld = () => invariant(!released, "Matrix lease used after release");

    return {
      header: (column) => this.#header(column),
      down: (node) => this.#link(this.#down, node),
      right: (node) => this.#link(this.#right, node),
      left: (node) => this.#link(this.#left, node),
      columnOf: (node) => this.#columnOf(node),
      rowOf: (node) => this.#rowOf(node),
      columnSize: (column) => this.#sizes[column] ?? 0,
      cover: (column) => {
        assertHeld();
        return this.#cover(column);
      },
      uncover: (column) => {
        assertHeld();
        invariant(this.#coverStack.at(-1) === column, `Uncover of ${column} out of order`);
        this.#uncover(column);
      },
      selectColumn: () => this.#selectColumn(),
      release: () => {
        assertHeld();
        invariant(
          this.#coverStack.length === 0,
          `Lease released with columns ${this.#coverStack.join(", ")} still covered`,
        );
        released = true;
        this.#leased = false;
      },
    } satisfies MatrixLease;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  #cover(column: ColumnId): number {
    const header = this.#header(column);
    const left = this.#link(this.#left, header);
    const right = this.#link(this.#right, header);
    this.#right[left] = right;
    this.#left[right] = left;

    let updates = 0;
    for (let i = this.#link(this.#down, header); i !== header; i = this.#link(this.#down, i)) {
      for (let j = this.#link(this.#right, i); j !== i; j = this.#link(this.#right, j)) {
        const up = this.#link(this.#up, j);
        const down = this.#link(this.#down, j);
        this.#down[up] = down;
        this.#up[down] = up;
        this.#adjustSize(this.#columnOf(j), -1);
        updates++;
      }
    }

    this.#covered[column] = true;
    this.#coverStack.push(column);
    return updates;
  }

  #uncover(column: ColumnId): void {
    const header = this.#header(column);
    for (let i = this.#link(this.#up, header); i !== header; i = this.#link(this.#up, i)) {
      for (let j = this.#link(this.#left, i); j !== i; j = this.#link(this.#left, j)) {
        this.#adjustSize(this.#columnOf(j), 1);
        this.#down[this.#link(this.#up, j)] = j;
        this.#up[this.#link(this.#down, j)] = j;
      }
    }

    this.#right[this.#link(this.#left, header)] = header;
    this.#left[this.#link(this.#right, header)] = header;

    this.#covered[column] = false;
    this.#coverStack.pop();
  }

  #selectColumn(): ColumnId | undefined {
    let best: ColumnId | undefined;
    let bestSize = Number.POSITIVE_INFINITY;
    for (let h = this.#link(this.#right, ROOT); h !== ROOT; h = this.#link(this.#right, h)) {
      const column = this.#columnOf(h);
      const size = this.#sizes[column] ?? 0;
      if (size < bestSize) {
        best = column;
        bestSize = size;
        if (size === 0) break;
      }
    }
    return best;
  }

  #newNode(column: ColumnId, row: RowId): number {
    const node = this.#column.length;
    this.#left.push(node);
    this.#right.push(node);
    this.#up.push(node);
    this.#down.push(node);
    this.#column.push(column);
    this.#row.push(row);
    return node;
  }

  #link(links: number[], node: number): number {
    const next = links[node];
    invariant(next !== undefined, `Node ${node} is outside the arena`);
    return next;
  }

  #header(column: ColumnId): number {
    const header = this.#headers[column];
    invariant(header !== undefined, `Column ${column} has no header`);
    return header;
  }

  #columnOf(node: number): ColumnId {
    return this.#link(this.#column, node);
  }

  #rowOf(node: number): RowId {
    return this.#link(this.#row, node);
  }

  #adjustSize(column: ColumnId, delta: number): void {
    const size = (this.#sizes[column] ?? 0) + delta;
    invariant(size >= 0, `Column ${column} size dropped below zero`);
    this.#sizes[column] = size;
  }

  #assertColumn(column: ColumnId): void {
    if (!Number.isInteger(column) || column < 0 || column >= this.#headers.length) {
      throw new MatrixUsageError(
        `Column ${column} is out of range (matrix has ${this.#headers.length} columns)`,
        "COLUMN_OUT_OF_RANGE",
        { column, columnCount: this.#headers.length },
      );
    }
  }

  #assertNotLeased(): void {
    if (this.#leased) {
      throw new MatrixUsageError("Matrix is in use by a running search", "MATRIX_LEASED");
    }
  }

  #assertMutable(): void {
    this.#assertNotLeased();
    if (this.#coverStack.length > 0) {
      throw new MatrixUsageError(
        `Cannot modify the matrix while columns ${this.#coverStack.join(", ")} are covered`,
        "COLUMNS_COVERED",
        { columns: [...this.#coverStack] },
      );
    }
  }
}
