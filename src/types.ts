/**
 * Core exact-cover types.
 *
 * Types are derived from Zod schemas to ensure validation and types stay in sync.
 *
 * @see schemas.ts for the source Zod schemas
 *
 * @packageDocumentation
 */

import type { z } from "zod";
import type {
  CollectOptionsSchema,
  ColumnKindSchema,
  ColumnRefSchema,
  ColumnSpecSchema,
  ExactCoverProblemSchema,
  RowSpecSchema,
  SearchStatisticsSchema,
  SearchStatusSchema,
  SolveOptionsSchema,
  SolverStateSchema,
} from "./schemas.js";

// ============================================================================
// Identifiers
// ============================================================================

/** Index of a column, assigned in creation order starting at 0. */
export type ColumnId = number;

/** Index of a row, assigned in creation order starting at 0. */
export type RowId = number;

/**
 * One exact cover: the selected rows, in the order the search chose them.
 *
 * @category Solver
 */
export type Solution = readonly RowId[];

// ============================================================================
// Types derived from Zod schemas
// ============================================================================

/**
 * Whether a column must be covered exactly once (`"primary"`) or at most
 * once (`"secondary"`).
 */
export type ColumnKind = z.infer<typeof ColumnKindSchema>;

/**
 * Column declaration in a problem definition.
 *
 * - `label` (optional): name rows can use instead of the column id
 * - `kind` (optional): defaults to `"primary"`
 */
export type ColumnSpec = z.infer<typeof ColumnSpecSchema>;

/** A column id or a column label. */
export type ColumnRef = z.infer<typeof ColumnRefSchema>;

/**
 * Row declaration in a problem definition: either a plain list of column
 * references or `{ label, columns }`.
 */
export type RowSpec = z.infer<typeof RowSpecSchema>;

/**
 * A complete exact-cover instance.
 *
 * - `columns` (required): a column count, or one {@link ColumnSpec} per column
 * - `rows` (required): one {@link RowSpec} per candidate row
 */
export type ExactCoverProblemDefinition = z.infer<typeof ExactCoverProblemSchema>;

/**
 * Options accepted by `solve`.
 *
 * - `maxNodes` (optional): search-tree node budget, unlimited by default
 * - `initialColumns` (optional): columns covered before the search starts
 * - `logger` (optional): receives search diagnostics
 */
export type SolveOptions = z.infer<typeof SolveOptionsSchema>;

/** {@link SolveOptions} plus `limit`, the maximum number of solutions to collect. */
export type CollectOptions = z.infer<typeof CollectOptionsSchema>;

/**
 * Lifecycle state of a solver.
 *
 * @category Solver
 */
export type SolverState = z.infer<typeof SolverStateSchema>;

/**
 * Why a collected search stopped.
 *
 * One of `"EXHAUSTED"`, `"SOLUTION_LIMIT"` or `"SEARCH_LIMIT_EXCEEDED"`.
 *
 * @category Solver
 */
export type SearchStatus = z.infer<typeof SearchStatusSchema>;

/**
 * Counters maintained while searching.
 *
 * - `nodes`: search-tree nodes entered
 * - `updates`: row nodes unlinked by cover operations
 * - `solutions`: solutions emitted
 * - `maxDepth`: deepest partial selection reached
 */
export type SearchStatistics = z.infer<typeof SearchStatisticsSchema>;

// --------------------------------------------------------------------------
// Status constants (for convenience)
// --------------------------------------------------------------------------

/** Convenience constants for {@link SearchStatus} values. */
export const SEARCH_STATUS = {
  EXHAUSTED: "EXHAUSTED",
  SOLUTION_LIMIT: "SOLUTION_LIMIT",
  SEARCH_LIMIT_EXCEEDED: "SEARCH_LIMIT_EXCEEDED",
} as const satisfies Record<SearchStatus, SearchStatus>;
