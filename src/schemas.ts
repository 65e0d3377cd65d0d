/**
 * Zod schemas for problem definitions, solve options and search results.
 *
 * TypeScript types are derived from these schemas using z.infer so that
 * validation and types stay in sync.
 *
 * @see types.ts for the derived TypeScript types
 */

import { z } from "zod";
import type { Logger } from "./logger.js";

// --------------------------------------------------------------------------
// Columns and rows
// --------------------------------------------------------------------------

export const ColumnKindSchema = z.enum(["primary", "secondary"]);

export const ColumnIdSchema = z.number().int().nonnegative();

export const ColumnSpecSchema = z.object({
  label: z.string().min(1).optional(),
  kind: ColumnKindSchema.optional(),
});

/** A row refers to a column either by id or by label. */
export const ColumnRefSchema = z.union([ColumnIdSchema, z.string().min(1)]);

export const RowSpecSchema = z.union([
  z.array(ColumnRefSchema),
  z.object({
    label: z.string().optional(),
    columns: z.array(ColumnRefSchema),
  }),
]);

export const ExactCoverProblemSchema = z.object({
  columns: z.union([z.number().int().nonnegative(), z.array(ColumnSpecSchema)]),
  rows: z.array(RowSpecSchema),
});

// --------------------------------------------------------------------------
// Options
// --------------------------------------------------------------------------

const LoggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    ["debug", "info", "warn", "error"].every(
      (method) => typeof Reflect.get(value, method) === "function",
    ),
  { message: "Expected a logger with debug, info, warn and error methods" },
);

export const SolveOptionsSchema = z.object({
  /** Search-tree nodes the solver may visit before giving up. */
  maxNodes: z.number().int().positive().optional(),
  /** Columns treated as already satisfied before the search starts. */
  initialColumns: z.array(ColumnIdSchema).optional(),
  logger: LoggerSchema.optional(),
});

export const CollectOptionsSchema = SolveOptionsSchema.extend({
  /** Stop after this many solutions. */
  limit: z.number().int().positive().optional(),
});

// --------------------------------------------------------------------------
// Search state and results
// --------------------------------------------------------------------------

export const SolverStateSchema = z.enum([
  "PENDING",
  "RUNNING",
  "EXHAUSTED",
  "CLOSED",
  "SEARCH_LIMIT_EXCEEDED",
]);

export const SearchStatusSchema = z.enum(["EXHAUSTED", "SOLUTION_LIMIT", "SEARCH_LIMIT_EXCEEDED"]);

export const SearchStatisticsSchema = z.object({
  nodes: z.number().int().nonnegative(),
  updates: z.number().int().nonnegative(),
  solutions: z.number().int().nonnegative(),
  maxDepth: z.number().int().nonnegative(),
});
