/**
 * Input schemas for results tables, adjacency matrices and options
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import { DEFAULT_SUMMARY_GUARD, TIME_COLUMN } from '@qwalk/shared';
import type { Logger, Table } from '@qwalk/shared';
import { AdjacencyError, SchemaError, formatValidationIssues } from '../errors/index.js';

// ============================================================================
// Table Schemas
// ============================================================================

/** Probabilities, time indices and sentinel labels; NaN marks an empty reduction */
export const CellSchema = z.union([z.number(), z.nan(), z.string()]);

export const TableRowSchema = z.record(CellSchema);

export const TableSchema = z
  .object({
    columns: z.array(z.string()),
    rows: z.array(TableRowSchema),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    table.columns.forEach((column, index) => {
      if (seen.has(column)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['columns', index],
          message: `duplicate column "${column}"`,
        });
      }
      seen.add(column);
    });

    table.rows.forEach((row, rowIndex) => {
      for (const column of table.columns) {
        if (!Object.hasOwn(row, column)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['rows', rowIndex],
            message: `missing column "${column}"`,
          });
        }
      }
      for (const key of Object.keys(row)) {
        if (!seen.has(key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['rows', rowIndex],
            message: `unexpected column "${key}"`,
          });
        }
      }
    });
  });

// ============================================================================
// Adjacency Schema
// ============================================================================

export const AdjacencyMatrixSchema = z
  .array(z.array(z.number().finite()))
  .min(1, 'adjacency matrix needs at least one node')
  .superRefine((matrix, ctx) => {
    matrix.forEach((row, index) => {
      if (row.length !== matrix.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index],
          message: `row has ${row.length} entries, expected ${matrix.length}`,
        });
      }
    });
  });

// ============================================================================
// Options Schema
// ============================================================================

const LoggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === 'object' && value !== null && 'warn' in value && typeof value.warn === 'function',
  { message: 'logger must provide a warn(message) method' }
);

export const ResultsTableOptionsSchema = z.object({
  /** Column holding the time index */
  timeColumn: z.string().min(1).default(TIME_COLUMN),
  /** What to do when summary rows are appended twice */
  summaryGuard: z.enum(['allow', 'warn', 'throw']).default(DEFAULT_SUMMARY_GUARD),
  /** Receives width-mismatch and repeated-summary warnings */
  logger: LoggerSchema.default(console),
});

// ============================================================================
// Type Exports
// ============================================================================

export type ResultsTableOptions = z.input<typeof ResultsTableOptionsSchema>;
export type ResolvedResultsTableOptions = z.output<typeof ResultsTableOptionsSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate a raw table, throwing SchemaError on a malformed shape
 */
export function parseTable(data: unknown): Table {
  const result = TableSchema.safeParse(data);
  if (!result.success) {
    throw new SchemaError(
      `Invalid results table: ${formatValidationIssues(result.error)}`,
      'Column names must be unique and every row must hold exactly the declared columns'
    );
  }
  return result.data;
}

/**
 * Validate an adjacency matrix, throwing AdjacencyError unless it is a
 * non-empty square matrix of finite numbers
 */
export function parseAdjacencyMatrix(data: unknown): number[][] {
  const result = AdjacencyMatrixSchema.safeParse(data);
  if (!result.success) {
    throw new AdjacencyError(
      `Invalid adjacency matrix: ${formatValidationIssues(result.error)}`,
      'Pass an n × n matrix with n ≥ 1'
    );
  }
  return result.data;
}

/**
 * Fill in option defaults
 */
export function resolveOptions(options: unknown = {}): ResolvedResultsTableOptions {
  const result = ResultsTableOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new SchemaError(`Invalid results table options: ${formatValidationIssues(result.error)}`);
  }
  return result.data;
}
