/**
 * Shared type definitions
 */

// ============================================================================
// Table Types
// ============================================================================

/** A single table cell: a probability, a time index, or a sentinel label */
export type Cell = number | string;

/** One row of a results table, keyed by column name */
export type TableRow = Record<string, Cell>;

/**
 * Tabular simulation output.
 * `columns` fixes the column order; every row holds a cell for each column.
 */
export interface Table {
  columns: string[];
  rows: TableRow[];
}

/** Sentinel labels written into the time cell of summary rows */
export type SummaryLabel = 'P-max' | 'P-avg';

// ============================================================================
// Graph Types
// ============================================================================

/** Square matrix; a nonzero entry at [i][j] marks a real directed edge i→j */
export type AdjacencyMatrix = ReadonlyArray<ReadonlyArray<number>>;

/** Directed pair of node indices */
export interface NodePair {
  source: number;
  target: number;
}

// ============================================================================
// Label Types
// ============================================================================

/** A column label that decoded as two fixed-width binary node indices */
export interface ParsedPairLabel extends NodePair {
  kind: 'parsed';
  /** Width of the binary tokens; null when the two tokens differ in width */
  bitWidth: number | null;
}

/** A column label that is not a binary pair and passes through untouched */
export interface UnparsedPairLabel {
  kind: 'unparsed';
  label: string;
}

export type PairLabel = ParsedPairLabel | UnparsedPairLabel;

// ============================================================================
// Processing Types
// ============================================================================

/**
 * Behaviour when summary rows are appended to a table that already has them.
 * - allow: append again (statistics include the earlier sentinel rows)
 * - warn: append again and log a warning
 * - throw: refuse with a SummaryGuardError
 */
export type SummaryGuard = 'allow' | 'warn' | 'throw';

/** Minimal logger surface; `console` satisfies it */
export interface Logger {
  warn(message: string): void;
}

/** Outcome of the most recent real-edge filtering pass */
export interface FilterReport {
  /** Bit width derived from the adjacency matrix size */
  bitWidth: number;
  removedEdgeColumns: string[];
  removedSelfPairColumns: string[];
  keptColumns: string[];
}
