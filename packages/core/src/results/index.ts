/**
 * ResultsTable - post-processing for quantum-walk simulation output
 *
 * Wraps one raw results table (a `Time` column plus one probability column
 * per node or node pair) and reduces it to a summary: real-edge columns
 * dropped, P-max/P-avg rows appended, binary pair labels rewritten as "i-j".
 *
 * @example
 * ```ts
 * const summary = new ResultsTable(raw).postprocessSuperposition(adjacency).toTable();
 * ```
 */

import { P_AVG_LABEL, P_MAX_LABEL, isSummaryLabel, maxOf, meanOf } from '@qwalk/shared';
import type { AdjacencyMatrix, Cell, FilterReport, Table, TableRow } from '@qwalk/shared';
import { SchemaError, SummaryGuardError } from '../errors/index.js';
import {
  bitWidthForNodeCount,
  detectBitWidths,
  edgeLabels,
  selfPairLabels,
  toDecimalLabel,
} from '../labels/index.js';
import { parseAdjacencyMatrix, parseTable, resolveOptions } from '../schema/index.js';
import type { ResolvedResultsTableOptions, ResultsTableOptions } from '../schema/index.js';

function cloneRows(rows: readonly TableRow[]): TableRow[] {
  return rows.map((row) => ({ ...row }));
}

function pickColumns(row: TableRow, columns: readonly string[]): TableRow {
  const picked: TableRow = {};
  for (const column of columns) picked[column] = row[column];
  return picked;
}

export class ResultsTable {
  private table: Table;
  private readonly options: ResolvedResultsTableOptions;
  private filterReport: FilterReport | null = null;

  constructor(table: Table, options: ResultsTableOptions = {}) {
    this.options = resolveOptions(options);
    const parsed = parseTable(table);
    this.table = { columns: [...parsed.columns], rows: cloneRows(parsed.rows) };
  }

  /**
   * Build from row records. Column order follows the first record's keys, and
   * every other record must carry exactly those keys.
   */
  static fromRecords(records: readonly TableRow[], options: ResultsTableOptions = {}): ResultsTable {
    const columns = records.length > 0 ? Object.keys(records[0]) : [];
    return new ResultsTable({ columns, rows: [...records] }, options);
  }

  // ==========================================================================
  // Transformations
  // ==========================================================================

  /**
   * Drop every column that names a real edge (nonzero adjacency entry) or a
   * self-pair. Labels use ceil(log2(n)) bits per index; a label that does not
   * match either set, including one that is not a binary pair at all, is kept.
   */
  filterRealEdges(adjacency: AdjacencyMatrix): this {
    const matrix = parseAdjacencyMatrix(adjacency);
    const nodeCount = matrix.length;
    const bitWidth = bitWidthForNodeCount(nodeCount);
    const realEdges = edgeLabels(matrix, bitWidth);
    const selfPairs = selfPairLabels(nodeCount, bitWidth);

    const keptColumns: string[] = [];
    const removedEdgeColumns: string[] = [];
    const removedSelfPairColumns: string[] = [];

    for (const column of this.table.columns) {
      if (column === this.options.timeColumn) {
        keptColumns.push(column);
      } else if (realEdges.has(column)) {
        removedEdgeColumns.push(column);
      } else if (selfPairs.has(column)) {
        removedSelfPairColumns.push(column);
      } else {
        keptColumns.push(column);
      }
    }

    const widths = detectBitWidths(this.dataColumns);
    if (widths.length > 0 && !widths.includes(bitWidth)) {
      this.options.logger.warn(
        `filterRealEdges: a ${nodeCount}-node graph uses ${bitWidth}-bit labels but the table's ` +
          `pair columns use ${widths.join(', ')}-bit labels; no edge columns were matched`
      );
    }

    this.table = {
      columns: keptColumns,
      rows: this.table.rows.map((row) => pickColumns(row, keptColumns)),
    };
    this.filterReport = { bitWidth, removedEdgeColumns, removedSelfPairColumns, keptColumns: [...keptColumns] };
    return this;
  }

  /**
   * Append a P-max row and a P-avg row holding the per-column maximum and
   * mean over every current row. Both are computed before either is added.
   */
  appendSummaryRows(): this {
    const { timeColumn } = this.options;
    if (!this.table.columns.includes(timeColumn)) {
      throw new SchemaError(
        `Cannot append summary rows: column "${timeColumn}" is missing`,
        'Summary rows store their label in the time column'
      );
    }
    if (this.hasSummaryRows) this.guardRepeatedSummary();

    const maxRow: TableRow = {};
    const avgRow: TableRow = {};
    for (const column of this.table.columns) {
      if (column === timeColumn) {
        maxRow[column] = P_MAX_LABEL;
        avgRow[column] = P_AVG_LABEL;
        continue;
      }
      const values = this.numericColumn(column);
      maxRow[column] = maxOf(values);
      avgRow[column] = meanOf(values);
    }

    this.table.rows.push(maxRow, avgRow);
    return this;
  }

  /**
   * Rename binary pair columns ("001 010") to decimal pairs ("1-2"). The time
   * column and labels that are not binary pairs keep their names, so a second
   * call changes nothing.
   */
  relabelColumns(): this {
    const { timeColumn } = this.options;
    const original = this.table.columns;
    const renamed = original.map((column) => (column === timeColumn ? column : toDecimalLabel(column)));

    this.table = {
      columns: renamed,
      rows: this.table.rows.map((row) => {
        const next: TableRow = {};
        original.forEach((column, index) => {
          next[renamed[index]] = row[column];
        });
        return next;
      }),
    };
    return this;
  }

  /**
   * Superposition walk output: filter, then summarise, then relabel.
   * Summaries run on the filtered columns, and filtering needs the binary labels.
   */
  postprocessSuperposition(adjacency: AdjacencyMatrix): this {
    return this.filterRealEdges(adjacency).appendSummaryRows().relabelColumns();
  }

  /**
   * Single-node walk output has no pair columns; only summary rows are added.
   */
  postprocessSingleNode(): this {
    return this.appendSummaryRows();
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get columns(): string[] {
    return [...this.table.columns];
  }

  get dataColumns(): string[] {
    return this.table.columns.filter((column) => column !== this.options.timeColumn);
  }

  get rowCount(): number {
    return this.table.rows.length;
  }

  get hasSummaryRows(): boolean {
    const { timeColumn } = this.options;
    return this.table.rows.some((row) => isSummaryLabel(row[timeColumn]));
  }

  /** Report from the last filterRealEdges call, or null if it has not run */
  get lastFilterReport(): FilterReport | null {
    return this.filterReport;
  }

  column(name: string): Cell[] {
    if (!this.table.columns.includes(name)) {
      throw new SchemaError(`Unknown column "${name}"`);
    }
    return this.table.rows.map((row) => row[name]);
  }

  /**
   * The most recent P-max and P-avg rows, or null when none were appended
   */
  summaryRows(): { max: TableRow; avg: TableRow } | null {
    const { timeColumn } = this.options;
    let max: TableRow | undefined;
    let avg: TableRow | undefined;
    for (let i = this.table.rows.length - 1; i >= 0 && (!max || !avg); i--) {
      const row = this.table.rows[i];
      if (!max && row[timeColumn] === P_MAX_LABEL) max = row;
      if (!avg && row[timeColumn] === P_AVG_LABEL) avg = row;
    }
    if (!max || !avg) return null;
    return { max: { ...max }, avg: { ...avg } };
  }

  toTable(): Table {
    return { columns: [...this.table.columns], rows: cloneRows(this.table.rows) };
  }

  toRecords(): TableRow[] {
    return cloneRows(this.table.rows);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private numericColumn(column: string): number[] {
    return this.table.rows.map((row, index) => {
      const value = row[column];
      if (typeof value !== 'number') {
        throw new SchemaError(
          `Column "${column}" row ${index} holds non-numeric value "${value}"`,
          'Every column except the time column must hold probabilities'
        );
      }
      return value;
    });
  }

  private guardRepeatedSummary(): void {
    const message = 'Summary rows already present; new P-max/P-avg rows will include them';
    switch (this.options.summaryGuard) {
      case 'allow':
        return;
      case 'warn':
        this.options.logger.warn(`appendSummaryRows: ${message}`);
        return;
      case 'throw':
        throw new SummaryGuardError(message, 'Append summary rows once per pipeline');
    }
  }
}
