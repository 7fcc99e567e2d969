/**
 * Table and label constants
 */

import type { SummaryGuard, SummaryLabel } from '../types/index.js';

// ============================================================================
// Column & Row Labels
// ============================================================================

/** Name of the reserved time-index column */
export const TIME_COLUMN = 'Time';

/** Time cell of the per-column maximum row */
export const P_MAX_LABEL: SummaryLabel = 'P-max';

/** Time cell of the per-column mean row */
export const P_AVG_LABEL: SummaryLabel = 'P-avg';

/** Summary labels in the order their rows are appended */
export const SUMMARY_LABELS: readonly SummaryLabel[] = [P_MAX_LABEL, P_AVG_LABEL];

// ============================================================================
// Pair Label Encoding
// ============================================================================

/** Single-node graphs still get one bit per index */
export const MIN_BIT_WIDTH = 1;

/** Separator between the two binary indices, e.g. "001 010" */
export const BINARY_PAIR_SEPARATOR = ' ';

/** Separator between the two decimal indices, e.g. "1-2" */
export const DECIMAL_PAIR_SEPARATOR = '-';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SUMMARY_GUARD: SummaryGuard = 'allow';
