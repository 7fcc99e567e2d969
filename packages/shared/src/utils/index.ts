/**
 * Shared utility functions
 */

import { SUMMARY_LABELS } from '../constants/index.js';
import type { SummaryLabel } from '../types/index.js';

// ============================================================================
// Column Reductions
// ============================================================================

function withoutNaN(values: readonly number[]): number[] {
  return values.filter((v) => !Number.isNaN(v));
}

/**
 * Largest value in a column, skipping NaN; NaN when nothing is left
 */
export function maxOf(values: readonly number[]): number {
  const present = withoutNaN(values);
  if (present.length === 0) return NaN;
  let max = present[0];
  for (let i = 1; i < present.length; i++) {
    if (present[i] > max) max = present[i];
  }
  return max;
}

/**
 * Arithmetic mean of a column, skipping NaN; NaN when nothing is left
 */
export function meanOf(values: readonly number[]): number {
  const present = withoutNaN(values);
  if (present.length === 0) return NaN;
  const sum = present.reduce((acc, v) => acc + v, 0);
  return sum / present.length;
}

// ============================================================================
// Array Utilities
// ============================================================================

/**
 * Create a range of numbers
 */
export function range(start: number, end: number, step = 1): number[] {
  const result: number[] = [];
  for (let i = start; i < end; i += step) {
    result.push(i);
  }
  return result;
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Check if a time cell holds one of the summary sentinels
 */
export function isSummaryLabel(value: unknown): value is SummaryLabel {
  return typeof value === 'string' && SUMMARY_LABELS.some((label) => label === value);
}
