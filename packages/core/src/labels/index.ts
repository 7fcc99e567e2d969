/**
 * Node-pair column labels
 *
 * Superposition walks name each probability column after a directed node
 * pair, written as two zero-padded binary indices: "001 010" is the pair
 * (1, 2) in a graph that needs three bits per index. After post-processing
 * the same column is labelled "1-2".
 */

import {
  BINARY_PAIR_SEPARATOR,
  DECIMAL_PAIR_SEPARATOR,
  MIN_BIT_WIDTH,
  range,
} from '@qwalk/shared';
import type { AdjacencyMatrix, PairLabel } from '@qwalk/shared';
import { AdjacencyError } from '../errors/index.js';

const BINARY_TOKEN = /^[01]+$/;

// ============================================================================
// Bit Width
// ============================================================================

/**
 * Bits per node index for a graph of `nodeCount` nodes: ceil(log2(n)),
 * clamped to at least one bit so a single-node graph still has labels
 */
export function bitWidthForNodeCount(nodeCount: number): number {
  if (!Number.isInteger(nodeCount) || nodeCount < 1) {
    throw new AdjacencyError(`Node count must be a positive integer, got ${nodeCount}`);
  }
  let bits = 0;
  while (2 ** bits < nodeCount) bits++;
  return Math.max(MIN_BIT_WIDTH, bits);
}

// ============================================================================
// Encoding
// ============================================================================

function toBinary(index: number, bitWidth: number): string {
  return index.toString(2).padStart(bitWidth, '0');
}

/**
 * Binary column label for a directed pair, e.g. (1, 2) at 3 bits → "001 010"
 */
export function formatPairLabel(source: number, target: number, bitWidth: number): string {
  return `${toBinary(source, bitWidth)}${BINARY_PAIR_SEPARATOR}${toBinary(target, bitWidth)}`;
}

/**
 * Decimal column label for a directed pair, e.g. (1, 2) → "1-2"
 */
export function formatDecimalLabel(source: number | bigint, target: number | bigint): string {
  return `${source}${DECIMAL_PAIR_SEPARATOR}${target}`;
}

// ============================================================================
// Decoding
// ============================================================================

function splitBinaryPair(label: string): [string, string] | null {
  const tokens = label.trim().split(/\s+/);
  if (tokens.length !== 2) return null;
  const [sourceBits, targetBits] = tokens;
  if (!BINARY_TOKEN.test(sourceBits) || !BINARY_TOKEN.test(targetBits)) return null;
  return [sourceBits, targetBits];
}

/**
 * Decode a binary pair label. Anything other than exactly two
 * whitespace-separated binary tokens comes back `unparsed` with the label
 * as given.
 */
export function parsePairLabel(label: string): PairLabel {
  const tokens = splitBinaryPair(label);
  if (!tokens) return { kind: 'unparsed', label };

  const [sourceBits, targetBits] = tokens;
  return {
    kind: 'parsed',
    source: parseInt(sourceBits, 2),
    target: parseInt(targetBits, 2),
    bitWidth: sourceBits.length === targetBits.length ? sourceBits.length : null,
  };
}

/**
 * Decimal form of a binary pair label; other labels pass through unchanged.
 * Decoded through BigInt so tokens wider than 53 bits stay exact.
 */
export function toDecimalLabel(label: string): string {
  const tokens = splitBinaryPair(label);
  if (!tokens) return label;
  const [sourceBits, targetBits] = tokens;
  return formatDecimalLabel(BigInt(`0b${sourceBits}`), BigInt(`0b${targetBits}`));
}

/**
 * Distinct bit widths used by the pair-encoded labels, ascending.
 * Labels whose two tokens differ in width are not counted.
 */
export function detectBitWidths(labels: readonly string[]): number[] {
  const widths = new Set<number>();
  for (const label of labels) {
    const parsed = parsePairLabel(label);
    if (parsed.kind === 'parsed' && parsed.bitWidth !== null) {
      widths.add(parsed.bitWidth);
    }
  }
  return [...widths].sort((a, b) => a - b);
}

// ============================================================================
// Exclusion Sets
// ============================================================================

/**
 * Labels of every real edge, i.e. each (i, j) with a nonzero matrix entry
 */
export function edgeLabels(adjacency: AdjacencyMatrix, bitWidth: number): Set<string> {
  const labels = new Set<string>();
  adjacency.forEach((row, i) => {
    row.forEach((weight, j) => {
      if (weight !== 0) labels.add(formatPairLabel(i, j, bitWidth));
    });
  });
  return labels;
}

/**
 * Labels of every self-pair (i, i) for a graph of `nodeCount` nodes
 */
export function selfPairLabels(nodeCount: number, bitWidth: number): Set<string> {
  return new Set(range(0, nodeCount).map((i) => formatPairLabel(i, i, bitWidth)));
}
