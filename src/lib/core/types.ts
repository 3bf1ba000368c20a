/**
 * Core data structures for segmented charts.
 */

import type { Color } from './color.js';

// =============================================================================
// Grid Structure
// =============================================================================

/**
 * One scan band's worth of cells, left to right in encounter order.
 */
export type PatternRow = ReadonlyArray<Color>;

/**
 * The finished output of segmentation. Rows may have unequal lengths and are
 * never empty.
 */
export type PatternGrid = ReadonlyArray<PatternRow>;

/**
 * Create a frozen PatternGrid from mutable rows.
 *
 * @throws Error if any row is empty
 */
export function createPatternGrid(rows: Color[][]): PatternGrid {
  for (let i = 0; i < rows.length; i++) {
    if (rows[i].length === 0) {
      throw new Error(`Pattern row ${i} is empty`);
    }
  }
  return Object.freeze(rows.map(row => Object.freeze([...row])));
}

/**
 * Get the cell at (row, col), or null when either index is out of range.
 */
export function cellAt(grid: PatternGrid, row: number, col: number): Color | null {
  if (row < 0 || row >= grid.length) {
    return null;
  }
  const cells = grid[row];
  if (col < 0 || col >= cells.length) {
    return null;
  }
  return cells[col];
}

/**
 * Length of the longest of the given rows; missing rows count as empty.
 */
export function maxRowLength(grid: PatternGrid, rowIndices: ReadonlyArray<number>): number {
  let max = 0;
  for (const r of rowIndices) {
    max = Math.max(max, grid[r]?.length ?? 0);
  }
  return max;
}

// =============================================================================
// Labels
// =============================================================================

/**
 * User-supplied labels for one colour.
 */
export interface ColorEntry {
  readonly fullName: string;
  readonly oneChar: string;
}
