/**
 * Stateful walk through a segmented pattern, one cell per step.
 */

import type { Color } from '../core/color.js';
import { Cursor } from '../core/cursor.js';
import { InvariantViolation } from '../core/errors.js';
import { cellAt, maxRowLength } from '../core/types.js';
import type { PatternGrid } from '../core/types.js';
import { PixelPreview, TriPreview, type Preview } from './preview.js';
import { createWalkerRules, type WalkerRules } from './rules.js';

/** Grid rows that make up the staggered block. */
const STAGGER_BLOCK: ReadonlyArray<number> = [0, 1, 2];

/**
 * Walker over a PatternGrid.
 *
 * Two phases with different adjacency:
 * - Early rows (cursor.row < staggerRows): grid rows 0, 1 and 2 sit in an
 *   offset/hex arrangement and are revealed together, row 1 one cell behind
 *   the others. Previews are TriPreviews.
 * - Steady state: one row at a time. Previews are PixelPreviews.
 */
export class PatternWalker {
  /** The pattern being walked */
  public readonly grid: PatternGrid;

  /** Revealed prefix of the grid */
  private readonly revealed: Color[][];

  /** Cell(s) being worked now */
  public currentPixel: Preview;

  /** Cell(s) coming up after the current one */
  public nextPixel: Preview;

  /**
   * Set by every advance; the viewport should scroll so the current cell is
   * visible, then clear it.
   */
  public ensureCurrentOnScreen: boolean;

  private position: Cursor;
  private readonly rules: WalkerRules;

  /**
   * @throws InvariantViolation if the cursor lies outside the grid
   */
  constructor(grid: PatternGrid, cursor: Cursor, rules: WalkerRules = createWalkerRules()) {
    this.grid = grid;
    this.rules = rules;
    this.position = PatternWalker.validateCursor(grid, cursor, rules);
    this.revealed = PatternWalker.initializeLines(grid, this.position, rules);
    this.currentPixel = PatternWalker.currentPreview(grid, this.position, rules);
    this.nextPixel = PatternWalker.nextPreview(grid, this.position, rules);
    this.ensureCurrentOnScreen = false;
  }

  // ===========================================================================
  // Construction rules
  // ===========================================================================

  private static validateCursor(grid: PatternGrid, cursor: Cursor, rules: WalkerRules): Cursor {
    const { row, col } = cursor;
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0) {
      throw new InvariantViolation(`Invalid cursor: ${cursor}`);
    }
    if (row >= rules.staggerRows) {
      if (row >= grid.length) {
        throw new InvariantViolation(`${cursor} is past the last row (grid has ${grid.length} rows)`);
      }
      if (col > grid[row].length) {
        throw new InvariantViolation(`${cursor} is past the end of row ${row} (${grid[row].length} cells)`);
      }
    }
    return cursor.clone();
  }

  /**
   * Build the revealed lines for a cursor position.
   */
  static initializeLines(grid: PatternGrid, cursor: Cursor, rules: WalkerRules): Color[][] {
    const take = (row: number, count: number): Color[] => (grid[row] ?? []).slice(0, count);

    if (cursor.row < rules.staggerRows) {
      return [
        take(0, cursor.col + 1),
        take(1, cursor.col),
        take(2, cursor.col + 1),
      ];
    }

    const lines = grid.slice(0, cursor.row).map(row => [...row]);
    lines.push(take(cursor.row - 1, cursor.col + 1));
    return lines;
  }

  private static currentPreview(grid: PatternGrid, { row, col }: Cursor, rules: WalkerRules): Preview {
    if (row >= rules.staggerRows) {
      return PixelPreview(cellAt(grid, row, col - 1));
    }
    return TriPreview(cellAt(grid, 0, col), cellAt(grid, 1, col - 1), cellAt(grid, 2, col));
  }

  private static nextPreview(grid: PatternGrid, { row, col }: Cursor, rules: WalkerRules): Preview {
    if (row >= rules.staggerRows) {
      return PixelPreview(cellAt(grid, row, col));
    }
    return TriPreview(cellAt(grid, 0, col + 1), cellAt(grid, 1, col), cellAt(grid, 2, col + 1));
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get lines(): ReadonlyArray<ReadonlyArray<Color>> {
    return this.revealed;
  }

  get cursor(): Cursor {
    return this.position.clone();
  }

  /**
   * Whether the cursor is in the lockstep phase.
   */
  get inStaggeredRows(): boolean {
    return this.position.row < this.rules.staggerRows;
  }

  /**
   * Read and clear the scroll request.
   */
  consumeScrollRequest(): boolean {
    const requested = this.ensureCurrentOnScreen;
    this.ensureCurrentOnScreen = false;
    return requested;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Step to the next cell. Must not be called once `isDone()` is true.
   *
   * @throws InvariantViolation if the cursor has run off the grid
   */
  advance(): void {
    this.ensureCurrentOnScreen = true;

    let { row, col } = this.position;
    col += 1;
    this.currentPixel = this.nextPixel;

    if (this.isDoneWithLine(row, col)) {
      row += 1;
      col = 0;
      this.revealed.push([]);
      this.currentPixel = PixelPreview(cellAt(this.grid, row, 0));
    }
    this.position = new Cursor(row, col);

    if (row < this.rules.staggerRows) {
      for (const r of STAGGER_BLOCK) {
        const line = this.revealed[r];
        const cell = cellAt(this.grid, r, line.length);
        if (cell) line.push(cell);
      }
    } else {
      const source = this.requireRow(row);
      const line = this.revealed[this.revealed.length - 1];
      const cell = source[line.length];
      if (cell) line.push(cell);
    }

    this.nextPixel = PatternWalker.nextPreview(this.grid, this.position, this.rules);
  }

  /**
   * Return to the configured start position.
   *
   * @throws InvariantViolation if the start cursor lies outside the grid; the
   *   walker is left unchanged
   */
  reset(): void {
    this.position = PatternWalker.validateCursor(this.grid, this.rules.start, this.rules);
    this.revealed.length = 0;
    this.revealed.push(...PatternWalker.initializeLines(this.grid, this.position, this.rules));
    this.currentPixel = PatternWalker.currentPreview(this.grid, this.position, this.rules);
    this.nextPixel = PatternWalker.nextPreview(this.grid, this.position, this.rules);
    this.ensureCurrentOnScreen = true;
  }

  /**
   * True once the cursor is on the last cell of the last row.
   * An empty grid is done from the start.
   */
  isDone(): boolean {
    const lastRow = Math.max(this.grid.length - 1, 0);
    const lastRowLength = this.grid.length > 0 ? this.grid[this.grid.length - 1].length : 1;
    return this.position.row >= lastRow && this.position.col >= Math.max(lastRowLength - 1, 0);
  }

  private isDoneWithLine(row: number, col: number): boolean {
    if (row < this.rules.staggerRows) {
      return col >= maxRowLength(this.grid, STAGGER_BLOCK);
    }
    return col >= this.requireRow(row).length;
  }

  private requireRow(row: number): ReadonlyArray<Color> {
    const source = this.grid[row];
    if (!source) {
      throw new InvariantViolation(
        `PatternWalker.advance() ran past the end of the pattern at ${this.position} (grid has ${this.grid.length} rows)`
      );
    }
    return source;
  }
}
