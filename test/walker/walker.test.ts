/**
 * Tests for PatternWalker traversal and previews.
 */

import { describe, it, expect } from 'vitest';
import { Color } from '../../src/lib/core/color.js';
import { Cursor } from '../../src/lib/core/cursor.js';
import { InvariantViolation } from '../../src/lib/core/errors.js';
import { createPatternGrid } from '../../src/lib/core/types.js';
import { PatternWalker } from '../../src/lib/walker/walker.js';
import { PixelPreview, TriPreview, isEmptyPreview } from '../../src/lib/walker/preview.js';
import { createWalkerRules, DEFAULT_START_CURSOR, MAX_STAGGER_ROWS } from '../../src/lib/walker/rules.js';

const A = new Color(10, 0, 0);
const B = new Color(20, 0, 0);
const C = new Color(30, 0, 0);
const D = new Color(40, 0, 0);
const E = new Color(50, 0, 0);
const F = new Color(60, 0, 0);
const G = new Color(70, 0, 0);
const H = new Color(80, 0, 0);
const I = new Color(90, 0, 0);

/**
 * Three staggered rows followed by two ordinary rows:
 *   A B C
 *    D E
 *   F G H
 *    I A
 *   B
 */
const GRID = createPatternGrid([
  [A, B, C],
  [D, E],
  [F, G, H],
  [I, A],
  [B],
]);

describe('TestPatternWalkerConstruction', () => {
  it('test_default_start_cursor', () => {
    expect(DEFAULT_START_CURSOR.equals(new Cursor(2, 1))).toBe(true);
    const walker = new PatternWalker(GRID, DEFAULT_START_CURSOR);
    expect(walker.cursor.equals(new Cursor(2, 1))).toBe(true);
  });

  it('test_staggered_rows_revealed_in_lockstep', () => {
    const walker = new PatternWalker(GRID, new Cursor(2, 1));

    expect(walker.lines).toEqual([[A, B], [D], [F, G]]);
    expect(walker.currentPixel).toEqual(TriPreview(B, D, G));
    expect(walker.nextPixel).toEqual(TriPreview(C, E, H));
    expect(walker.inStaggeredRows).toBe(true);
    expect(walker.ensureCurrentOnScreen).toBe(false);
    expect(walker.isDone()).toBe(false);
  });

  it('test_staggered_preview_at_column_zero', () => {
    const walker = new PatternWalker(GRID, new Cursor(0, 0));

    expect(walker.lines).toEqual([[A], [], [F]]);
    expect(walker.currentPixel).toEqual(TriPreview(A, null, F));
    expect(walker.nextPixel).toEqual(TriPreview(B, D, G));
  });

  it('test_steady_state_construction', () => {
    const walker = new PatternWalker(GRID, new Cursor(3, 1));

    // Full rows before the cursor row, then a partial copy of the row above it
    expect(walker.lines).toEqual([[A, B, C], [D, E], [F, G, H], [F, G]]);
    expect(walker.currentPixel).toEqual(PixelPreview(I));
    expect(walker.nextPixel).toEqual(PixelPreview(A));
    expect(walker.inStaggeredRows).toBe(false);
  });

  it('test_steady_state_preview_before_first_cell', () => {
    const walker = new PatternWalker(GRID, new Cursor(3, 0));

    expect(walker.currentPixel).toEqual(PixelPreview(null));
    expect(walker.nextPixel).toEqual(PixelPreview(I));
  });

  it('test_rejects_cursor_past_last_row', () => {
    const grid = createPatternGrid([[A, B]]);
    expect(() => new PatternWalker(grid, new Cursor(3, 0))).toThrow(InvariantViolation);
    expect(() => new PatternWalker(GRID, new Cursor(5, 0))).toThrow('past the last row');
  });

  it('test_rejects_cursor_past_row_end', () => {
    expect(() => new PatternWalker(GRID, new Cursor(3, 3))).toThrow('is past the end of row 3 (2 cells)');
  });

  it('test_rejects_negative_cursor', () => {
    expect(() => new PatternWalker(GRID, new Cursor(-1, 0))).toThrow(InvariantViolation);
    expect(() => new PatternWalker(GRID, new Cursor(0, 1.5))).toThrow('Invalid cursor');
  });

  it('test_empty_grid_is_done_immediately', () => {
    const walker = new PatternWalker(createPatternGrid([]), DEFAULT_START_CURSOR);

    expect(walker.isDone()).toBe(true);
    expect(walker.lines).toEqual([[], [], []]);
    expect(isEmptyPreview(walker.currentPixel)).toBe(true);
    expect(isEmptyPreview(walker.nextPixel)).toBe(true);
  });
});

describe('TestPatternWalkerAdvance', () => {
  it('test_advance_within_staggered_rows', () => {
    const walker = new PatternWalker(GRID, new Cursor(2, 1));
    walker.advance();

    expect(walker.cursor.equals(new Cursor(2, 2))).toBe(true);
    expect(walker.lines).toEqual([[A, B, C], [D, E], [F, G, H]]);
    expect(walker.currentPixel).toEqual(TriPreview(C, E, H));
    expect(walker.nextPixel).toEqual(TriPreview(null, null, null));
    expect(walker.ensureCurrentOnScreen).toBe(true);
  });

  it('test_advance_out_of_staggered_rows', () => {
    const walker = new PatternWalker(GRID, new Cursor(2, 1));
    walker.advance();
    walker.advance();

    expect(walker.cursor.equals(new Cursor(3, 0))).toBe(true);
    expect(walker.lines).toEqual([[A, B, C], [D, E], [F, G, H], [I]]);
    expect(walker.currentPixel).toEqual(PixelPreview(I));
    expect(walker.nextPixel).toEqual(PixelPreview(I));
  });

  it('test_advance_through_steady_rows', () => {
    const walker = new PatternWalker(GRID, new Cursor(2, 1));
    walker.advance();
    walker.advance();
    walker.advance();

    expect(walker.cursor.equals(new Cursor(3, 1))).toBe(true);
    expect(walker.lines[3]).toEqual([I, A]);
    expect(walker.currentPixel).toEqual(PixelPreview(I));
    expect(walker.nextPixel).toEqual(PixelPreview(A));

    walker.advance();

    expect(walker.cursor.equals(new Cursor(4, 0))).toBe(true);
    expect(walker.lines).toEqual([[A, B, C], [D, E], [F, G, H], [I, A], [B]]);
    expect(walker.currentPixel).toEqual(PixelPreview(B));
    expect(walker.isDone()).toBe(true);
  });

  it('test_cursor_only_moves_forward_until_done', () => {
    const walker = new PatternWalker(GRID, new Cursor(0, 0));
    const visited: Cursor[] = [walker.cursor];

    while (!walker.isDone()) {
      walker.advance();
      visited.push(walker.cursor);
    }

    for (let i = 1; i < visited.length; i++) {
      expect(visited[i].compare(visited[i - 1])).toBeGreaterThan(0);
    }
    expect(visited[visited.length - 1].equals(new Cursor(4, 0))).toBe(true);
  });

  it('test_advance_past_done_is_an_invariant_violation', () => {
    const walker = new PatternWalker(GRID, new Cursor(4, 0));
    expect(walker.isDone()).toBe(true);
    expect(() => walker.advance()).toThrow(InvariantViolation);
  });

  it('test_consume_scroll_request_clears_flag', () => {
    const walker = new PatternWalker(GRID, new Cursor(2, 1));
    expect(walker.consumeScrollRequest()).toBe(false);

    walker.advance();
    expect(walker.consumeScrollRequest()).toBe(true);
    expect(walker.ensureCurrentOnScreen).toBe(false);
  });
});

describe('TestPatternWalkerCompletion', () => {
  it('test_last_cell_of_last_row_has_no_next', () => {
    const walker = new PatternWalker(GRID, new Cursor(4, 1));

    expect(walker.currentPixel).toEqual(PixelPreview(B));
    expect(walker.nextPixel).toEqual(PixelPreview(null));
    expect(walker.isDone()).toBe(true);
  });

  it('test_last_cell_of_staggered_only_grid_has_empty_triple', () => {
    const grid = createPatternGrid([[A, B], [C], [D, E]]);
    const walker = new PatternWalker(grid, new Cursor(2, 1));

    expect(walker.currentPixel).toEqual(TriPreview(B, C, E));
    expect(walker.nextPixel).toEqual(TriPreview(null, null, null));
    expect(walker.isDone()).toBe(true);
  });

  it('test_not_done_before_last_cell', () => {
    expect(new PatternWalker(GRID, new Cursor(3, 1)).isDone()).toBe(false);
    expect(new PatternWalker(GRID, new Cursor(2, 5)).isDone()).toBe(false);
  });
});

describe('TestPatternWalkerReset', () => {
  it('test_reset_matches_fresh_walker', () => {
    const walker = new PatternWalker(GRID, new Cursor(2, 1));
    walker.advance();
    walker.advance();
    walker.advance();
    walker.reset();

    const fresh = new PatternWalker(GRID, DEFAULT_START_CURSOR);
    expect(walker.cursor.equals(fresh.cursor)).toBe(true);
    expect(walker.lines).toEqual(fresh.lines);
    expect(walker.currentPixel).toEqual(fresh.currentPixel);
    expect(walker.nextPixel).toEqual(fresh.nextPixel);
  });

  it('test_reset_from_restored_cursor_uses_configured_start', () => {
    const rules = createWalkerRules({ start: new Cursor(0, 0) });
    const walker = new PatternWalker(GRID, new Cursor(3, 1), rules);
    walker.reset();

    expect(walker.cursor.equals(new Cursor(0, 0))).toBe(true);
    expect(walker.lines).toEqual([[A], [], [F]]);
    expect(walker.ensureCurrentOnScreen).toBe(true);
  });

  it('test_reset_rejects_start_outside_grid', () => {
    const rules = createWalkerRules({ start: new Cursor(7, 10) });
    const walker = new PatternWalker(GRID, new Cursor(3, 1), rules);
    walker.advance();

    expect(() => walker.reset()).toThrow(InvariantViolation);
    expect(walker.cursor.equals(new Cursor(4, 0))).toBe(true);
    expect(walker.lines).toEqual([[A, B, C], [D, E], [F, G, H], [F, G], [B]]);
  });

  it('test_reset_does_not_touch_grid', () => {
    const walker = new PatternWalker(GRID, new Cursor(2, 1));
    walker.advance();
    walker.reset();

    expect(walker.grid).toBe(GRID);
    expect(GRID[0]).toEqual([A, B, C]);
  });
});

describe('TestWalkerRules', () => {
  it('test_defaults', () => {
    const rules = createWalkerRules();
    expect(rules.staggerRows).toBe(3);
    expect(rules.start.equals(new Cursor(2, 1))).toBe(true);
  });

  it('test_rejects_invalid_values', () => {
    expect(() => createWalkerRules({ staggerRows: -1 })).toThrow('Invalid staggerRows: -1');
    expect(() => createWalkerRules({ staggerRows: 4 })).toThrow('Invalid staggerRows: 4 (expected an integer 0-3)');
    expect(() => createWalkerRules({ start: new Cursor(0, -2) })).toThrow('Invalid start cursor: Cursor(0, -2)');
  });

  it('test_largest_stagger_boundary_reveals_every_cell', () => {
    const grid = createPatternGrid([[A, B], [C], [D, E], [F, G], [H], [I]]);
    const walker = new PatternWalker(grid, DEFAULT_START_CURSOR, createWalkerRules({ staggerRows: MAX_STAGGER_ROWS }));
    while (!walker.isDone()) {
      walker.advance();
    }

    expect(walker.lines).toEqual([[A, B], [C], [D, E], [F, G], [H], [I]]);
  });

  it('test_zero_stagger_rows_uses_single_previews', () => {
    const grid = createPatternGrid([[A, B], [C]]);
    const walker = new PatternWalker(grid, new Cursor(0, 1), createWalkerRules({ staggerRows: 0, start: new Cursor(0, 0) }));

    expect(walker.currentPixel).toEqual(PixelPreview(A));
    expect(walker.nextPixel).toEqual(PixelPreview(B));
  });
});
