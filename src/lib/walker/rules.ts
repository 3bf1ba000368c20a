/**
 * Tunable constants for pattern walking.
 */

import { Cursor } from '../core/cursor.js';

/**
 * Default number of leading rows that are revealed in lockstep.
 */
export const DEFAULT_STAGGER_ROWS = 3;

/**
 * The lockstep block is grid rows 0, 1 and 2; a larger boundary would leave
 * rows past it unrevealed.
 */
export const MAX_STAGGER_ROWS = 3;

/**
 * Default start position: the first cell of the staggered block is already
 * placed when work begins.
 */
export const DEFAULT_START_CURSOR: Cursor = Object.freeze(new Cursor(2, 1));

/**
 * Rules governing walker behaviour.
 *
 * `staggerRows` moves the boundary between the lockstep and the row-by-row
 * phases, up to MAX_STAGGER_ROWS. The lockstep preview always spans grid rows
 * 0, 1 and 2.
 */
export interface WalkerRules {
  readonly staggerRows: number;
  readonly start: Cursor;
}

/**
 * Create WalkerRules, filling in defaults.
 *
 * @throws Error if a value is not a non-negative integer, or staggerRows
 *   exceeds MAX_STAGGER_ROWS
 */
export function createWalkerRules(overrides: Partial<WalkerRules> = {}): WalkerRules {
  const staggerRows = overrides.staggerRows ?? DEFAULT_STAGGER_ROWS;
  const start = overrides.start ?? DEFAULT_START_CURSOR;

  if (!Number.isInteger(staggerRows) || staggerRows < 0 || staggerRows > MAX_STAGGER_ROWS) {
    throw new Error(`Invalid staggerRows: ${staggerRows} (expected an integer 0-${MAX_STAGGER_ROWS})`);
  }
  if (!Number.isInteger(start.row) || start.row < 0 || !Number.isInteger(start.col) || start.col < 0) {
    throw new Error(`Invalid start cursor: ${start}`);
  }

  return Object.freeze({ staggerRows, start: start.clone() });
}
