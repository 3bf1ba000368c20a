/**
 * Result of one segmentation pass.
 */

import type { Color } from '../core/color.js';
import type { PatternGrid } from '../core/types.js';

/**
 * Every pixel has been scanned.
 */
export interface Complete {
  readonly type: 'complete';
  readonly rows: PatternGrid;
}

/**
 * Scanning stopped at a colour with no registry entry. The caller names it
 * and resumes with `RowBuilder.continueBuild`.
 */
export interface NewColor {
  readonly type: 'newColor';
  readonly color: Color;
}

export type BuildState = Complete | NewColor;

export function Complete(rows: PatternGrid): Complete {
  return Object.freeze({ type: 'complete', rows });
}

export function NewColor(color: Color): NewColor {
  return Object.freeze({ type: 'newColor', color });
}

export function isComplete(state: BuildState): state is Complete {
  return state.type === 'complete';
}

export function isNewColor(state: BuildState): state is NewColor {
  return state.type === 'newColor';
}
