/**
 * Current/next cell previews shown while walking a pattern.
 */

import type { Color } from '../core/color.js';

/**
 * A single upcoming cell. `null` at the end of a row.
 */
export interface PixelPreview {
  readonly type: 'pixel';
  readonly color: Color | null;
}

/**
 * One cell from each of the first three (staggered) rows, which are worked
 * together.
 */
export interface TriPreview {
  readonly type: 'tri';
  readonly colors: readonly [Color | null, Color | null, Color | null];
}

export type Preview = PixelPreview | TriPreview;

export function PixelPreview(color: Color | null): PixelPreview {
  return Object.freeze({ type: 'pixel', color });
}

export function TriPreview(top: Color | null, middle: Color | null, bottom: Color | null): TriPreview {
  return Object.freeze({ type: 'tri', colors: Object.freeze([top, middle, bottom] as const) });
}

export function isPixelPreview(preview: Preview): preview is PixelPreview {
  return preview.type === 'pixel';
}

export function isTriPreview(preview: Preview): preview is TriPreview {
  return preview.type === 'tri';
}

/**
 * Preview slots as a flat list, one entry per displayed box.
 */
export function previewSlots(preview: Preview): ReadonlyArray<Color | null> {
  return preview.type === 'pixel' ? [preview.color] : preview.colors;
}

/**
 * True when every slot is empty.
 */
export function isEmptyPreview(preview: Preview): boolean {
  return previewSlots(preview).every(slot => slot === null);
}
