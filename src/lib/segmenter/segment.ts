/**
 * Drive a RowBuilder to completion.
 */

import type { Color } from '../core/color.js';
import type { PixelBuffer } from '../core/pixel-buffer.js';
import type { ColorEntry, PatternGrid } from '../core/types.js';
import type { ColorRegistry } from '../registry/color-registry.js';
import { RowBuilder } from './row-builder.js';

/**
 * Supplies labels for a colour seen for the first time (console prompt,
 * dialog, fixture table...).
 */
export type NameColorFn = (color: Color) => Promise<ColorEntry>;

/**
 * Segment `image`, asking `nameColor` for every colour the registry does not
 * know yet. New entries are written into `registry`.
 */
export async function segment(
  image: PixelBuffer,
  registry: ColorRegistry,
  nameColor: NameColorFn
): Promise<PatternGrid> {
  const builder = new RowBuilder(image);
  let state = builder.build(registry);

  while (state.type === 'newColor') {
    const entry = await nameColor(state.color);
    state = builder.continueBuild(entry, registry);
  }

  return state.rows;
}
