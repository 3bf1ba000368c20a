/**
 * Region consumption for segmentation.
 */

import { SEPARATOR_COLOR } from '../core/color.js';
import type { PixelBuffer } from '../core/pixel-buffer.js';

/**
 * Repaint the 4-connected region of same-coloured pixels containing
 * (startX, startY) with the separator colour. Repainting doubles as the
 * visited marker, so each region is consumed exactly once.
 *
 * @returns Number of pixels consumed (0 if the start pixel is a separator)
 */
export function consumeRegion(buffer: PixelBuffer, startX: number, startY: number): number {
  const target = buffer.get(startX, startY);
  if (target.equals(SEPARATOR_COLOR)) {
    return 0;
  }

  const stack: Array<[number, number]> = [[startX, startY]];
  let consumed = 0;

  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    const [x, y] = item;

    // Bounds check
    if (!buffer.inBounds(x, y) || !buffer.matches(x, y, target)) continue;

    buffer.set(x, y, SEPARATOR_COLOR);
    consumed++;

    stack.push([x - 1, y], [x, y - 1], [x + 1, y], [x, y + 1]);
  }

  return consumed;
}
