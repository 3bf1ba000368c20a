/**
 * Resumable segmentation of a chart image into rows of cell colours.
 */

import { SEPARATOR_COLOR, type Color } from '../core/color.js';
import { InvariantViolation } from '../core/errors.js';
import type { PixelBuffer } from '../core/pixel-buffer.js';
import { createPatternGrid } from '../core/types.js';
import type { ColorEntry } from '../core/types.js';
import type { ColorRegistry } from '../registry/color-registry.js';
import { Complete, NewColor, type BuildState } from './build-state.js';
import { consumeRegion } from './flood-fill.js';

/**
 * Scans pixels in raster order, turning each connected same-colour region
 * into one cell of the row whose scan line first reaches it.
 *
 * Scanning suspends at the first colour missing from the registry; the
 * resume position is the exact pixel that stopped it.
 */
export class RowBuilder {
  /** Working copy; consumed regions are repainted with the separator */
  private readonly image: PixelBuffer;

  /** Rows finished so far */
  private readonly rows: Color[][] = [];

  /** Cells found on the current scan line */
  private currentRow: Color[] = [];

  /** Resume position (inclusive) */
  private x = 0;
  private y = 0;

  /** Colour waiting for a name, if suspended */
  private pending: Color | null = null;

  constructor(image: PixelBuffer) {
    this.image = image.clone();
  }

  /**
   * The colour the last `build` stopped on, or null when not suspended.
   */
  get pendingColor(): Color | null {
    return this.pending;
  }

  /**
   * Scan from the resume position until the image is exhausted or an
   * unregistered colour is found.
   */
  build(registry: ColorRegistry): BuildState {
    const { width, height } = this.image;

    for (let y = this.y; y < height; y++) {
      for (let x = this.x; x < width; x++) {
        this.x = x;
        this.y = y;

        if (this.image.matches(x, y, SEPARATOR_COLOR)) continue;

        const pixel = this.image.get(x, y);
        if (!registry.has(pixel)) {
          this.pending = pixel;
          return NewColor(pixel);
        }

        this.currentRow.push(pixel);
        consumeRegion(this.image, x, y);
      }

      // Scan lines that found nothing produce no row
      if (this.currentRow.length > 0) {
        this.rows.push(this.currentRow);
        this.currentRow = [];
      }
      this.x = 0;
    }

    this.y = height;
    this.pending = null;
    return Complete(createPatternGrid(this.rows));
  }

  /**
   * Register `entry` for the colour that suspended the last `build`, then
   * resume scanning from that same pixel.
   *
   * @throws InvariantViolation if the builder is not waiting on a colour
   */
  continueBuild(entry: ColorEntry, registry: ColorRegistry): BuildState {
    if (this.pending === null) {
      throw new InvariantViolation(
        `RowBuilder.continueBuild() called without a pending color at (${this.x}, ${this.y})`
      );
    }
    registry.addEntry(this.pending, entry);
    this.pending = null;
    return this.build(registry);
  }
}
