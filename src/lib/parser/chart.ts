/**
 * Parse chart pictures from a compact string format, and export rows back.
 */

import { Color, SEPARATOR_COLOR } from '../core/color.js';
import { PixelBuffer } from '../core/pixel-buffer.js';
import type { PatternGrid } from '../core/types.js';
import type { ColorRegistry } from '../registry/color-registry.js';

/**
 * Maps a single picture character to a pixel colour.
 */
export type Palette = Readonly<Record<string, Color>>;

/**
 * Parse a chart picture into a pixel buffer.
 *
 * Format:
 * - Pixel rows separated by |
 * - One character per pixel, looked up in `palette`
 * - '.' is the separator colour unless the palette overrides it
 *
 * Example:
 *     parseChart('RR.B|RR.B', { R: red, B: blue })
 *     Creates a 4x2 image: a 2x2 red block, a separator column, a 1x2 blue bar.
 *
 * @param definition - Picture string
 * @param palette - Character → colour
 * @returns PixelBuffer with the picture's pixels
 * @throws Error if rows differ in length or a character is not in the palette
 */
export function parseChart(definition: string, palette: Palette): PixelBuffer {
  const lookup: Record<string, Color> = { '.': SEPARATOR_COLOR, ...palette };
  const rowStrings = definition === '' ? [] : definition.split('|');
  const width = rowStrings.length > 0 ? Array.from(rowStrings[0]).length : 0;

  const mismatched: [number, number][] = [];
  rowStrings.forEach((rowStr, rowIdx) => {
    const length = Array.from(rowStr).length;
    if (length !== width) {
      mismatched.push([rowIdx, length]);
    }
  });

  if (mismatched.length > 0) {
    let errorMsg =
      `Inconsistent row lengths in chart\n` +
      `  Expected: ${width} pixels (from row 0)\n` +
      `  Mismatched rows:\n`;
    for (const [rowIdx, actual] of mismatched) {
      errorMsg += `    Row ${rowIdx}: ${actual} pixels - "${rowStrings[rowIdx]}"\n`;
    }
    errorMsg += `  All rows must have the same number of pixels`;
    throw new Error(errorMsg);
  }

  const image = new PixelBuffer(width, rowStrings.length);
  rowStrings.forEach((rowStr, y) => {
    Array.from(rowStr).forEach((char, x) => {
      const color = lookup[char];
      if (!color) {
        throw new Error(
          `Unknown chart character: '${char}'\n` +
          `  Row ${y}: "${rowStr}"\n` +
          `  Position: column ${x}\n` +
          `  Known characters: ${Object.keys(lookup).join(' ')}`
        );
      }
      image.set(x, y, color);
    });
  });

  return image;
}

/**
 * Export rows to the compact string format: abbreviations separated by
 * spaces, rows separated by |.
 *
 * @example
 * exportRows([[red, blue], [green]], registry) // "R B|G"
 */
export function exportRows(rows: PatternGrid, registry: ColorRegistry): string {
  return rows.map(row => row.map(cell => registry.oneChar(cell)).join(' ')).join('|');
}
