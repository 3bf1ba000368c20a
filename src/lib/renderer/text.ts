/**
 * Plain-text rendering of revealed lines and previews.
 */

import { SEPARATOR_COLOR, type Color } from '../core/color.js';
import type { ColorRegistry } from '../registry/color-registry.js';
import { visibleWindow } from '../viewport/scroll.js';
import { previewSlots, type Preview } from '../walker/preview.js';

/** Label shown for an empty preview slot. */
export const END_OF_LINE = 'End of line';

const ANSI_RESET = '\u001b[0m';

/**
 * Wrap `text` in 24-bit ANSI foreground/background escapes.
 */
export function colorize(text: string, foreground: Color, background: Color = SEPARATOR_COLOR): string {
  const fg = `\u001b[38;2;${foreground.r};${foreground.g};${foreground.b}m`;
  const bg = `\u001b[48;2;${background.r};${background.g};${background.b}m`;
  return `${fg}${bg}${text}${ANSI_RESET}`;
}

export interface RenderOptions {
  /** Emit ANSI colour escapes (default false) */
  color?: boolean;
  /** First visible character column (default 0) */
  columnOffset?: number;
  /** Visible character columns (default: the rest of the line) */
  columns?: number;
}

/**
 * One character of a rendered line; `color` is set for cell abbreviations.
 */
interface Glyph {
  readonly char: string;
  readonly color: Color | null;
}

const BLANK: Glyph = Object.freeze({ char: ' ', color: null });

function lineGlyphs(line: ReadonlyArray<Color>, rowIdx: number, registry: ColorRegistry): Glyph[] {
  const glyphs: Glyph[] = rowIdx % 2 === 1 ? [BLANK] : [];
  line.forEach((cell, i) => {
    if (i > 0) glyphs.push(BLANK);
    glyphs.push({ char: registry.oneChar(cell), color: cell });
  });
  return glyphs;
}

/**
 * Render each line as its cells' abbreviations separated by spaces. Odd lines
 * are indented by one space so the rows interlock like the chart.
 *
 * Columns are cut before colouring, so a horizontal window never splits an
 * escape sequence.
 *
 * @throws LookupError if a cell colour has no registry entry
 */
export function renderLines(
  lines: ReadonlyArray<ReadonlyArray<Color>>,
  registry: ColorRegistry,
  options: RenderOptions = {}
): string[] {
  const offset = options.columnOffset ?? 0;
  return lines.map((line, rowIdx) => {
    const glyphs = lineGlyphs(line, rowIdx, registry);
    const visible = options.columns === undefined
      ? glyphs.slice(offset)
      : visibleWindow(glyphs, options.columns, offset);
    return visible
      .map(glyph => (options.color && glyph.color ? colorize(glyph.char, glyph.color) : glyph.char))
      .join('');
  });
}

/**
 * One label per preview slot: the colour's full name, or END_OF_LINE.
 */
export function describePreview(preview: Preview, registry: ColorRegistry): string[] {
  return previewSlots(preview).map(slot => (slot ? registry.fullName(slot) : END_OF_LINE));
}
