/**
 * Tests for text rendering and viewport scrolling.
 */

import { describe, it, expect } from 'vitest';
import { Color } from '../../src/lib/core/color.js';
import { LookupError } from '../../src/lib/core/errors.js';
import { ColorRegistry } from '../../src/lib/registry/color-registry.js';
import { END_OF_LINE, colorize, describePreview, renderLines } from '../../src/lib/renderer/text.js';
import { ensureScrollToVisible, visibleWindow } from '../../src/lib/viewport/scroll.js';
import { PixelPreview, TriPreview } from '../../src/lib/walker/preview.js';

const RED = new Color(200, 0, 0);
const GREEN = new Color(0, 200, 0);
const BLUE = new Color(0, 0, 200);

function registry(): ColorRegistry {
  const reg = new ColorRegistry();
  reg.addEntry(RED, { fullName: 'Red', oneChar: 'R' });
  reg.addEntry(GREEN, { fullName: 'Green', oneChar: 'G' });
  reg.addEntry(BLUE, { fullName: 'Blue', oneChar: 'B' });
  return reg;
}

describe('renderLines', () => {
  it('indents odd lines by one space', () => {
    expect(renderLines([[RED, BLUE], [GREEN], [BLUE, BLUE, RED]], registry())).toEqual(['R B', ' G', 'B B R']);
  });

  it('renders empty lines', () => {
    expect(renderLines([[], [], [RED]], registry())).toEqual(['', ' ', 'R']);
  });

  it('wraps cells in ANSI colour when asked', () => {
    const [line] = renderLines([[RED]], registry(), { color: true });
    expect(line).toBe('\u001b[38;2;200;0;0m\u001b[48;2;32;32;32mR\u001b[0m');
  });

  it('cuts a column window', () => {
    const lines = [[RED, BLUE], [GREEN], [BLUE, BLUE, RED]];
    expect(renderLines(lines, registry(), { columnOffset: 2, columns: 3 })).toEqual(['B', '', 'B R']);
  });

  it('cuts columns before colouring', () => {
    expect(renderLines([[RED, BLUE]], registry(), { color: true, columnOffset: 2 })).toEqual([
      '\u001b[38;2;0;0;200m\u001b[48;2;32;32;32mB\u001b[0m',
    ]);
    expect(renderLines([[RED, BLUE]], registry(), { color: true, columnOffset: 1, columns: 1 })).toEqual([' ']);
  });

  it('throws for unregistered cells', () => {
    expect(() => renderLines([[new Color(1, 2, 3)]], registry())).toThrow(LookupError);
  });
});

describe('colorize', () => {
  it('uses the given background', () => {
    expect(colorize('x', GREEN, BLUE)).toBe('\u001b[38;2;0;200;0m\u001b[48;2;0;0;200mx\u001b[0m');
  });
});

describe('describePreview', () => {
  it('labels a single cell', () => {
    expect(describePreview(PixelPreview(GREEN), registry())).toEqual(['Green']);
    expect(describePreview(PixelPreview(null), registry())).toEqual([END_OF_LINE]);
  });

  it('labels each slot of a triple', () => {
    expect(describePreview(TriPreview(RED, null, BLUE), registry())).toEqual(['Red', 'End of line', 'Blue']);
  });
});

describe('ensureScrollToVisible', () => {
  it('keeps the scroll when the item is visible', () => {
    expect(ensureScrollToVisible(10, 5, 0)).toBe(0);
    expect(ensureScrollToVisible(10, 12, 4)).toBe(4);
  });

  it('scrolls down past the item with padding', () => {
    expect(ensureScrollToVisible(10, 25, 0)).toBe(18);
  });

  it('scrolls up to the item', () => {
    expect(ensureScrollToVisible(10, 5, 8)).toBe(4);
    expect(ensureScrollToVisible(10, 0, 3)).toBe(0);
  });
});

describe('visibleWindow', () => {
  it('slices the frame', () => {
    expect(visibleWindow(['a', 'b', 'c', 'd', 'e'], 2, 1)).toEqual(['b', 'c']);
    expect(visibleWindow(['a', 'b'], 5, 0)).toEqual(['a', 'b']);
    expect(visibleWindow(['a', 'b'], 5, 9)).toEqual([]);
  });
});
