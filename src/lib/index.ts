/**
 * Chart segmentation and pattern walking.
 *
 * Pipeline:
 * 1. Segment: PixelBuffer → PatternGrid (pausing for unnamed colours)
 * 2. Walk: PatternWalker over the grid, resumable from a saved Cursor
 */

export { Color, SEPARATOR_COLOR } from './core/color.js';
export { Cursor } from './core/cursor.js';
export { PixelBuffer } from './core/pixel-buffer.js';
export { LookupError, InvariantViolation, isLookupError, isInvariantViolation } from './core/errors.js';
export { createPatternGrid, cellAt, maxRowLength } from './core/types.js';
export type { PatternGrid, PatternRow, ColorEntry } from './core/types.js';
export * from './registry/index.js';
export * from './segmenter/index.js';
export * from './walker/index.js';
export * from './config/index.js';
export { decodePng, encodePng, loadPng } from './image/png-loader.js';
export { parseChart, exportRows } from './parser/chart.js';
export type { Palette } from './parser/chart.js';
export { renderLines, describePreview, colorize, END_OF_LINE } from './renderer/text.js';
export type { RenderOptions } from './renderer/text.js';
export { ensureScrollToVisible, visibleWindow, OVERSCROLL_PADDING } from './viewport/scroll.js';
