/**
 * Scroll arithmetic for keeping the current cell in view.
 */

/** Extra lines kept visible beyond the current one. */
export const OVERSCROLL_PADDING = 2;

/**
 * New scroll offset so that position `contentLength` is inside a frame of
 * `frameSize` starting at `currentScroll`.
 *
 * @param frameSize - Visible lines (or columns)
 * @param contentLength - Index one past the item that must be visible
 * @param currentScroll - Current offset of the first visible item
 */
export function ensureScrollToVisible(frameSize: number, contentLength: number, currentScroll: number): number {
  const lowestVisible = currentScroll;
  const highestVisible = frameSize + currentScroll;

  if (lowestVisible > contentLength) {
    // Current item is above the frame
    return Math.max(contentLength - 1, 0);
  }
  if (highestVisible < contentLength) {
    // Current item is below the frame
    return contentLength + 1 + OVERSCROLL_PADDING - frameSize;
  }
  return currentScroll;
}

/**
 * The slice of `lines` shown in a frame of `frameSize` at `scroll`.
 */
export function visibleWindow<T>(lines: ReadonlyArray<T>, frameSize: number, scroll: number): T[] {
  const start = Math.max(0, Math.min(scroll, lines.length));
  return lines.slice(start, start + Math.max(frameSize, 0));
}
