/**
 * Pattern walking: cursor, revealed lines and previews.
 */

export { PatternWalker } from './walker.js';
export {
  createWalkerRules,
  DEFAULT_STAGGER_ROWS,
  DEFAULT_START_CURSOR,
  MAX_STAGGER_ROWS
} from './rules.js';
export type { WalkerRules } from './rules.js';
export {
  PixelPreview,
  TriPreview,
  isPixelPreview,
  isTriPreview,
  isEmptyPreview,
  previewSlots
} from './preview.js';
export type { Preview } from './preview.js';
