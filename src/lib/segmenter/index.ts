/**
 * Image segmentation: pixels → rows of cell colours.
 *
 * Two-phase protocol:
 * 1. build: scan until complete or an unnamed colour is found
 * 2. continueBuild: register the colour and resume at the same pixel
 */

export { RowBuilder } from './row-builder.js';
export { consumeRegion } from './flood-fill.js';
export { segment } from './segment.js';
export type { NameColorFn } from './segment.js';
export type { BuildState, Complete, NewColor } from './build-state.js';
export { isComplete, isNewColor } from './build-state.js';
