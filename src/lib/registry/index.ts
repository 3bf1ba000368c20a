/**
 * Colour labelling.
 */

export { ColorRegistry, createColorEntry } from './color-registry.js';
export type { ColorEntry } from '../core/types.js';
