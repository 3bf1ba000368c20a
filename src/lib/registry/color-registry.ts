/**
 * Colour → label mapping shared by segmentation and rendering.
 */

import { Color } from '../core/color.js';
import { LookupError } from '../core/errors.js';
import type { ColorEntry } from '../core/types.js';

/**
 * Records a full name and a one-character abbreviation for each cell colour.
 * Both maps are written together, so a colour is either fully registered or
 * absent.
 */
export class ColorRegistry {
  private readonly colors = new Map<number, Color>();
  private readonly fullNames = new Map<number, string>();
  private readonly shortChars = new Map<number, string>();

  has(color: Color): boolean {
    return this.fullNames.has(color.key) && this.shortChars.has(color.key);
  }

  /**
   * Record labels for `color`, replacing any earlier entry.
   */
  addEntry(color: Color, entry: ColorEntry): void {
    this.colors.set(color.key, color);
    this.fullNames.set(color.key, entry.fullName);
    this.shortChars.set(color.key, entry.oneChar);
  }

  /**
   * @throws LookupError if the colour is not registered
   */
  fullName(color: Color): string {
    const name = this.fullNames.get(color.key);
    if (name === undefined) {
      throw new LookupError(color);
    }
    return name;
  }

  /**
   * @throws LookupError if the colour is not registered
   */
  oneChar(color: Color): string {
    const char = this.shortChars.get(color.key);
    if (char === undefined) {
      throw new LookupError(color);
    }
    return char;
  }

  get size(): number {
    return this.colors.size;
  }

  /**
   * Registered colours with their labels, in insertion order.
   */
  *entries(): IterableIterator<[Color, ColorEntry]> {
    for (const color of this.colors.values()) {
      yield [color, { fullName: this.fullName(color), oneChar: this.oneChar(color) }];
    }
  }
}

/**
 * Normalise user input into a ColorEntry: both labels are trimmed and the
 * abbreviation keeps only its first character.
 *
 * @throws Error if either label is empty after trimming
 */
export function createColorEntry(fullName: string, oneChar: string): ColorEntry {
  const name = fullName.trim();
  const [first] = Array.from(oneChar.trim());
  if (!name) {
    throw new Error('Color name must not be empty');
  }
  if (first === undefined) {
    throw new Error('Color abbreviation must not be empty');
  }
  return Object.freeze({ fullName: name, oneChar: first });
}
