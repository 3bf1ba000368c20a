/**
 * RGB colour values for chart cells.
 */

/**
 * An immutable 8-bit-per-channel RGB colour.
 * Colours compare bit-exactly; `key` packs the channels for use in Maps.
 */
export class Color {
  public readonly r: number;
  public readonly g: number;
  public readonly b: number;

  constructor(r: number, g: number, b: number) {
    for (const [name, value] of [['r', r], ['g', g], ['b', b]] as const) {
      if (!Number.isInteger(value) || value < 0 || value > 255) {
        throw new Error(`Invalid ${name} channel: ${value} (expected an integer 0-255)`);
      }
    }
    this.r = r;
    this.g = g;
    this.b = b;
    Object.freeze(this);
  }

  /**
   * Parse a `#RRGGBB` string (case-insensitive).
   *
   * @throws Error if the string is not a 6-digit hex colour
   */
  static fromHex(hex: string): Color {
    const match = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(hex);
    if (!match) {
      throw new Error(`Invalid hex color: '${hex}' (expected #RRGGBB)`);
    }
    return new Color(parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16));
  }

  /**
   * 24-bit integer key, unique per colour.
   */
  get key(): number {
    return (this.r << 16) | (this.g << 8) | this.b;
  }

  equals(other: Color): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }

  /**
   * Encode as `#RRGGBB` with uppercase digits.
   */
  toHex(): string {
    const toHex = (n: number) => n.toString(16).toUpperCase().padStart(2, '0');
    return `#${toHex(this.r)}${toHex(this.g)}${toHex(this.b)}`;
  }

  toString(): string {
    return `Color(${this.r}, ${this.g}, ${this.b})`;
  }
}

/**
 * The outline colour drawn between cells. Never a cell colour.
 */
export const SEPARATOR_COLOR = new Color(32, 32, 32);
