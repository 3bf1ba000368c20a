/**
 * Mutable RGB raster that segmentation consumes.
 */

import { Color } from './color.js';

/**
 * A width × height RGB image stored as packed 3-byte pixels.
 */
export class PixelBuffer {
  private readonly data: Uint8Array;

  constructor(
    public readonly width: number,
    public readonly height: number,
    data?: Uint8Array
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new Error(`Invalid image dimensions: ${width}x${height}`);
    }
    const expected = width * height * 3;
    if (data && data.length !== expected) {
      throw new Error(`RGB data length ${data.length} does not match ${width}x${height} (expected ${expected})`);
    }
    this.data = data ? data : new Uint8Array(expected);
  }

  /**
   * Build from RGBA bytes (canvas ImageData, decoded PNG). Alpha is dropped.
   */
  static fromRgba(width: number, height: number, rgba: ArrayLike<number>): PixelBuffer {
    if (rgba.length !== width * height * 4) {
      throw new Error(`RGBA data length ${rgba.length} does not match ${width}x${height}`);
    }
    const rgb = new Uint8Array(width * height * 3);
    for (let i = 0, j = 0; i < rgba.length; i += 4, j += 3) {
      rgb[j] = rgba[i];
      rgb[j + 1] = rgba[i + 1];
      rgb[j + 2] = rgba[i + 2];
    }
    return new PixelBuffer(width, height, rgb);
  }

  /**
   * A buffer with every pixel set to `color`.
   */
  static filled(width: number, height: number, color: Color): PixelBuffer {
    const buffer = new PixelBuffer(width, height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        buffer.set(x, y, color);
      }
    }
    return buffer;
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  get(x: number, y: number): Color {
    const i = this.offset(x, y);
    return new Color(this.data[i], this.data[i + 1], this.data[i + 2]);
  }

  set(x: number, y: number, color: Color): void {
    const i = this.offset(x, y);
    this.data[i] = color.r;
    this.data[i + 1] = color.g;
    this.data[i + 2] = color.b;
  }

  /**
   * Compare a pixel to a colour without allocating.
   */
  matches(x: number, y: number, color: Color): boolean {
    const i = this.offset(x, y);
    return this.data[i] === color.r && this.data[i + 1] === color.g && this.data[i + 2] === color.b;
  }

  clone(): PixelBuffer {
    return new PixelBuffer(this.width, this.height, this.data.slice());
  }

  private offset(x: number, y: number): number {
    if (!this.inBounds(x, y)) {
      throw new Error(`Pixel out of bounds: (${x}, ${y}) in ${this.width}x${this.height}`);
    }
    return (y * this.width + x) * 3;
  }
}
