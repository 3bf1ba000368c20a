/**
 * PNG decoding into pixel buffers.
 */

import { readFile } from 'node:fs/promises';
import pngjs from 'pngjs';
import { PixelBuffer } from '../core/pixel-buffer.js';

const { PNG } = pngjs;

/**
 * Decode PNG bytes. Alpha is discarded; charts are expected to be opaque.
 *
 * @throws Error if the bytes are not a valid PNG
 */
export function decodePng(bytes: Buffer): PixelBuffer {
  const png = PNG.sync.read(bytes);
  return PixelBuffer.fromRgba(png.width, png.height, png.data);
}

/**
 * Read and decode a PNG file.
 */
export async function loadPng(path: string): Promise<PixelBuffer> {
  const bytes = await readFile(path);
  return decodePng(bytes);
}

/**
 * Encode a pixel buffer as an opaque PNG (used for fixtures and exports).
 */
export function encodePng(image: PixelBuffer): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      const color = image.get(x, y);
      const i = (y * image.width + x) * 4;
      png.data[i] = color.r;
      png.data[i + 1] = color.g;
      png.data[i + 2] = color.b;
      png.data[i + 3] = 255;
    }
  }
  return PNG.sync.write(png);
}
