import { PNG } from 'pngjs';
import type { FrameBuffer } from './EmulatorCore.js';

/**
 * Encode an RGBA frame buffer as PNG using the pngjs library.
 * Alpha is forced opaque; some cores leave it at 0.
 */
export function encodeFramePng(frame: FrameBuffer): Buffer {
  const { width, height, rgba } = frame;
  const expected = width * height * 4;
  if (rgba.length < expected) {
    throw new Error(`Frame buffer holds ${rgba.length} bytes, expected ${expected} for ${width}x${height}`);
  }

  const png = new PNG({ width, height });
  for (let i = 0; i < expected; i += 4) {
    png.data[i + 0] = rgba[i + 0]; // R
    png.data[i + 1] = rgba[i + 1]; // G
    png.data[i + 2] = rgba[i + 2]; // B
    png.data[i + 3] = 255;          // A
  }

  return PNG.sync.write(png);
}
