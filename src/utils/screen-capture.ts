import { PNG } from 'pngjs';
import type { ScreenCapture } from '@/types/recognizer';
import { createInvalidImageError } from '@/utils/error-handling';

const BYTES_PER_PIXEL = 4;

export function validateScreenCapture(capture: ScreenCapture): void {
  const { width, height, left, top, pixels } = capture;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw createInvalidImageError(`Invalid capture size ${width}x${height}.`);
  }
  if (!Number.isInteger(left) || !Number.isInteger(top)) {
    throw createInvalidImageError(`Invalid capture origin (${left}, ${top}).`);
  }

  const expected = width * height * BYTES_PER_PIXEL;
  if (pixels.length < expected) {
    throw createInvalidImageError(`Expected at least ${expected} bytes of pixels, got ${pixels.length}.`);
  }
}

/**
 * Encodes BGRA screen pixels as an opaque RGBA PNG.
 */
export function captureToPng(capture: ScreenCapture): Buffer {
  validateScreenCapture(capture);

  const { width, height, pixels } = capture;
  const png = new PNG({ width, height });

  for (let i = 0; i < width * height * BYTES_PER_PIXEL; i += BYTES_PER_PIXEL) {
    png.data[i] = pixels[i + 2];
    png.data[i + 1] = pixels[i + 1];
    png.data[i + 2] = pixels[i];
    png.data[i + 3] = 255;
  }

  return PNG.sync.write(png);
}
