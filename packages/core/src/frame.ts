/**
 * Raster frame primitives
 *
 * Frame format:
 * - packed RGB, 3 bytes per pixel, row-major
 * - always opaque; translucent draws are blended source-over into it
 */

import type { Frame, RGB } from "./types.js";
import { BLACK } from "./colors.js";

/** Bytes per pixel (RGB) */
export const BYTES_PER_PIXEL = 3;

/**
 * Create a frame filled with a single color
 */
export function createSolidFrame(width: number, height: number, color: RGB = BLACK): Frame {
  const pixels = new Uint8Array(width * height * BYTES_PER_PIXEL);
  for (let i = 0; i < width * height; i++) {
    const offset = i * BYTES_PER_PIXEL;
    pixels[offset] = color.r;
    pixels[offset + 1] = color.g;
    pixels[offset + 2] = color.b;
  }
  return { width, height, pixels };
}

/**
 * Set a single pixel in a frame
 */
export function setPixel(frame: Frame, x: number, y: number, color: RGB): void {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return; // Out of bounds, silently ignore
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  frame.pixels[offset] = color.r;
  frame.pixels[offset + 1] = color.g;
  frame.pixels[offset + 2] = color.b;
}

/**
 * Get a pixel color from a frame
 */
export function getPixel(frame: Frame, x: number, y: number): RGB | null {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height) {
    return null;
  }
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  return {
    r: frame.pixels[offset],
    g: frame.pixels[offset + 1],
    b: frame.pixels[offset + 2],
  };
}

/**
 * Blend a color over a pixel. `alpha` is 0-255.
 */
export function blendPixel(frame: Frame, x: number, y: number, color: RGB, alpha: number): void {
  if (x < 0 || x >= frame.width || y < 0 || y >= frame.height || alpha <= 0) {
    return;
  }
  if (alpha >= 255) {
    setPixel(frame, x, y, color);
    return;
  }
  const a = alpha / 255;
  const offset = (y * frame.width + x) * BYTES_PER_PIXEL;
  const px = frame.pixels;
  px[offset] = Math.round(color.r * a + px[offset] * (1 - a));
  px[offset + 1] = Math.round(color.g * a + px[offset + 1] * (1 - a));
  px[offset + 2] = Math.round(color.b * a + px[offset + 2] * (1 - a));
}

/**
 * Fill the pixels whose top-left corner lies in [x, x+w) x [y, y+h)
 */
export function fillRect(
  frame: Frame,
  x: number,
  y: number,
  w: number,
  h: number,
  color: RGB,
  alpha: number = 255
): void {
  const x0 = Math.max(0, Math.round(x));
  const y0 = Math.max(0, Math.round(y));
  const x1 = Math.min(frame.width, Math.round(x + w));
  const y1 = Math.min(frame.height, Math.round(y + h));

  for (let py = y0; py < y1; py++) {
    for (let px = x0; px < x1; px++) {
      blendPixel(frame, px, py, color, alpha);
    }
  }
}
