/**
 * Separable Gaussian blur over an RGB frame
 */

import type { Frame } from "@banner-forge/core";
import { BYTES_PER_PIXEL } from "@banner-forge/core";

export const DEFAULT_BLUR_SIGMA = 1;

/**
 * Normalized 1-D kernel of radius ceil(3 * sigma)
 */
export function gaussianKernel(sigma: number): Float64Array {
  const radius = Math.max(1, Math.ceil(sigma * 3));
  const kernel = new Float64Array(radius * 2 + 1);
  let sum = 0;
  for (let i = -radius; i <= radius; i++) {
    const weight = Math.exp(-(i * i) / (2 * sigma * sigma));
    kernel[i + radius] = weight;
    sum += weight;
  }
  for (let i = 0; i < kernel.length; i++) {
    kernel[i] /= sum;
  }
  return kernel;
}

/**
 * Blur a frame; edges clamp to the nearest pixel. Returns a new frame.
 */
export function gaussianBlur(frame: Frame, sigma: number = DEFAULT_BLUR_SIGMA): Frame {
  const { width, height, pixels } = frame;
  const kernel = gaussianKernel(sigma);
  const radius = (kernel.length - 1) / 2;
  const horizontal = new Float64Array(pixels.length);
  const out = new Uint8Array(pixels.length);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      for (let c = 0; c < BYTES_PER_PIXEL; c++) {
        let acc = 0;
        for (let k = -radius; k <= radius; k++) {
          const sx = Math.min(width - 1, Math.max(0, x + k));
          acc += pixels[(y * width + sx) * BYTES_PER_PIXEL + c] * kernel[k + radius];
        }
        horizontal[(y * width + x) * BYTES_PER_PIXEL + c] = acc;
      }
    }
  }

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      for (let c = 0; c < BYTES_PER_PIXEL; c++) {
        let acc = 0;
        for (let k = -radius; k <= radius; k++) {
          const sy = Math.min(height - 1, Math.max(0, y + k));
          acc += horizontal[(sy * width + x) * BYTES_PER_PIXEL + c] * kernel[k + radius];
        }
        out[(y * width + x) * BYTES_PER_PIXEL + c] = Math.min(255, Math.max(0, Math.round(acc)));
      }
    }
  }

  return { width, height, pixels: out };
}
