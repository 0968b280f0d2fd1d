/**
 * Text drawing for the raster compositor
 *
 * A FontHandle measures and draws a single line of text at a fixed pixel
 * size. Two implementations exist: outline fonts loaded from a font file
 * (outline-font.ts) and the built-in 5x7 bitmap font below, which is always
 * available.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { Frame, RGB } from "@banner-forge/core";
import { fillRect } from "@banner-forge/core";

/** Ink bounds of a string relative to the draw origin (top-left) */
export interface TextBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface FontHandle {
  /** Font name, for logs */
  readonly name: string;
  /** Requested pixel size */
  readonly size: number;
  measure(text: string): TextBox;
  /** Draw with the origin (top-left of the line box) at (x, y). `alpha` is 0-255. */
  draw(frame: Frame, text: string, x: number, y: number, color: RGB, alpha?: number): void;
}

/** Returns a drawable font for a pixel size; never fails */
export type FontResolver = (size: number) => FontHandle;

export function textWidth(box: TextBox): number {
  return box.right - box.left;
}

export function textHeight(box: TextBox): number {
  return box.bottom - box.top;
}

const bitmapFontSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  fallback: z.string().length(1),
  glyphs: z.record(z.string(), z.array(z.number().int().min(0))),
});

type BitmapFontData = z.infer<typeof bitmapFontSchema>;

let bitmapData: BitmapFontData | null = null;

function loadBitmapData(): BitmapFontData {
  if (!bitmapData) {
    const raw = readFileSync(new URL("./fonts/bitmap-5x7.json", import.meta.url), "utf-8");
    bitmapData = bitmapFontSchema.parse(JSON.parse(raw));
  }
  return bitmapData;
}

/** Share of the pixel size the bitmap's cap height should fill */
const CAP_HEIGHT_RATIO = 0.72;

/**
 * Scale factor for a pixel size: each font pixel becomes a scale x scale block
 */
export function bitmapScale(size: number): number {
  const { height } = loadBitmapData();
  return Math.max(1, Math.round((size * CAP_HEIGHT_RATIO) / height));
}

/**
 * The built-in 5x7 bitmap font scaled to a pixel size.
 * Lowercase letters draw as uppercase; unknown characters draw as the fallback glyph.
 */
export function createBitmapFont(size: number): FontHandle {
  const data = loadBitmapData();
  const scale = bitmapScale(size);
  const advance = (data.width + 1) * scale;

  const glyphFor = (char: string): number[] =>
    data.glyphs[char] ?? data.glyphs[char.toUpperCase()] ?? data.glyphs[data.fallback] ?? [];

  return {
    name: "bitmap-5x7",
    size,

    measure(text: string): TextBox {
      const chars = Array.from(text).length;
      if (chars === 0) {
        return { left: 0, top: 0, right: 0, bottom: 0 };
      }
      return { left: 0, top: 0, right: chars * advance - scale, bottom: data.height * scale };
    },

    draw(frame: Frame, text: string, x: number, y: number, color: RGB, alpha = 255): void {
      let cursorX = Math.round(x);
      const top = Math.round(y);

      for (const char of text) {
        const glyph = glyphFor(char);
        for (let row = 0; row < data.height; row++) {
          const mask = glyph[row] ?? 0;
          for (let col = 0; col < data.width; col++) {
            const bit = (mask >> (data.width - 1 - col)) & 1;
            if (bit) {
              fillRect(frame, cursorX + col * scale, top + row * scale, scale, scale, color, alpha);
            }
          }
        }
        cursorX += advance;
      }
    },
  };
}
