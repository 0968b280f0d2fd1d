/**
 * Outline fonts loaded from TrueType/OpenType files
 */

import { readFileSync } from "node:fs";
import opentype from "opentype.js";
import type { Font, Glyph } from "opentype.js";
import type { Frame, RGB } from "@banner-forge/core";
import type { FontHandle, TextBox } from "./text.js";
import { fillContours, flattenPath, type Contour } from "./rasterize.js";

/**
 * Parse a font file. Throws when the file is missing or not a supported
 * format (collections such as .ttc are not).
 */
export function loadOutlineFont(path: string): Font {
  const bytes = readFileSync(path);
  const buffer = bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength);
  return opentype.parse(buffer);
}

/**
 * Lay out a line one glyph at a time with pair kerning. Substitution
 * features (ligatures, contextual forms) are not applied.
 */
function layoutContours(font: Font, text: string, x: number, baseline: number, size: number): Contour[] {
  const scale = size / font.unitsPerEm;
  // Fonts built in memory carry no kerning table
  const kerned = Boolean(font.kerningPairs);
  const contours: Contour[] = [];
  let cursor = x;
  let previous: Glyph | null = null;

  for (const char of text) {
    const glyph = font.charToGlyph(char);
    if (previous && kerned) {
      cursor += font.getKerningValue(previous, glyph) * scale;
    }
    contours.push(...flattenPath(glyph.getPath(cursor, baseline, size).commands));
    cursor += (glyph.advanceWidth ?? 0) * scale;
    previous = glyph;
  }
  return contours;
}

/**
 * Wrap a parsed font as a FontHandle at a pixel size. The draw origin is the
 * top of the line box; the baseline sits one ascender below it.
 */
export function createOutlineFont(font: Font, size: number, name: string): FontHandle {
  const ascent = (font.ascender / font.unitsPerEm) * size;

  return {
    name,
    size,

    measure(text: string): TextBox {
      let left = Infinity;
      let top = Infinity;
      let right = -Infinity;
      let bottom = -Infinity;
      for (const contour of layoutContours(font, text, 0, ascent, size)) {
        for (const p of contour) {
          left = Math.min(left, p.x);
          top = Math.min(top, p.y);
          right = Math.max(right, p.x);
          bottom = Math.max(bottom, p.y);
        }
      }
      if (!Number.isFinite(left)) {
        return { left: 0, top: 0, right: 0, bottom: 0 };
      }
      return { left, top, right, bottom };
    },

    draw(frame: Frame, text: string, x: number, y: number, color: RGB, alpha = 255): void {
      fillContours(frame, layoutContours(font, text, x, y + ascent, size), color, alpha);
    },
  };
}
