/**
 * Font resolution for raster text
 *
 * Order: explicit font file → platform font paths → built-in bitmap font.
 * The first font file that parses and lays out text is kept for the
 * resolver's lifetime.
 */

import type { Font } from "opentype.js";
import { createBitmapFont, type FontResolver } from "./text.js";
import { createOutlineFont, loadOutlineFont } from "./outline-font.js";

export const PLATFORM_FONT_PATHS: readonly string[] = [
  "/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf",
  "/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf",
  "/System/Library/Fonts/Helvetica.ttc",
  "C:\\Windows\\Fonts\\arialbd.ttf",
  "/usr/share/fonts/TTF/DejaVuSans-Bold.ttf",
];

export interface FontResolverOptions {
  /** Tried first; a failure here is logged, then the platform list is tried */
  fontPath?: string;
  /** Defaults to PLATFORM_FONT_PATHS; pass [] to always use the bitmap font */
  candidates?: readonly string[];
  /** Font file loader, replaceable in tests */
  load?: (path: string) => Font;
}

// A font that loads but cannot lay out this text is skipped
const LAYOUT_CHECK_TEXT = "Ag";
const LAYOUT_CHECK_SIZE = 32;

interface LoadedFont {
  font: Font;
  path: string;
}

export function createFontResolver(options: FontResolverOptions = {}): FontResolver {
  const { fontPath, candidates = PLATFORM_FONT_PATHS, load = loadOutlineFont } = options;
  let resolved: LoadedFont | null | undefined;

  const tryLoad = (path: string, explicit: boolean): LoadedFont | null => {
    try {
      const font = load(path);
      createOutlineFont(font, LAYOUT_CHECK_SIZE, path).measure(LAYOUT_CHECK_TEXT);
      return { font, path };
    } catch (error) {
      if (explicit) {
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(`[fonts] Could not load font ${path}: ${reason}. Trying platform fonts.`);
      }
      return null;
    }
  };

  const findFont = (): LoadedFont | null => {
    if (fontPath) {
      const loaded = tryLoad(fontPath, true);
      if (loaded) return loaded;
    }
    for (const candidate of candidates) {
      const loaded = tryLoad(candidate, false);
      if (loaded) return loaded;
    }
    return null;
  };

  return (size: number) => {
    if (resolved === undefined) {
      resolved = findFont();
    }
    if (!resolved) {
      return createBitmapFont(size);
    }
    return createOutlineFont(resolved.font, size, resolved.path);
  };
}
