/**
 * Glyph-art backend: monospace text banners drawn with figlet fonts
 */

import figlet from "figlet";
import gradient from "gradient-string";
import { stripVTControlCharacters } from "node:util";
import { MissingCapabilityError } from "@banner-forge/core";

export const DEFAULT_GLYPH_FONT = "Standard";

/** Fonts shown by `info`, when installed */
export const SAMPLE_GLYPH_FONTS: readonly string[] = ["Standard", "Slant", "Banner", "Big", "Digital", "Block"];

type FigletOptions = Exclude<NonNullable<Parameters<typeof figlet.textSync>[1]>, string>;
type FigletFont = NonNullable<FigletOptions["font"]>;

/** Capability interface for the glyph output path */
export interface GlyphBackend {
  /** Throws MissingCapabilityError for a font figlet does not ship */
  render(text: string, font?: string): string;
  listFonts(): string[];
}

function isFigletFont(name: string, available: readonly string[]): name is FigletFont {
  return available.includes(name);
}

export function createGlyphBackend(): GlyphBackend {
  let fonts: string[] | null = null;
  const listFonts = (): string[] => {
    fonts ??= figlet.fontsSync().slice().sort((a, b) => a.localeCompare(b));
    return fonts;
  };

  return {
    listFonts,

    render(text: string, font: string = DEFAULT_GLYPH_FONT): string {
      const available = listFonts();
      // Font names are matched case-insensitively ("standard" → "Standard")
      const name = available.find((candidate) => candidate.toLowerCase() === font.toLowerCase()) ?? font;
      if (!isFigletFont(name, available)) {
        throw new MissingCapabilityError(
          `Glyph font "${font}" is not available`,
          "Run `banner-forge ascii --list-fonts` to see installed fonts"
        );
      }
      return figlet.textSync(text, { font: name });
    },
  };
}

/**
 * Color glyph art with a left-to-right ANSI gradient on every line.
 * Colors are hex strings or CSS color names.
 */
export function colorizeGlyph(art: string, from: string, to: string = from): string {
  return gradient([from, to]).multiline(art);
}

/** Remove ANSI styling, e.g. before writing art to a file */
export function stripAnsi(text: string): string {
  return stripVTControlCharacters(text);
}
