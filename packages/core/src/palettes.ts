/**
 * Palette registry
 *
 * The built-in table is frozen at load. Custom palettes never touch it:
 * `withCustomPalettes` returns a fresh registry.
 */

import type { NamedPalette, Palette, PaletteRegistry } from "./types.js";
import { parseHexColor, toHex } from "./colors.js";

export const DEFAULT_PALETTE_NAME = "stealth";

/** Hex form of a palette, as shown to users and persisted to disk */
export interface PaletteHex {
  bg: string;
  accent: string;
  text: string;
  muted: string;
  gradient_start: string;
  gradient_end: string;
}

const BUILT_IN_HEX: Record<string, PaletteHex> = {
  stealth: {
    bg: "#0a0f14",
    accent: "#00ffff",
    text: "#ffffff",
    muted: "#9aa4ad",
    gradient_start: "#00ffff",
    gradient_end: "#0088ff",
  },
  ember: {
    bg: "#0f0a07",
    accent: "#ff8a3b",
    text: "#f5e9e3",
    muted: "#c9b5a3",
    gradient_start: "#ff8a3b",
    gradient_end: "#ff4d4d",
  },
  forest: {
    bg: "#0d1b0e",
    accent: "#4ade80",
    text: "#e8f5e9",
    muted: "#81c784",
    gradient_start: "#4ade80",
    gradient_end: "#22c55e",
  },
  ocean: {
    bg: "#0a1628",
    accent: "#38bdf8",
    text: "#e0f2fe",
    muted: "#7dd3fc",
    gradient_start: "#38bdf8",
    gradient_end: "#0ea5e9",
  },
  sunset: {
    bg: "#1a0f1e",
    accent: "#f472b6",
    text: "#fce7f3",
    muted: "#f9a8d4",
    gradient_start: "#f472b6",
    gradient_end: "#ec4899",
  },
  neon: {
    bg: "#000000",
    accent: "#00ff41",
    text: "#00ff41",
    muted: "#39ff14",
    gradient_start: "#00ff41",
    gradient_end: "#39ff14",
  },
  royal: {
    bg: "#1e1b4b",
    accent: "#fbbf24",
    text: "#fef3c7",
    muted: "#fcd34d",
    gradient_start: "#fbbf24",
    gradient_end: "#f59e0b",
  },
  cyberpunk: {
    bg: "#0d0221",
    accent: "#ff006e",
    text: "#f72585",
    muted: "#b5179e",
    gradient_start: "#ff006e",
    gradient_end: "#8338ec",
  },
  matrix: {
    bg: "#000000",
    accent: "#00ff00",
    text: "#00ff00",
    muted: "#008f00",
    gradient_start: "#00ff00",
    gradient_end: "#00aa00",
  },
};

/**
 * Build a palette from its hex form. Throws InvalidInputError on a malformed color.
 */
export function paletteFromHex(hex: PaletteHex): Palette {
  return freezePalette({
    background: parseHexColor(hex.bg),
    accent: parseHexColor(hex.accent),
    text: parseHexColor(hex.text),
    muted: parseHexColor(hex.muted),
    gradientStart: parseHexColor(hex.gradient_start),
    gradientEnd: parseHexColor(hex.gradient_end),
  });
}

export function paletteToHex(palette: Palette): PaletteHex {
  return {
    bg: toHex(palette.background),
    accent: toHex(palette.accent),
    text: toHex(palette.text),
    muted: toHex(palette.muted),
    gradient_start: toHex(palette.gradientStart),
    gradient_end: toHex(palette.gradientEnd),
  };
}

function freezePalette(palette: Palette): Palette {
  for (const color of Object.values(palette)) {
    Object.freeze(color);
  }
  return Object.freeze(palette);
}

export const BUILT_IN_PALETTES: PaletteRegistry = Object.freeze(
  Object.fromEntries(
    Object.entries(BUILT_IN_HEX).map(([name, hex]) => [name, paletteFromHex(hex)])
  )
);

export function listPaletteNames(registry: PaletteRegistry = BUILT_IN_PALETTES): string[] {
  return Object.keys(registry);
}

export function isKnownPalette(name: string, registry: PaletteRegistry = BUILT_IN_PALETTES): boolean {
  return Object.prototype.hasOwnProperty.call(registry, name);
}

/**
 * Look up a palette by name. Unknown names resolve to the default palette.
 */
export function resolvePalette(
  name: string | undefined,
  registry: PaletteRegistry = BUILT_IN_PALETTES
): Palette {
  if (name !== undefined && isKnownPalette(name, registry)) {
    return registry[name];
  }
  return BUILT_IN_PALETTES[DEFAULT_PALETTE_NAME];
}

/**
 * Build a user palette. The gradient is a single color: both ends are the accent.
 */
export function mergeCustomPalette(
  name: string,
  bg: string,
  accent: string,
  text: string,
  muted: string
): NamedPalette {
  return {
    name,
    palette: paletteFromHex({
      bg,
      accent,
      text,
      muted,
      gradient_start: accent,
      gradient_end: accent,
    }),
  };
}

/**
 * Copy-on-write merge: additions override entries of the same name.
 */
export function withCustomPalettes(
  base: PaletteRegistry,
  additions: Readonly<Record<string, Palette>>
): PaletteRegistry {
  return Object.freeze({ ...base, ...additions });
}
