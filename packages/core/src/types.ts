/**
 * Core types for banner rendering
 */

/** Canvas dimensions in pixels (raster) or user units (vector) */
export interface CanvasGeometry {
  width: number;
  height: number;
}

/** RGB color (0-255 per channel) */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** A raster canvas */
export interface Frame {
  width: number;
  height: number;
  /** Flat array of RGB values: [r0,g0,b0, r1,g1,b1, ...] */
  pixels: Uint8Array;
}

/** The six color roles every render path draws with */
export interface Palette {
  background: RGB;
  accent: RGB;
  text: RGB;
  muted: RGB;
  gradientStart: RGB;
  gradientEnd: RGB;
}

export interface NamedPalette {
  name: string;
  palette: Palette;
}

export type PaletteRegistry = Readonly<Record<string, Palette>>;

export const STYLES = ["wave", "geometric", "grid", "particles", "glow"] as const;
export type Style = (typeof STYLES)[number];

/** Effects in the order the raster pipeline applies them */
export const EFFECTS = ["gradient", "shadow", "glow", "stripe", "blur"] as const;
export type Effect = (typeof EFFECTS)[number];

export interface Template {
  readonly style: Style;
  readonly palette: string;
  readonly effects: readonly Effect[];
}

/** Fully resolved input shared by the vector and raster pipelines */
export interface RenderRequest {
  readonly text: string;
  readonly subtitle?: string;
  readonly geometry: Readonly<CanvasGeometry>;
  readonly palette: Readonly<Palette>;
  readonly style: Style;
  /** Deduplicated, in pipeline order */
  readonly effects: readonly Effect[];
  readonly animated: boolean;
}

/** Output forms a request can be dispatched to */
export type OutputFormat = "vector" | "raster" | "glyph";
