/**
 * Request normalization
 *
 * Turns loose caller options into the immutable RenderRequest both composers
 * consume. Everything that can fail for a single request fails here, before
 * any rendering starts.
 */

import type { Effect, Palette, PaletteRegistry, RenderRequest, Style } from "./types.js";
import { EFFECTS, STYLES } from "./types.js";
import { InvalidInputError } from "./errors.js";
import { BUILT_IN_PALETTES, resolvePalette } from "./palettes.js";
import { DEFAULT_STYLE, resolveTemplate } from "./templates.js";

export const DEFAULT_WIDTH = 1200;
export const DEFAULT_HEIGHT = 300;

/** Upper bound on width * height */
export const DEFAULT_MAX_AREA = 40_000_000;

export interface RenderOptions {
  text: string;
  subtitle?: string | null;
  width?: number;
  height?: number;
  /** Palette name, or an already-built palette */
  palette?: string | Palette;
  /** Unknown styles fall back to "wave" */
  style?: string;
  effects?: readonly string[];
  animated?: boolean;
  template?: string;
}

export interface NormalizeOptions {
  maxArea?: number;
  palettes?: PaletteRegistry;
}

export function isStyle(value: string): value is Style {
  return (STYLES as readonly string[]).includes(value);
}

export function isEffect(value: string): value is Effect {
  return (EFFECTS as readonly string[]).includes(value);
}

/**
 * Deduplicate effects and put them in pipeline order.
 * Throws InvalidInputError on an unknown effect name.
 */
export function orderEffects(effects: readonly string[]): Effect[] {
  const requested = new Set<Effect>();
  for (const name of effects) {
    if (!isEffect(name)) {
      throw new InvalidInputError(
        `Unknown effect "${name}" (expected one of: ${EFFECTS.join(", ")})`
      );
    }
    requested.add(name);
  }
  return EFFECTS.filter((effect) => requested.has(effect));
}

function validateDimension(label: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidInputError(`${label} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Build a RenderRequest from caller options.
 */
export function normalizeRequest(options: RenderOptions, config: NormalizeOptions = {}): RenderRequest {
  const { maxArea = DEFAULT_MAX_AREA, palettes = BUILT_IN_PALETTES } = config;

  const text = typeof options.text === "string" ? options.text.trim() : "";
  if (text.length === 0) {
    throw new InvalidInputError("Banner text must not be empty");
  }

  const width = validateDimension("width", options.width ?? DEFAULT_WIDTH);
  const height = validateDimension("height", options.height ?? DEFAULT_HEIGHT);
  if (width * height > maxArea) {
    throw new InvalidInputError(
      `Canvas ${width}x${height} exceeds the maximum area of ${maxArea} pixels`
    );
  }

  const explicitStyle =
    options.style === undefined ? undefined : isStyle(options.style) ? options.style : DEFAULT_STYLE;
  const explicitPaletteName = typeof options.palette === "string" ? options.palette : undefined;

  const resolved = resolveTemplate(options.template, {
    style: explicitStyle,
    palette: explicitPaletteName,
    effects: options.effects === undefined ? undefined : orderEffects(options.effects),
  });

  const palette =
    options.palette !== undefined && typeof options.palette !== "string"
      ? options.palette
      : resolvePalette(resolved.palette, palettes);

  const subtitle = options.subtitle?.trim();

  return Object.freeze({
    text,
    ...(subtitle ? { subtitle } : {}),
    geometry: Object.freeze({ width, height }),
    palette,
    style: resolved.style,
    effects: Object.freeze(orderEffects(resolved.effects)),
    animated: options.animated ?? false,
  });
}
