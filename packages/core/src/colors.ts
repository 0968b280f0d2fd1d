/**
 * Hex color parsing and formatting
 */

import type { RGB } from "./types.js";
import { InvalidInputError } from "./errors.js";

const HEX_PATTERN = /^#?([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

export const BLACK: RGB = { r: 0, g: 0, b: 0 };

export function isHexColor(value: string): boolean {
  return HEX_PATTERN.test(value.trim());
}

/**
 * Parse "#rrggbb", "rrggbb" or "#rgb" into an RGB triple.
 * Throws InvalidInputError for anything else.
 */
export function parseHexColor(value: string): RGB {
  const match = HEX_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidInputError(`Invalid hex color: "${value}"`);
  }

  let hex = match[1];
  if (hex.length === 3) {
    hex = hex
      .split("")
      .map((c) => c + c)
      .join("");
  }

  const num = Number.parseInt(hex, 16);
  return {
    r: (num >> 16) & 0xff,
    g: (num >> 8) & 0xff,
    b: num & 0xff,
  };
}

/** Format as lowercase "#rrggbb" */
export function toHex(color: RGB): string {
  const channel = (v: number) => clampByte(v).toString(16).padStart(2, "0");
  return `#${channel(color.r)}${channel(color.g)}${channel(color.b)}`;
}

export function clampByte(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}
