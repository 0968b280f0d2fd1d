import { describe, it, expect } from "vitest";
import {
  BUILT_IN_PALETTES,
  DEFAULT_PALETTE_NAME,
  listPaletteNames,
  mergeCustomPalette,
  paletteToHex,
  resolvePalette,
  withCustomPalettes,
} from "./palettes.js";
import { InvalidInputError } from "./errors.js";
import type { RGB } from "./types.js";

function isByteTriple(color: RGB): boolean {
  return [color.r, color.g, color.b].every((v) => Number.isInteger(v) && v >= 0 && v <= 255);
}

describe("resolvePalette", () => {
  it("returns six well-formed colors for every built-in palette", () => {
    for (const name of listPaletteNames()) {
      const palette = resolvePalette(name);
      const colors = Object.values(palette);
      expect(colors).toHaveLength(6);
      expect(colors.every(isByteTriple)).toBe(true);
    }
  });

  it("returns the default palette for unknown names", () => {
    const fallback = BUILT_IN_PALETTES[DEFAULT_PALETTE_NAME];
    expect(resolvePalette("no-such-palette")).toBe(fallback);
    expect(resolvePalette("")).toBe(fallback);
    expect(resolvePalette(undefined)).toBe(fallback);
  });

  it("does not treat inherited object keys as palette names", () => {
    expect(resolvePalette("toString")).toBe(BUILT_IN_PALETTES.stealth);
  });

  it("parses the stealth colors", () => {
    expect(paletteToHex(resolvePalette("stealth"))).toEqual({
      bg: "#0a0f14",
      accent: "#00ffff",
      text: "#ffffff",
      muted: "#9aa4ad",
      gradient_start: "#00ffff",
      gradient_end: "#0088ff",
    });
  });

  it("ships nine palettes", () => {
    expect(listPaletteNames()).toEqual([
      "stealth",
      "ember",
      "forest",
      "ocean",
      "sunset",
      "neon",
      "royal",
      "cyberpunk",
      "matrix",
    ]);
  });

  it("keeps the built-in table frozen", () => {
    expect(Object.isFrozen(BUILT_IN_PALETTES)).toBe(true);
    expect(Object.isFrozen(BUILT_IN_PALETTES.ocean)).toBe(true);
    expect(Object.isFrozen(BUILT_IN_PALETTES.ocean.accent)).toBe(true);
  });
});

describe("mergeCustomPalette", () => {
  it("uses the accent for both gradient ends", () => {
    const { name, palette } = mergeCustomPalette("brand", "#101010", "#ff0000", "#fafafa", "#888888");
    expect(name).toBe("brand");
    expect(palette.gradientStart).toEqual({ r: 255, g: 0, b: 0 });
    expect(palette.gradientEnd).toEqual({ r: 255, g: 0, b: 0 });
    expect(palette.background).toEqual({ r: 16, g: 16, b: 16 });
  });

  it("rejects malformed colors", () => {
    expect(() => mergeCustomPalette("bad", "not-a-color", "#ff0000", "#fff", "#888")).toThrow(
      InvalidInputError
    );
  });
});

describe("withCustomPalettes", () => {
  it("adds palettes without mutating the base registry", () => {
    const custom = mergeCustomPalette("brand", "#101010", "#ff0000", "#fafafa", "#888888");
    const registry = withCustomPalettes(BUILT_IN_PALETTES, { [custom.name]: custom.palette });

    expect(resolvePalette("brand", registry)).toBe(custom.palette);
    expect(resolvePalette("brand")).toBe(BUILT_IN_PALETTES.stealth);
    expect(Object.keys(BUILT_IN_PALETTES)).not.toContain("brand");
  });

  it("overwrites entries with the same name", () => {
    const custom = mergeCustomPalette("ocean", "#000000", "#123456", "#ffffff", "#777777");
    const registry = withCustomPalettes(BUILT_IN_PALETTES, { ocean: custom.palette });
    expect(resolvePalette("ocean", registry).accent).toEqual({ r: 0x12, g: 0x34, b: 0x56 });
    expect(BUILT_IN_PALETTES.ocean.accent).toEqual({ r: 0x38, g: 0xbd, b: 0xf8 });
  });
});
