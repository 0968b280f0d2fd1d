import { describe, it, expect } from "vitest";
import { normalizeRequest, orderEffects } from "./request.js";
import { InvalidInputError } from "./errors.js";
import { BUILT_IN_PALETTES, mergeCustomPalette } from "./palettes.js";

describe("orderEffects", () => {
  it("puts effects in pipeline order and drops duplicates", () => {
    expect(orderEffects(["blur", "shadow", "gradient", "shadow"])).toEqual([
      "gradient",
      "shadow",
      "blur",
    ]);
  });

  it("rejects unknown effects", () => {
    expect(() => orderEffects(["sparkle"])).toThrow(InvalidInputError);
  });
});

describe("normalizeRequest", () => {
  it("applies defaults", () => {
    const request = normalizeRequest({ text: "  Hello  " });
    expect(request).toEqual({
      text: "Hello",
      geometry: { width: 1200, height: 300 },
      palette: BUILT_IN_PALETTES.stealth,
      style: "wave",
      effects: [],
      animated: false,
    });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it("drops blank subtitles", () => {
    expect(normalizeRequest({ text: "Hi", subtitle: "   " }).subtitle).toBeUndefined();
    expect(normalizeRequest({ text: "Hi", subtitle: null }).subtitle).toBeUndefined();
    expect(normalizeRequest({ text: "Hi", subtitle: " Sub " }).subtitle).toBe("Sub");
  });

  it("applies a template with explicit overrides taking precedence", () => {
    const request = normalizeRequest({ text: "Hi", template: "professional", palette: "ocean" });
    expect(request.style).toBe("grid");
    expect(request.palette).toBe(BUILT_IN_PALETTES.ocean);
    expect(request.effects).toEqual(["shadow"]);
  });

  it("falls back to wave for unknown styles and stealth for unknown palettes", () => {
    const request = normalizeRequest({ text: "Hi", style: "zigzag", palette: "mystery" });
    expect(request.style).toBe("wave");
    expect(request.palette).toBe(BUILT_IN_PALETTES.stealth);
  });

  it("accepts a palette object", () => {
    const { palette } = mergeCustomPalette("x", "#000000", "#ff0000", "#ffffff", "#999999");
    expect(normalizeRequest({ text: "Hi", palette }).palette).toBe(palette);
  });

  it("resolves names against a custom registry", () => {
    const { palette } = mergeCustomPalette("x", "#000000", "#ff0000", "#ffffff", "#999999");
    const request = normalizeRequest(
      { text: "Hi", palette: "x" },
      { palettes: { ...BUILT_IN_PALETTES, x: palette } }
    );
    expect(request.palette).toBe(palette);
  });

  it("rejects empty text", () => {
    expect(() => normalizeRequest({ text: "   " })).toThrow(InvalidInputError);
  });

  it("rejects non-positive or fractional geometry", () => {
    expect(() => normalizeRequest({ text: "Hi", width: 0 })).toThrow(InvalidInputError);
    expect(() => normalizeRequest({ text: "Hi", height: -10 })).toThrow(InvalidInputError);
    expect(() => normalizeRequest({ text: "Hi", width: 10.5 })).toThrow(InvalidInputError);
  });

  it("rejects canvases above the maximum area", () => {
    expect(() => normalizeRequest({ text: "Hi", width: 100, height: 100 }, { maxArea: 9999 })).toThrow(
      "exceeds the maximum area"
    );
  });
});
