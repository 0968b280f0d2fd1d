import { describe, it, expect } from "vitest";
import { MissingCapabilityError } from "@banner-forge/core";
import { colorizeGlyph, createGlyphBackend, DEFAULT_GLYPH_FONT, stripAnsi } from "./glyph.js";

describe("createGlyphBackend", () => {
  const backend = createGlyphBackend();

  it("lists the bundled figlet fonts", () => {
    const fonts = backend.listFonts();
    expect(fonts).toContain(DEFAULT_GLYPH_FONT);
    expect(fonts).toContain("Slant");
  });

  it("renders multi-line art with the default font", () => {
    const art = backend.render("Hi");
    expect(art.split("\n").length).toBeGreaterThanOrEqual(5);
  });

  it("matches font names case-insensitively", () => {
    expect(backend.render("Hi", "standard")).toBe(backend.render("Hi", "Standard"));
  });

  it("raises MissingCapabilityError with a hint for an unknown font", () => {
    let caught: unknown;
    try {
      backend.render("Hi", "no-such-font");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MissingCapabilityError);
    if (!(caught instanceof MissingCapabilityError)) return;
    expect(caught.message).toBe('Glyph font "no-such-font" is not available');
    expect(caught.hint).toContain("--list-fonts");
  });
});

describe("stripAnsi", () => {
  it("removes color escapes", () => {
    expect(stripAnsi("\u001b[31mred\u001b[39m plain")).toBe("red plain");
  });
});

describe("colorizeGlyph", () => {
  it("keeps the characters of the art", () => {
    const art = "ab\ncd";
    expect(stripAnsi(colorizeGlyph(art, "#ff0000", "#0000ff"))).toBe(art);
  });
});
