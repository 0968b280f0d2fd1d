import { describe, it, expect } from "vitest";
import { createSolidFrame, getPixel } from "@banner-forge/core";
import { bitmapScale, createBitmapFont, textHeight, textWidth } from "./text.js";

const WHITE = { r: 255, g: 255, b: 255 };
const BLACK = { r: 0, g: 0, b: 0 };

describe("bitmapScale", () => {
  it("never drops below 1", () => {
    expect(bitmapScale(1)).toBe(1);
    expect(bitmapScale(7)).toBe(1);
  });

  it("scales the cap height with the pixel size", () => {
    expect(bitmapScale(22)).toBe(2);
    expect(bitmapScale(66)).toBe(7);
  });
});

describe("createBitmapFont", () => {
  it("measures one advance per character minus the trailing gap", () => {
    const font = createBitmapFont(7);
    const box = font.measure("AB");
    expect(box).toEqual({ left: 0, top: 0, right: 11, bottom: 7 });
    expect(textWidth(box)).toBe(11);
    expect(textHeight(box)).toBe(7);
  });

  it("measures empty text as an empty box", () => {
    expect(createBitmapFont(7).measure("")).toEqual({ left: 0, top: 0, right: 0, bottom: 0 });
  });

  it("draws glyph rows from the bitmap masks", () => {
    const frame = createSolidFrame(5, 7, BLACK);
    createBitmapFont(7).draw(frame, "T", 0, 0, WHITE);

    for (let x = 0; x < 5; x++) {
      expect(getPixel(frame, x, 0)).toEqual(WHITE);
    }
    expect(getPixel(frame, 2, 1)).toEqual(WHITE);
    expect(getPixel(frame, 0, 1)).toEqual(BLACK);
    expect(getPixel(frame, 4, 6)).toEqual(BLACK);
  });

  it("draws lowercase letters as uppercase", () => {
    const upper = createSolidFrame(6, 7, BLACK);
    const lower = createSolidFrame(6, 7, BLACK);
    const font = createBitmapFont(7);
    font.draw(upper, "T", 0, 0, WHITE);
    font.draw(lower, "t", 0, 0, WHITE);
    expect(lower.pixels).toEqual(upper.pixels);
  });

  it("draws unknown characters as the fallback glyph", () => {
    const frame = createSolidFrame(5, 7, BLACK);
    createBitmapFont(7).draw(frame, "~", 0, 0, WHITE);
    expect(getPixel(frame, 0, 0)).toEqual(BLACK);
    expect(getPixel(frame, 1, 0)).toEqual(WHITE);
    expect(getPixel(frame, 3, 0)).toEqual(WHITE);
    expect(getPixel(frame, 2, 6)).toEqual(WHITE);
  });

  it("scales each font pixel into a block", () => {
    const frame = createSolidFrame(10, 14, BLACK);
    const font = createBitmapFont(22);
    font.draw(frame, "I", 0, 0, WHITE);
    // Top row of I is 01110
    expect(getPixel(frame, 1, 0)).toEqual(BLACK);
    expect(getPixel(frame, 2, 0)).toEqual(WHITE);
    expect(getPixel(frame, 3, 1)).toEqual(WHITE);
    // Stem is the middle column
    expect(getPixel(frame, 4, 4)).toEqual(WHITE);
    expect(getPixel(frame, 2, 4)).toEqual(BLACK);
  });
});
