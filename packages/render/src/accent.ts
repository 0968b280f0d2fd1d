/**
 * Accent generator - decorative background geometry per style
 *
 * Each style yields a finite sequence of shapes scaled to the canvas. The
 * returned iterable is lazy and restartable: every iteration runs the
 * generator again from the start.
 */

import type { RGB, Style } from "@banner-forge/core";
import { createSeededRandom } from "./random.js";

export type PathCommand =
  | { op: "M"; x: number; y: number }
  | { op: "C"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { op: "L"; x: number; y: number }
  | { op: "Z" };

export type AccentShape =
  | { kind: "path"; commands: PathCommand[]; fill: RGB; opacity: number }
  | { kind: "circle"; cx: number; cy: number; r: number; fill: RGB; opacity: number }
  | {
      kind: "rect";
      x: number;
      y: number;
      width: number;
      height: number;
      fill: RGB;
      opacity: number;
      /** Degrees, about (cx, cy) */
      rotation?: { angle: number; cx: number; cy: number };
    }
  | { kind: "line"; x1: number; y1: number; x2: number; y2: number; stroke: RGB; opacity: number };

type AccentStyle = "wave" | "geometric" | "grid" | "particles";

export const DEFAULT_ACCENT_OPACITY: Record<AccentStyle, number> = {
  wave: 0.12,
  geometric: 0.1,
  grid: 0.05,
  particles: 0.08,
};

export const GRID_SPACING = 50;
export const PARTICLE_COUNT = 30;
export const PARTICLE_SEED = 42;

function* waveShapes(width: number, height: number, color: RGB, opacity: number): Generator<AccentShape> {
  yield {
    kind: "path",
    commands: [
      { op: "M", x: 0, y: height * 0.65 },
      {
        op: "C",
        x1: width * 0.25,
        y1: height * 0.4,
        x2: width * 0.75,
        y2: height * 0.9,
        x: width,
        y: height * 0.6,
      },
      { op: "L", x: width, y: height },
      { op: "L", x: 0, y: height },
      { op: "Z" },
    ],
    fill: color,
    opacity,
  };
}

function* geometricShapes(width: number, height: number, color: RGB, opacity: number): Generator<AccentShape> {
  yield {
    kind: "circle",
    cx: width * 0.15,
    cy: height * 0.2,
    r: height * 0.15,
    fill: color,
    opacity,
  };
  yield {
    kind: "circle",
    cx: width * 0.85,
    cy: height * 0.8,
    r: height * 0.2,
    fill: color,
    opacity: opacity * 0.7,
  };
  yield {
    kind: "rect",
    x: width * 0.7,
    y: height * 0.1,
    width: width * 0.2,
    height: height * 0.15,
    fill: color,
    opacity: opacity * 0.5,
    rotation: { angle: 15, cx: width * 0.8, cy: height * 0.175 },
  };
}

function* gridShapes(width: number, height: number, color: RGB, opacity: number): Generator<AccentShape> {
  for (let x = 0; x < width; x += GRID_SPACING) {
    yield { kind: "line", x1: x, y1: 0, x2: x, y2: height, stroke: color, opacity };
  }
  for (let y = 0; y < height; y += GRID_SPACING) {
    yield { kind: "line", x1: 0, y1: y, x2: width, y2: y, stroke: color, opacity };
  }
}

function* particleShapes(width: number, height: number, color: RGB, opacity: number): Generator<AccentShape> {
  // Fresh generator per iteration so output never depends on call order
  const rng = createSeededRandom(PARTICLE_SEED);
  for (let i = 0; i < PARTICLE_COUNT; i++) {
    const cx = rng.randint(0, width);
    const cy = rng.randint(0, height);
    const r = rng.randint(2, 8);
    yield { kind: "circle", cx, cy, r, fill: color, opacity };
  }
}

const GENERATORS: Record<
  AccentStyle,
  (width: number, height: number, color: RGB, opacity: number) => Iterator<AccentShape>
> = {
  wave: waveShapes,
  geometric: geometricShapes,
  grid: gridShapes,
  particles: particleShapes,
};

function toAccentStyle(style: Style | string): AccentStyle {
  return style === "geometric" || style === "grid" || style === "particles" ? style : "wave";
}

/**
 * Generate the accent shapes for a style. Unknown styles (and "glow") use the wave.
 */
export function generateAccent(
  style: Style | string,
  width: number,
  height: number,
  color: RGB,
  opacity?: number
): Iterable<AccentShape> {
  const accentStyle = toAccentStyle(style);
  const generate = GENERATORS[accentStyle];
  const effectiveOpacity = opacity ?? DEFAULT_ACCENT_OPACITY[accentStyle];
  return {
    [Symbol.iterator]: () => generate(width, height, color, effectiveOpacity),
  };
}
