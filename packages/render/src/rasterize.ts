/**
 * Scanline polygon filling with anti-aliased coverage
 *
 * Used to paint outline glyphs. Contours follow the nonzero winding rule;
 * every pixel row is sampled on SUBSAMPLES horizontal lines and horizontal
 * coverage is exact, so edge pixels blend proportionally.
 */

import type { Frame, RGB } from "@banner-forge/core";
import { blendPixel } from "@banner-forge/core";

export interface Point {
  x: number;
  y: number;
}

export type Contour = Point[];

export type OutlineCommand =
  | { type: "M"; x: number; y: number }
  | { type: "L"; x: number; y: number }
  | { type: "C"; x1: number; y1: number; x2: number; y2: number; x: number; y: number }
  | { type: "Q"; x1: number; y1: number; x: number; y: number }
  | { type: "Z" };

const SUBSAMPLES = 4;

function segmentCount(...points: Point[]): number {
  let length = 0;
  for (let i = 1; i < points.length; i++) {
    length += Math.hypot(points[i].x - points[i - 1].x, points[i].y - points[i - 1].y);
  }
  return Math.min(64, Math.max(4, Math.ceil(length / 3)));
}

/**
 * Convert path commands to closed polylines
 */
export function flattenPath(commands: readonly OutlineCommand[]): Contour[] {
  const contours: Contour[] = [];
  let current: Contour = [];
  let pen: Point = { x: 0, y: 0 };

  const finish = () => {
    if (current.length > 2) contours.push(current);
    current = [];
  };

  for (const cmd of commands) {
    switch (cmd.type) {
      case "M":
        finish();
        pen = { x: cmd.x, y: cmd.y };
        current.push(pen);
        break;
      case "L":
        pen = { x: cmd.x, y: cmd.y };
        current.push(pen);
        break;
      case "Q": {
        const p0 = pen;
        const p1 = { x: cmd.x1, y: cmd.y1 };
        const p2 = { x: cmd.x, y: cmd.y };
        const n = segmentCount(p0, p1, p2);
        for (let i = 1; i <= n; i++) {
          const t = i / n;
          const mt = 1 - t;
          current.push({
            x: mt * mt * p0.x + 2 * mt * t * p1.x + t * t * p2.x,
            y: mt * mt * p0.y + 2 * mt * t * p1.y + t * t * p2.y,
          });
        }
        pen = p2;
        break;
      }
      case "C": {
        const p0 = pen;
        const p1 = { x: cmd.x1, y: cmd.y1 };
        const p2 = { x: cmd.x2, y: cmd.y2 };
        const p3 = { x: cmd.x, y: cmd.y };
        const n = segmentCount(p0, p1, p2, p3);
        for (let i = 1; i <= n; i++) {
          const t = i / n;
          const mt = 1 - t;
          current.push({
            x: mt * mt * mt * p0.x + 3 * mt * mt * t * p1.x + 3 * mt * t * t * p2.x + t * t * t * p3.x,
            y: mt * mt * mt * p0.y + 3 * mt * mt * t * p1.y + 3 * mt * t * t * p2.y + t * t * t * p3.y,
          });
        }
        pen = p3;
        break;
      }
      case "Z":
        finish();
        break;
    }
  }
  finish();
  return contours;
}

interface Crossing {
  x: number;
  winding: number;
}

/**
 * Fill contours onto a frame. `alpha` is 0-255 and scales the coverage.
 */
export function fillContours(frame: Frame, contours: readonly Contour[], color: RGB, alpha = 255): void {
  let minY = Infinity;
  let maxY = -Infinity;
  for (const contour of contours) {
    for (const p of contour) {
      minY = Math.min(minY, p.y);
      maxY = Math.max(maxY, p.y);
    }
  }
  if (!Number.isFinite(minY)) return;

  const rowStart = Math.max(0, Math.floor(minY));
  const rowEnd = Math.min(frame.height - 1, Math.ceil(maxY));
  const coverage = new Float32Array(frame.width);

  for (let py = rowStart; py <= rowEnd; py++) {
    coverage.fill(0);
    let touched = false;

    for (let s = 0; s < SUBSAMPLES; s++) {
      const sy = py + (s + 0.5) / SUBSAMPLES;
      const crossings: Crossing[] = [];

      for (const contour of contours) {
        for (let i = 0; i < contour.length; i++) {
          const a = contour[i];
          const b = contour[(i + 1) % contour.length];
          if (a.y === b.y) continue;
          const upward = a.y < b.y;
          const y0 = upward ? a.y : b.y;
          const y1 = upward ? b.y : a.y;
          if (sy < y0 || sy >= y1) continue;
          const t = (sy - a.y) / (b.y - a.y);
          crossings.push({ x: a.x + t * (b.x - a.x), winding: upward ? 1 : -1 });
        }
      }

      crossings.sort((p, q) => p.x - q.x);
      let winding = 0;
      for (let i = 0; i < crossings.length - 1; i++) {
        winding += crossings[i].winding;
        if (winding !== 0) {
          addSpan(coverage, crossings[i].x, crossings[i + 1].x, 1 / SUBSAMPLES);
          touched = true;
        }
      }
    }

    if (!touched) continue;
    for (let px = 0; px < frame.width; px++) {
      const c = coverage[px];
      if (c > 0) {
        blendPixel(frame, px, py, color, Math.round(alpha * Math.min(1, c)));
      }
    }
  }
}

function addSpan(coverage: Float32Array, xStart: number, xEnd: number, weight: number): void {
  const start = Math.max(0, xStart);
  const end = Math.min(coverage.length, xEnd);
  if (end <= start) return;

  const first = Math.floor(start);
  const last = Math.floor(end);
  if (first === last) {
    coverage[first] += (end - start) * weight;
    return;
  }
  coverage[first] += (first + 1 - start) * weight;
  for (let px = first + 1; px < last; px++) {
    coverage[px] += weight;
  }
  if (last < coverage.length) {
    coverage[last] += (end - last) * weight;
  }
}
