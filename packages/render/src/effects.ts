/**
 * Raster effect pipeline
 *
 * Stages run in a fixed order regardless of the order effects were requested
 * in. A stage bound to an effect is skipped entirely when that effect was not
 * requested; unbound stages always run.
 *
 *   background → gradient → shadow → glow → title → subtitle → stripe → blur
 */

import type { Effect, Frame, RenderRequest, RGB } from "@banner-forge/core";
import { BLACK, createSolidFrame, fillRect } from "@banner-forge/core";
import { gaussianBlur } from "./blur.js";
import { textHeight, textWidth, type FontHandle, type FontResolver } from "./text.js";

export const SHADOW_OFFSET = 4;
export const SHADOW_ALPHA = 128;
export const GLOW_OFFSETS: readonly number[] = [3, 2, 1];
export const GLOW_ALPHA = 80;
export const STRIPE_ALPHA = 68;
/** Gradient wash alpha at the top row; fades to 0 at the bottom */
export const GRADIENT_MAX_ALPHA = 50;

export interface TextPlacement {
  font: FontHandle;
  text: string;
  x: number;
  y: number;
}

export interface RasterContext {
  request: RenderRequest;
  title: TextPlacement;
  subtitle: TextPlacement | null;
}

export type StageName =
  | "background"
  | "gradient"
  | "shadow"
  | "glow"
  | "title"
  | "subtitle"
  | "stripe"
  | "blur";

export interface RasterStage {
  name: StageName;
  /** Present when the stage only runs for a requested effect */
  effect?: Effect;
  apply(frame: Frame, ctx: RasterContext): Frame;
}

function drawText(frame: Frame, placement: TextPlacement, dx: number, dy: number, color: RGB, alpha = 255): void {
  placement.font.draw(frame, placement.text, placement.x + dx, placement.y + dy, color, alpha);
}

/**
 * Place text so its ink box is horizontally centred and vertically centred on `anchorY`
 */
export function centerText(font: FontHandle, text: string, width: number, anchorY: number): TextPlacement {
  const box = font.measure(text);
  return {
    font,
    text,
    x: (width - textWidth(box)) / 2 - box.left,
    y: anchorY - textHeight(box) / 2 - box.top,
  };
}

/**
 * Measure and place the title and subtitle for a request
 */
export function layoutText(request: RenderRequest, resolveFont: FontResolver): Pick<RasterContext, "title" | "subtitle"> {
  const { width, height } = request.geometry;
  const title = centerText(resolveFont(Math.floor(height * 0.22)), request.text, width, height * 0.35);
  const subtitle = request.subtitle
    ? centerText(resolveFont(Math.floor(height * 0.07)), request.subtitle, width, height * 0.75)
    : null;
  return { title, subtitle };
}

export const RASTER_STAGES: readonly RasterStage[] = [
  {
    name: "background",
    apply: (_frame, { request }) =>
      createSolidFrame(request.geometry.width, request.geometry.height, request.palette.background),
  },
  {
    name: "gradient",
    effect: "gradient",
    apply: (frame, { request }) => {
      for (let y = 0; y < frame.height; y++) {
        const alpha = Math.floor(GRADIENT_MAX_ALPHA * (1 - y / frame.height));
        fillRect(frame, 0, y, frame.width, 1, request.palette.accent, alpha);
      }
      return frame;
    },
  },
  {
    name: "shadow",
    effect: "shadow",
    apply: (frame, { title }) => {
      drawText(frame, title, SHADOW_OFFSET, SHADOW_OFFSET, BLACK, SHADOW_ALPHA);
      return frame;
    },
  },
  {
    name: "glow",
    effect: "glow",
    apply: (frame, { request, title }) => {
      const color = request.palette.accent;
      for (const offset of GLOW_OFFSETS) {
        drawText(frame, title, -offset, 0, color, GLOW_ALPHA);
        drawText(frame, title, offset, 0, color, GLOW_ALPHA);
        drawText(frame, title, 0, -offset, color, GLOW_ALPHA);
        drawText(frame, title, 0, offset, color, GLOW_ALPHA);
      }
      return frame;
    },
  },
  {
    name: "title",
    apply: (frame, { request, title }) => {
      drawText(frame, title, 0, 0, request.palette.text);
      return frame;
    },
  },
  {
    name: "subtitle",
    apply: (frame, { request, subtitle }) => {
      if (subtitle) {
        drawText(frame, subtitle, 0, 0, request.palette.muted);
      }
      return frame;
    },
  },
  {
    name: "stripe",
    effect: "stripe",
    apply: (frame, { request }) => {
      const top = Math.floor(frame.height * 0.85);
      fillRect(frame, 0, top, frame.width, frame.height - top, request.palette.accent, STRIPE_ALPHA);
      return frame;
    },
  },
  {
    name: "blur",
    effect: "blur",
    apply: (frame) => gaussianBlur(frame),
  },
];

/**
 * Stages that will run for a set of effects, in pipeline order
 */
export function selectStages(effects: readonly Effect[], stages: readonly RasterStage[] = RASTER_STAGES): RasterStage[] {
  const requested = new Set(effects);
  return stages.filter((stage) => stage.effect === undefined || requested.has(stage.effect));
}

const EMPTY_FRAME: Frame = { width: 0, height: 0, pixels: new Uint8Array(0) };

export function runStages(stages: readonly RasterStage[], ctx: RasterContext): Frame {
  return stages.reduce((frame, stage) => stage.apply(frame, ctx), EMPTY_FRAME);
}
