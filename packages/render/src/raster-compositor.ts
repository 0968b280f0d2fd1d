/**
 * Raster compositor - renders a request into an RGB frame, then PNG bytes
 */

import type { Frame, RenderRequest } from "@banner-forge/core";
import { encodePng } from "./png.js";
import { layoutText, runStages, selectStages } from "./effects.js";
import type { FontResolver } from "./text.js";
import { createFontResolver, type FontResolverOptions } from "./font-resolver.js";

/**
 * Render a request to a frame. Deterministic for a given request and font.
 */
export function renderRaster(request: RenderRequest, resolveFont: FontResolver): Frame {
  const layout = layoutText(request, resolveFont);
  return runStages(selectStages(request.effects), { request, ...layout });
}

/** Capability interface for the raster output path */
export interface RasterBackend {
  render(request: RenderRequest): Frame;
  encode(frame: Frame): Uint8Array;
}

export function createRasterBackend(options: FontResolverOptions = {}): RasterBackend {
  const resolveFont = createFontResolver(options);
  return {
    render: (request) => renderRaster(request, resolveFont),
    encode: encodePng,
  };
}
