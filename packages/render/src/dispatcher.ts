/**
 * Output dispatcher - routes a request to one output form and returns bytes
 */

import type { OutputFormat, RenderRequest } from "@banner-forge/core";
import { composeSvg } from "./svg-composer.js";
import type { RasterBackend } from "./raster-compositor.js";
import type { GlyphBackend } from "./glyph.js";

/** Backends are chosen once by the caller and reused for every request */
export interface RenderBackends {
  raster: RasterBackend;
  glyph: GlyphBackend;
  /** Figlet font for the glyph form; the backend default when omitted */
  glyphFont?: string;
}

export interface RenderedArtifacts {
  glyph: Uint8Array;
  vector: Uint8Array;
  raster: Uint8Array;
}

const encoder = new TextEncoder();

/**
 * Render one output form. Glyph art is plain text, without ANSI styling.
 */
export function renderArtifact(request: RenderRequest, format: OutputFormat, backends: RenderBackends): Uint8Array {
  switch (format) {
    case "vector":
      return encoder.encode(composeSvg(request));
    case "raster":
      return backends.raster.encode(backends.raster.render(request));
    case "glyph":
      return encoder.encode(backends.glyph.render(request.text, backends.glyphFont));
  }
}

/**
 * Render every output form for a request
 */
export function renderAllFormats(request: RenderRequest, backends: RenderBackends): RenderedArtifacts {
  return {
    glyph: renderArtifact(request, "glyph", backends),
    vector: renderArtifact(request, "vector", backends),
    raster: renderArtifact(request, "raster", backends),
  };
}
