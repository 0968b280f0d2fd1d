import { describe, it, expect, vi } from "vitest";
import { normalizeRequest } from "@banner-forge/core";
import { renderAllFormats, renderArtifact, type RenderBackends } from "./dispatcher.js";
import { createRasterBackend } from "./raster-compositor.js";
import { composeSvg } from "./svg-composer.js";
import { PNG_SIGNATURE } from "./png.js";

function makeBackends(glyphFont?: string): RenderBackends {
  return {
    raster: createRasterBackend({ candidates: [] }),
    glyph: { render: vi.fn(() => "ART"), listFonts: () => ["Standard"] },
    glyphFont,
  };
}

const request = normalizeRequest({ text: "Test", width: 120, height: 40 });
const decoder = new TextDecoder();

describe("renderArtifact", () => {
  it("serializes the vector form as UTF-8 SVG", () => {
    const bytes = renderArtifact(request, "vector", makeBackends());
    expect(decoder.decode(bytes)).toBe(composeSvg(request));
  });

  it("encodes the raster form as PNG", () => {
    const bytes = renderArtifact(request, "raster", makeBackends());
    expect(bytes.subarray(0, 8)).toEqual(PNG_SIGNATURE);
  });

  it("delegates the glyph form to the glyph backend with the chosen font", () => {
    const backends = makeBackends("Slant");
    const bytes = renderArtifact(request, "glyph", backends);
    expect(decoder.decode(bytes)).toBe("ART");
    expect(backends.glyph.render).toHaveBeenCalledWith("Test", "Slant");
  });
});

describe("renderAllFormats", () => {
  it("runs every output path", () => {
    const backends = makeBackends();
    const artifacts = renderAllFormats(request, backends);
    expect(decoder.decode(artifacts.glyph)).toBe("ART");
    expect(decoder.decode(artifacts.vector)).toContain("<svg");
    expect(artifacts.raster.subarray(0, 8)).toEqual(PNG_SIGNATURE);
    expect(backends.glyph.render).toHaveBeenCalledTimes(1);
  });
});
