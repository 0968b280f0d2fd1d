export * from "./random.js";
export * from "./accent.js";
export * from "./svg-composer.js";
export * from "./text.js";
export * from "./rasterize.js";
export * from "./outline-font.js";
export * from "./font-resolver.js";
export * from "./blur.js";
export * from "./png.js";
export * from "./effects.js";
export * from "./raster-compositor.js";
export * from "./glyph.js";
export * from "./suggest.js";
export * from "./dispatcher.js";
