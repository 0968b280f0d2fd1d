export * from "./config.js";
export * from "./output.js";
export * from "./palette-store.js";
export * from "./batch.js";
export * from "./program.js";
