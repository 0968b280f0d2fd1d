export * from "./types.js";
export * from "./errors.js";
export * from "./colors.js";
export * from "./frame.js";
export * from "./palettes.js";
export * from "./templates.js";
export * from "./request.js";
