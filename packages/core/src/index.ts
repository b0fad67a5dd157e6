export * from "./errors.js";
export * from "./interfaces.js";
export * from "./registry.js";
export * from "./types.js";
