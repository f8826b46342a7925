/**
 * Source Tools Exports
 */

export * from "./types.js";
export * from "./registry.js";
export * from "./routing.js";
export * from "./claude.js";
