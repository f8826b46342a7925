export * from "./types.js";
export * from "./claude.js";
