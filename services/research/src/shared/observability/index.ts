export * from "./types.js";
export * from "./console.js";
