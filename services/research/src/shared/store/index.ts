export * from "./types.js";
export * from "./file.js";
export * from "./memory.js";
