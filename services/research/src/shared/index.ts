/**
 * Shared Infrastructure Exports
 */

// System (orchestration layer)
export * from "./system/index.js";

// Executor (LLM execution)
export * from "./executor/index.js";

// Store (artifact persistence)
export * from "./store/index.js";

// Observability (logging, events)
export * from "./observability/index.js";

export { readJsonFile } from "./json.js";
