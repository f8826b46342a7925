import type { Complexity, OutputFormat } from "../types.js";

/**
 * Brief only for a simple query whose threads all reported without conflict
 */
export function decideFormat(
  complexity: Complexity,
  conflictsDetected: boolean,
  allThreadsPresent: boolean
): OutputFormat {
  return complexity === "simple" && !conflictsDetected && allThreadsPresent ? "brief" : "report";
}
