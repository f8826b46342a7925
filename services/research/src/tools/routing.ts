/**
 * Capability Routing
 * Static signal → capability table, injected as configuration
 */

import { z } from "zod";
import { readJsonFile } from "../shared/json.js";
import { matchTerms, normalizeText } from "../shared/text.js";

const RouteSchema = z.object({
  /** Label of the signal family, for logs and audit */
  signal: z.string().min(1),
  capability: z.string().min(1),
  keywords: z.array(z.string().min(1)).default([]),
  /** Regular expressions tested case-insensitively against the raw text */
  patterns: z.array(z.string().min(1)).default([]),
});

export const RoutingTableSchema = z.object({
  defaultCapability: z.string().min(1),
  /** Evaluated in order; the first matching route wins */
  routes: z.array(RouteSchema),
  /** Capability to try on deepening round n is fallbacks[primary][n - 1] */
  fallbacks: z.record(z.string(), z.array(z.string().min(1))).default({}),
});

export type RoutingTable = z.infer<typeof RoutingTableSchema>;
export type Route = z.infer<typeof RouteSchema>;

export interface CapabilitySelection {
  capability: string;
  /** Signal family that matched, or "default" */
  signal: string;
}

const DEFAULT_ROUTING_URL = new URL("./routing.json", import.meta.url);

/**
 * Load a routing table from a JSON file; the bundled table when no path is given
 */
export function loadRoutingTable(path?: string): RoutingTable {
  return readJsonFile(path ?? DEFAULT_ROUTING_URL, RoutingTableSchema);
}

function routeMatches(route: Route, text: string, normalized: string): boolean {
  if (matchTerms(normalized, route.keywords).length > 0) {
    return true;
  }
  return route.patterns.some((pattern) => new RegExp(pattern, "i").test(text));
}

export function selectCapability(table: RoutingTable, text: string): CapabilitySelection {
  const normalized = normalizeText(text);

  for (const route of table.routes) {
    if (routeMatches(route, text, normalized)) {
      return { capability: route.capability, signal: route.signal };
    }
  }

  return { capability: table.defaultCapability, signal: "default" };
}

/**
 * Capability for a deepening round (1-based); the primary when the table
 * names no fallback for that round
 */
export function fallbackCapability(table: RoutingTable, primary: string, round: number): string {
  const chain = table.fallbacks[primary] ?? [];
  return chain[round - 1] ?? primary;
}

/**
 * Every capability the table can route to
 */
export function routedCapabilities(table: RoutingTable): string[] {
  const names = new Set<string>([table.defaultCapability]);
  for (const route of table.routes) {
    names.add(route.capability);
  }
  for (const [primary, chain] of Object.entries(table.fallbacks)) {
    names.add(primary);
    for (const name of chain) {
      names.add(name);
    }
  }
  return [...names];
}
