/**
 * Source Authority
 * Static source-type ranking used as the secondary tie-break for conflicts
 */

import type { SourceType } from "../../../tools/types.js";
import type { SourceRef } from "../types.js";

export const AUTHORITY_RANK: Record<SourceType, number> = {
  official: 5,
  academic: 4,
  data: 4,
  code: 4,
  news: 3,
  analysis: 2,
  video: 2,
  forum: 1,
  social: 1,
  other: 0,
};

/**
 * Best rank among the given URLs; URLs with no known source rank as "other"
 */
export function authorityOf(urls: readonly string[], sources: ReadonlyMap<string, SourceRef>): number {
  let best = AUTHORITY_RANK.other;
  for (const url of urls) {
    const source = sources.get(url);
    if (source) {
      best = Math.max(best, AUTHORITY_RANK[source.sourceType]);
    }
  }
  return best;
}
