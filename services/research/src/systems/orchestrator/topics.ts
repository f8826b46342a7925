/**
 * Topic Index
 * Groups claims by normalized topic; a topic whose claims carry two or more
 * distinct positions is a conflict
 */

import { normalizeTopic } from "../../shared/text.js";
import type { FindingItem } from "./types.js";

export interface IndexedClaim {
  threadId: string;
  item: FindingItem;
}

export interface TopicEntry {
  key: string;
  /** Topic as first written */
  topic: string;
  claims: IndexedClaim[];
}

export function normalizePosition(position: string): string {
  return normalizeTopic(position);
}

/**
 * Entries in first-seen order, which is plan order when findings are fed in
 * plan order
 */
export function buildTopicIndex(
  findings: Iterable<{ threadId: string; findingsList: readonly FindingItem[] }>
): TopicEntry[] {
  const index = new Map<string, TopicEntry>();

  for (const finding of findings) {
    for (const item of finding.findingsList) {
      const key = normalizeTopic(item.topic);
      let entry = index.get(key);
      if (!entry) {
        entry = { key, topic: item.topic.trim(), claims: [] };
        index.set(key, entry);
      }
      entry.claims.push({ threadId: finding.threadId, item });
    }
  }

  return [...index.values()];
}

export function distinctPositions(entry: TopicEntry): string[] {
  const positions = new Set<string>();
  for (const { item } of entry.claims) {
    if (item.position) {
      const normalized = normalizePosition(item.position);
      if (normalized) positions.add(normalized);
    }
  }
  return [...positions];
}
