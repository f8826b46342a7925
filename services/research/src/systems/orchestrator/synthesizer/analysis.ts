/**
 * Synthesis Analysis
 * Everything the renderers need, computed once from the plan, the terminal
 * statuses and the findings that could be read
 */

import { unique } from "../../../shared/text.js";
import type { FindingRead } from "../store.js";
import { buildTopicIndex, distinctPositions, normalizePosition, type IndexedClaim } from "../topics.js";
import type { Finding, Plan, SourceRef, TerminalStatus, ThreadSpec } from "../types.js";
import { authorityOf } from "./authority.js";

// ============================================
// TYPES
// ============================================

export interface PresentThread {
  thread: ThreadSpec;
  status: TerminalStatus;
  finding: Finding;
}

export interface MissingThread {
  thread: ThreadSpec;
  status: TerminalStatus;
  /** Why no finding is available, in words */
  description: string;
}

export interface Perspective {
  position: string;
  claims: IndexedClaim[];
  authority: number;
}

export type Verdict =
  | { kind: "leans"; position: string; authority: number; runnerUp: number }
  | { kind: "undecided"; authority: number };

export interface ConflictAnalysis {
  key: string;
  topic: string;
  /** In first-seen (plan) order */
  perspectives: Perspective[];
  verdict: Verdict;
}

export interface Corroboration {
  topic: string;
  threadIds: string[];
}

export interface SynthesisModel {
  plan: Plan;
  present: PresentThread[];
  missing: MissingThread[];
  conflicts: ConflictAnalysis[];
  /** Normalized keys of conflicting topics */
  conflictKeys: Set<string>;
  corroborations: Corroboration[];
  /** Consolidated, unique by URL, in plan order of first appearance */
  sources: SourceRef[];
  sourceIndex: Map<string, number>;
}

// ============================================
// ANALYSIS
// ============================================

export function describeStatus(status: TerminalStatus, read: FindingRead): string {
  switch (status.state) {
    case "failed":
      return `failed: ${status.reason}`;
    case "timed_out":
      return `timed out after ${status.afterMs} ms`;
    case "done":
      return read.status === "invalid"
        ? `finished but its finding is unreadable: ${read.reason}`
        : "finished without a stored finding";
  }
}

export function analyze(
  plan: Plan,
  statuses: ReadonlyMap<string, TerminalStatus>,
  reads: ReadonlyMap<string, FindingRead>
): SynthesisModel {
  const present: PresentThread[] = [];
  const missing: MissingThread[] = [];

  for (const thread of plan.threads) {
    const status = statuses.get(thread.id);
    if (!status) {
      // Callers pass a complete status map; see synthesize()
      continue;
    }
    const read: FindingRead = reads.get(thread.id) ?? { status: "absent" };
    if (read.status === "present") {
      present.push({ thread, status, finding: read.finding });
    } else {
      missing.push({ thread, status, description: describeStatus(status, read) });
    }
  }

  const sources: SourceRef[] = [];
  const sourceIndex = new Map<string, number>();
  const sourceByUrl = new Map<string, SourceRef>();
  for (const { finding } of present) {
    for (const source of finding.sourcesConsulted) {
      if (!sourceByUrl.has(source.url)) {
        sourceByUrl.set(source.url, source);
        sources.push(source);
        sourceIndex.set(source.url, sources.length);
      }
    }
  }

  const index = buildTopicIndex(
    present.map(({ finding }) => ({ threadId: finding.threadId, findingsList: finding.findingsList }))
  );

  const conflicts: ConflictAnalysis[] = [];
  const corroborations: Corroboration[] = [];

  for (const entry of index) {
    const positions = distinctPositions(entry);

    if (positions.length >= 2) {
      const perspectives = positions.map((position) => {
        const claims = entry.claims.filter(
          ({ item }) => item.position !== undefined && normalizePosition(item.position) === position
        );
        const urls = claims.flatMap(({ item }) => item.sources);
        return { position, claims, authority: authorityOf(urls, sourceByUrl) };
      });
      conflicts.push({
        key: entry.key,
        topic: entry.topic,
        perspectives,
        verdict: decideVerdict(perspectives),
      });
      continue;
    }

    const threadIds = unique(entry.claims.map((c) => c.threadId));
    if (threadIds.length >= 2) {
      corroborations.push({ topic: entry.topic, threadIds });
    }
  }

  return {
    plan,
    present,
    missing,
    conflicts,
    conflictKeys: new Set(conflicts.map((c) => c.key)),
    corroborations,
    sources,
    sourceIndex,
  };
}

/**
 * A unique top authority leans the topic; a shared top leaves it undecided
 */
export function decideVerdict(perspectives: readonly Perspective[]): Verdict {
  const ranked = [...perspectives].sort((a, b) => b.authority - a.authority);
  const [top, second] = ranked;

  if (top && second && top.authority > second.authority) {
    return { kind: "leans", position: top.position, authority: top.authority, runnerUp: second.authority };
  }
  return { kind: "undecided", authority: top?.authority ?? 0 };
}
