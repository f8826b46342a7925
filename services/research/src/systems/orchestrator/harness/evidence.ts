/**
 * Worker Evidence
 * What a worker has gathered so far, how it is judged, and how it becomes a
 * Finding. Raw results live here and nowhere else.
 */

import { normalizeTopic, truncate, unique } from "../../../shared/text.js";
import type { SearchResult } from "../../../tools/types.js";
import { buildTopicIndex, distinctPositions } from "../topics.js";
import type { Finding, FindingItem, SourceRef, ThreadSpec } from "../types.js";

// ============================================
// LEDGER
// ============================================

export interface CollectedResult {
  query: string;
  capability: string;
  /** Thread question the query was issued for, if any */
  question?: string;
  result: SearchResult;
}

export interface PendingQuery {
  query: string;
  question?: string;
}

const MAX_STATEMENT_LENGTH = 280;
const MAX_FOLLOW_UPS = 5;
const MAX_QUERIES_PER_ROUND = 3;

export class EvidenceLedger {
  readonly results: CollectedResult[] = [];
  readonly capabilitiesUsed: string[] = [];
  readonly failures: string[] = [];
  private readonly answered = new Set<string>();
  private readonly leads: string[] = [];
  private readonly explored = new Set<string>();
  private readonly issued = new Set<string>();

  /**
   * Remember a query before it runs so later rounds never repeat it
   */
  markIssued(capability: string, pending: PendingQuery): void {
    this.issued.add(issuedKey(capability, pending.query));
    this.explored.add(pending.query);
    if (!this.capabilitiesUsed.includes(capability)) {
      this.capabilitiesUsed.push(capability);
    }
  }

  wasIssued(capability: string, query: string): boolean {
    return this.issued.has(issuedKey(capability, query));
  }

  addResults(
    capability: string,
    pending: PendingQuery,
    results: readonly SearchResult[],
    suggestions: readonly string[] = []
  ): void {
    for (const result of results) {
      this.results.push({ query: pending.query, capability, question: pending.question, result });
    }
    if (pending.question && results.length > 0) {
      this.answered.add(pending.question);
    }
    for (const suggestion of suggestions) {
      const lead = suggestion.trim();
      if (lead && !this.leads.includes(lead)) {
        this.leads.push(lead);
      }
    }
  }

  addFailure(gap: string): void {
    this.failures.push(gap);
  }

  isAnswered(question: string): boolean {
    return this.answered.has(question);
  }

  unexploredLeads(): string[] {
    return this.leads.filter((lead) => !this.explored.has(lead));
  }
}

function issuedKey(capability: string, query: string): string {
  return `${capability}\u0000${query}`;
}

// ============================================
// CURATION
// ============================================

/**
 * Claims become items as stated; results without claims contribute their
 * snippet under the question they answered
 */
export function collectItems(results: readonly CollectedResult[]): FindingItem[] {
  const items = new Map<string, FindingItem>();

  const add = (topic: string, statement: string, url: string, position?: string) => {
    const clean = truncate(statement, MAX_STATEMENT_LENGTH);
    if (!clean) return;

    const key = `${normalizeTopic(topic)}|${clean.toLowerCase()}|${position ?? ""}`;
    const existing = items.get(key);
    if (existing) {
      if (!existing.sources.includes(url)) existing.sources.push(url);
      return;
    }

    const item: FindingItem = { topic: topic.trim(), statement: clean, sources: [url] };
    if (position) item.position = normalizeTopic(position);
    items.set(key, item);
  };

  for (const { result, question, query } of results) {
    if (result.claims && result.claims.length > 0) {
      for (const claim of result.claims) {
        add(claim.topic, claim.assertion, result.url, claim.position);
      }
    } else {
      add(question ?? query, result.snippet || result.title, result.url);
    }
  }

  return [...items.values()];
}

export function collectSources(results: readonly CollectedResult[]): SourceRef[] {
  const sources = new Map<string, SourceRef>();
  for (const { result, capability } of results) {
    if (!sources.has(result.url)) {
      sources.set(result.url, {
        url: result.url,
        title: result.title,
        sourceType: result.sourceType,
        capability,
      });
    }
  }
  return [...sources.values()];
}

// ============================================
// EVALUATION
// ============================================

export interface Assessment {
  uniqueSources: number;
  unanswered: string[];
  conflicts: Array<{ topic: string; positions: string[] }>;
  pendingLeads: string[];
  /** Enough sources and every question answered */
  comprehensive: boolean;
}

export function assess(
  thread: ThreadSpec,
  ledger: EvidenceLedger,
  minSources: number
): Assessment {
  const items = collectItems(ledger.results);
  const uniqueSources = collectSources(ledger.results).length;
  const unanswered = thread.questions.filter((q) => !ledger.isAnswered(q));

  const conflicts = buildTopicIndex([{ threadId: thread.id, findingsList: items }])
    .map((entry) => ({ topic: entry.topic, positions: distinctPositions(entry) }))
    .filter((entry) => entry.positions.length >= 2);

  return {
    uniqueSources,
    unanswered,
    conflicts,
    pendingLeads: ledger.unexploredLeads(),
    comprehensive: uniqueSources >= minSources && unanswered.length === 0,
  };
}

export type NextStep =
  | { next: "finalizing"; reason: "comprehensive" | "round_limit" | "exhausted" }
  | { next: "deepening"; queries: PendingQuery[] };

/**
 * Refined queries for the coming round, at most three, none repeated on the
 * capability that will serve them
 */
export function deepeningQueries(
  thread: ThreadSpec,
  assessment: Assessment,
  ledger: EvidenceLedger,
  capability: string,
  minSources: number
): PendingQuery[] {
  const candidates: PendingQuery[] = [];

  for (const question of assessment.unanswered) {
    candidates.push({ query: `${thread.focus}: ${question}`, question });
  }
  for (const conflict of assessment.conflicts) {
    candidates.push({ query: `${conflict.topic} evidence primary source` });
  }
  if (assessment.pendingLeads.length > 0) {
    candidates.push({ query: assessment.pendingLeads[0] });
  }
  if (assessment.uniqueSources < minSources) {
    for (const question of thread.questions) {
      candidates.push({ query: `${thread.focus}: ${question}`, question });
    }
  }

  const seen = new Set<string>();
  const queries: PendingQuery[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.query) || ledger.wasIssued(capability, candidate.query)) continue;
    seen.add(candidate.query);
    queries.push(candidate);
    if (queries.length >= MAX_QUERIES_PER_ROUND) break;
  }
  return queries;
}

export function decideNext(
  assessment: Assessment,
  roundsSpent: number,
  maxRounds: number,
  queries: () => PendingQuery[]
): NextStep {
  if (assessment.comprehensive && assessment.conflicts.length === 0) {
    return { next: "finalizing", reason: "comprehensive" };
  }
  if (roundsSpent >= maxRounds) {
    return { next: "finalizing", reason: "round_limit" };
  }

  const pending = queries();
  if (pending.length === 0) {
    return { next: "finalizing", reason: "exhausted" };
  }
  return { next: "deepening", queries: pending };
}

// ============================================
// COMPOSITION
// ============================================

export interface CompositionMeta {
  partial: boolean;
  iterations: number;
  minSources: number;
  completedAt: string;
}

export function composeFinding(
  thread: ThreadSpec,
  ledger: EvidenceLedger,
  meta: CompositionMeta
): Finding {
  const findingsList = collectItems(ledger.results);
  const sourcesConsulted = collectSources(ledger.results);
  const assessment = assess(thread, ledger, meta.minSources);

  const gaps: string[] = [
    ...assessment.unanswered.map((q) => `No sources answered: ${q}`),
    ...ledger.failures,
    ...assessment.conflicts.map(
      (c) => `Unresolved conflict on "${c.topic}": ${c.positions.join(" vs ")}`
    ),
  ];
  if (sourcesConsulted.length < meta.minSources) {
    gaps.push(`Only ${sourcesConsulted.length} unique source(s) found, ${meta.minSources} expected`);
  }

  return {
    threadId: thread.id,
    summary: summarize(thread, findingsList, sourcesConsulted, meta.partial),
    findingsList,
    sourcesConsulted,
    gaps,
    suggestedFollowUps: unique(assessment.pendingLeads).slice(0, MAX_FOLLOW_UPS),
    partial: meta.partial,
    iterations: meta.iterations,
    capabilitiesUsed: [...ledger.capabilitiesUsed],
    completedAt: meta.completedAt,
  };
}

function summarize(
  thread: ThreadSpec,
  items: readonly FindingItem[],
  sources: readonly SourceRef[],
  partial: boolean
): string {
  if (items.length === 0) {
    return partial
      ? `${thread.focus}: no findings; research stopped after a capability failure.`
      : `${thread.focus}: no findings.`;
  }

  const lead = truncate(items[0].statement, 160);
  const suffix = partial ? " Research stopped early after a capability failure." : "";
  return `${thread.focus}: ${items.length} finding(s) from ${sources.length} source(s). ${lead}${suffix}`;
}
