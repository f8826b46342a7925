/**
 * Test doubles for the research service: scripted source tools, artifact
 * builders and an event-recording observability
 */

import { ConsoleObservability } from "../shared/observability/console.js";
import type { ObservabilityEvent } from "../shared/observability/types.js";
import type { ResultSet, SearchOptions, SearchResult, SourceTool } from "../tools/types.js";
import type {
  Classification,
  Finding,
  FindingItem,
  Plan,
  SourceRef,
  ThreadSpec,
} from "../systems/orchestrator/types.js";

// ============================================
// SOURCE TOOLS
// ============================================

export type SearchHandler = (
  query: string,
  options: SearchOptions
) => ResultSet | Promise<ResultSet>;

export class ScriptedTool implements SourceTool {
  readonly calls: string[] = [];

  constructor(
    readonly capability: string,
    private readonly handler: SearchHandler
  ) {}

  async search(query: string, options: SearchOptions = {}): Promise<ResultSet> {
    this.calls.push(query);
    return this.handler(query, options);
  }
}

export function searchResult(url: string, overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    title: `Page ${url}`,
    url,
    snippet: `Snippet from ${url}`,
    sourceType: "analysis",
    ...overrides,
  };
}

export function resultSet(
  query: string,
  capability: string,
  results: SearchResult[],
  suggestions?: string[]
): ResultSet {
  return { query, capability, results, suggestions };
}

/**
 * One result per query, at a URL derived from the query
 */
export function echoHandler(capability: string): SearchHandler {
  return (query) =>
    resultSet(query, capability, [searchResult(`https://example.com/${capability}/${encodeURIComponent(query)}`)]);
}

/**
 * Never resolves on its own; rejects once the signal aborts
 */
export function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(new Error("aborted"));
      return;
    }
    signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
  });
}

// ============================================
// OBSERVABILITY
// ============================================

export function recordingObservability(): {
  observability: ConsoleObservability;
  events: ObservabilityEvent[];
} {
  const events: ObservabilityEvent[] = [];
  const observability = new ConsoleObservability({
    console: false,
    onEvent: (event) => events.push(event),
  });
  return { observability, events };
}

// ============================================
// ARTIFACTS
// ============================================

export function makeClassification(overrides: Partial<Classification> = {}): Classification {
  return {
    queryType: "technical",
    complexity: "simple",
    workerCount: 2,
    formatHint: "brief",
    signals: { technical: [], domain: [], scope: [], score: 0 },
    ...overrides,
  };
}

export function makeThread(id: string, focus: string, overrides: Partial<ThreadSpec> = {}): ThreadSpec {
  return {
    id,
    focus,
    primaryCapability: "semantic-search",
    questions: [`${focus}: what matters?`],
    ...overrides,
  };
}

export function makePlan(
  threads: ThreadSpec[],
  classification: Partial<Classification> = {},
  query = "test query"
): Plan {
  return {
    runId: "r1",
    query,
    createdAt: "2026-01-01T00:00:00.000Z",
    classification: makeClassification({ workerCount: threads.length, ...classification }),
    threads,
  };
}

export function makeSource(url: string, overrides: Partial<SourceRef> = {}): SourceRef {
  return {
    url,
    title: `Page ${url}`,
    sourceType: "analysis",
    capability: "semantic-search",
    ...overrides,
  };
}

export function makeItem(topic: string, statement: string, sources: string[], position?: string): FindingItem {
  return position === undefined ? { topic, statement, sources } : { topic, statement, position, sources };
}

export function makeFinding(threadId: string, overrides: Partial<Finding> = {}): Finding {
  return {
    threadId,
    summary: `Summary of ${threadId}`,
    findingsList: [],
    sourcesConsulted: [],
    gaps: [],
    suggestedFollowUps: [],
    partial: false,
    iterations: 0,
    capabilitiesUsed: ["semantic-search"],
    completedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}
