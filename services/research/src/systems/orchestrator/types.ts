/**
 * Research Orchestrator Types
 */

import type {
  Classification,
  FinalOutput,
  Finding,
  Plan,
  PlanOverflow,
} from "./schema.js";

export type {
  QueryType,
  Complexity,
  OutputFormat,
  Classification,
  ThreadSpec,
  PlanOverflow,
  Plan,
  FindingItem,
  SourceRef,
  Finding,
  FinalOutput,
} from "./schema.js";

// ============================================
// WORKER
// ============================================

export type WorkerState =
  | "searching"
  | "evaluating"
  | "deepening"
  | "finalizing"
  | "done";

/**
 * Put function bound to a single thread's key
 */
export type FindingWriter = (finding: Finding) => Promise<void>;

export type WorkerOutcome =
  | { status: "written"; finding: Finding; transitions: WorkerState[] }
  | { status: "aborted"; transitions: WorkerState[] };

// ============================================
// DISPATCH
// ============================================

export type TerminalStatus =
  | { state: "done"; durationMs: number; partial: boolean }
  | { state: "failed"; durationMs: number; reason: string }
  | { state: "timed_out"; durationMs: number; afterMs: number };

// ============================================
// RUN CONDITIONS (non-fatal)
// ============================================

export type RunCondition =
  | ({ kind: "plan_overflow" } & PlanOverflow)
  | { kind: "worker_failure"; threadId: string; reason: string }
  | { kind: "synthesis_gap"; missingThreads: string[] };

// ============================================
// SYSTEM INPUT / OUTPUT
// ============================================

export interface ResearchInput {
  query: string;

  /** Reuse a run id instead of generating one */
  runId?: string;
}

export interface ResearchRunResult {
  runId: string;
  classification: Readonly<Classification>;
  plan: Plan;
  statuses: Map<string, TerminalStatus>;
  output: FinalOutput;
  conditions: RunCondition[];
  /** Location of each persisted artifact */
  artifacts: {
    plan: string;
    findings: Record<string, string>;
    finalOutput: string;
  };
  metadata: {
    systemVersion: string;
    startedAt: string;
    completedAt: string;
    durationMs: number;
  };
}
