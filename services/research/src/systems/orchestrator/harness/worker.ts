/**
 * Research Worker
 * Bounded state machine that researches one thread and writes one Finding
 *
 *   searching → evaluating → deepening → evaluating → … → finalizing → done
 *
 * The worker talks to nothing but its source tools and its own writer.
 */

import { errorMessage, type ResearchSettings } from "@fanout/core";
import type { IObservability } from "../../../shared/observability/types.js";
import type { CapabilityRegistry } from "../../../tools/registry.js";
import { fallbackCapability, type RoutingTable } from "../../../tools/routing.js";
import type { FindingWriter, ThreadSpec, WorkerOutcome, WorkerState } from "../types.js";
import {
  EvidenceLedger,
  assess,
  composeFinding,
  decideNext,
  deepeningQueries,
  type PendingQuery,
} from "./evidence.js";
import { withRetry } from "./retry.js";

export const WORKER_NAME = "research-worker";
export const WORKER_VERSION = "1.0.0";

// ============================================
// TYPES
// ============================================

export interface WorkerDependencies {
  registry: CapabilityRegistry;
  routing: RoutingTable;
  observability: IObservability;
}

export type WorkerSettings = Pick<
  ResearchSettings,
  "maxDeepeningRounds" | "maxAttempts" | "backoffMs" | "minSources"
>;

export interface WorkerOptions {
  runId: string;
  writer: FindingWriter;
  /** Fires when the worker's deadline passes; the worker then writes nothing */
  signal: AbortSignal;
  settings: WorkerSettings;
  now?: () => Date;
}

type QueryBatch = "completed" | "failed" | "aborted";

// ============================================
// WORKER
// ============================================

export class ResearchWorker {
  private readonly ledger = new EvidenceLedger();
  private readonly transitions: WorkerState[] = [];
  private rounds = 0;
  private queriesRun = 0;

  constructor(
    private readonly thread: ThreadSpec,
    private readonly deps: WorkerDependencies,
    private readonly options: WorkerOptions
  ) {}

  get state(): WorkerState | undefined {
    return this.transitions[this.transitions.length - 1];
  }

  async run(): Promise<WorkerOutcome> {
    const { observability } = this.deps;
    const startTime = Date.now();

    const sessionId = await observability.startSession({
      agentName: WORKER_NAME,
      agentVersion: WORKER_VERSION,
      correlationId: this.options.runId,
      input: { threadId: this.thread.id, focus: this.thread.focus },
    });

    try {
      const outcome = await this.research();

      await observability.endSession(sessionId, {
        success: outcome.status === "written",
        output:
          outcome.status === "written"
            ? { partial: outcome.finding.partial, gaps: outcome.finding.gaps.length }
            : undefined,
        error: outcome.status === "aborted" ? "aborted before finalizing" : undefined,
        metadata: { durationMs: Date.now() - startTime, transitions: outcome.transitions },
      });

      return outcome;
    } catch (error) {
      await observability.endSession(sessionId, {
        success: false,
        error,
        metadata: { durationMs: Date.now() - startTime },
      });
      throw error;
    }
  }

  private async research(): Promise<WorkerOutcome> {
    const { settings } = this.options;
    const primary = this.thread.primaryCapability;

    // ========================================
    // SEARCHING
    // ========================================
    await this.enter("searching");
    let batch = await this.runQueries(
      this.thread.questions.map((question) => ({ query: question, question })),
      primary
    );

    // ========================================
    // EVALUATING / DEEPENING
    // ========================================
    while (batch === "completed") {
      await this.enter("evaluating");

      const assessment = assess(this.thread, this.ledger, settings.minSources);
      const capability = fallbackCapability(this.deps.routing, primary, this.rounds + 1);
      const step = decideNext(assessment, this.rounds, settings.maxDeepeningRounds, () =>
        deepeningQueries(this.thread, assessment, this.ledger, capability, settings.minSources)
      );

      this.log("debug", `[Worker] Evaluated`, {
        uniqueSources: assessment.uniqueSources,
        unanswered: assessment.unanswered.length,
        conflicts: assessment.conflicts.length,
        next: step.next,
      });

      if (step.next === "finalizing") break;

      await this.enter("deepening");
      this.rounds++;
      batch = await this.runQueries(step.queries, capability);
    }

    if (batch === "aborted" || this.options.signal.aborted) {
      return { status: "aborted", transitions: [...this.transitions] };
    }

    // ========================================
    // FINALIZING
    // ========================================
    await this.enter("finalizing");
    const finding = composeFinding(this.thread, this.ledger, {
      partial: batch === "failed",
      iterations: this.rounds,
      minSources: settings.minSources,
      completedAt: (this.options.now?.() ?? new Date()).toISOString(),
    });

    if (this.options.signal.aborted) {
      return { status: "aborted", transitions: [...this.transitions] };
    }

    await this.options.writer(finding);

    this.deps.observability.metric("worker.queries", this.queriesRun, { threadId: this.thread.id });
    this.deps.observability.metric("worker.sources", finding.sourcesConsulted.length, {
      threadId: this.thread.id,
    });

    await this.enter("done");
    return { status: "written", finding, transitions: [...this.transitions] };
  }

  /**
   * Run queries one after another on one capability. Stops at the first
   * call that exhausts its attempts.
   */
  private async runQueries(queries: PendingQuery[], capability: string): Promise<QueryBatch> {
    const { registry, observability } = this.deps;
    const { settings, signal, runId } = this.options;

    for (const pending of queries) {
      this.ledger.markIssued(capability, pending);
      this.queriesRun++;

      const outcome = await withRetry(
        () => registry.get(capability).search(pending.query, { signal }),
        { maxAttempts: settings.maxAttempts, backoffMs: settings.backoffMs },
        {
          signal,
          onRetry: (attempt, error, delayMs) =>
            observability.recordEvent({
              type: "capability.retry",
              correlationId: runId,
              threadId: this.thread.id,
              level: "warn",
              data: { capability, query: pending.query, attempt, delayMs, error: errorMessage(error) },
            }),
        }
      );

      if (!outcome.ok) {
        if (outcome.aborted) return "aborted";

        const message = errorMessage(outcome.error);
        this.ledger.addFailure(
          `Capability ${capability} failed for "${pending.query}" after ${outcome.attempts} attempt(s): ${message}`
        );
        await observability.recordEvent({
          type: "capability.failed",
          correlationId: runId,
          threadId: this.thread.id,
          level: "warn",
          data: { capability, query: pending.query, attempts: outcome.attempts, error: message },
        });
        return "failed";
      }

      this.ledger.addResults(capability, pending, outcome.value.results, outcome.value.suggestions);
    }

    return "completed";
  }

  private async enter(state: WorkerState): Promise<void> {
    const from = this.state;
    this.transitions.push(state);
    await this.deps.observability.recordEvent({
      type: "worker.transition",
      correlationId: this.options.runId,
      threadId: this.thread.id,
      data: { from: from ?? null, to: state, round: this.rounds },
    });
  }

  private log(level: "debug" | "info", message: string, data: Record<string, unknown>): void {
    this.deps.observability.log(level, message, {
      runId: this.options.runId,
      threadId: this.thread.id,
      ...data,
    });
  }
}

export async function runWorker(
  thread: ThreadSpec,
  deps: WorkerDependencies,
  options: WorkerOptions
): Promise<WorkerOutcome> {
  return new ResearchWorker(thread, deps, options).run();
}
