/**
 * Research System
 * Classifies a query, fans it out to isolated workers, and synthesizes their
 * findings once every worker is terminal
 *
 * Roles:
 * - Classifier: sizes the run (2-6 workers) and picks the output shape
 * - Planner: one independent thread per worker
 * - Dispatcher: runs the workers concurrently behind a barrier
 * - Worker: researches one thread, writes one finding
 * - Synthesizer: merges the findings and flags conflicts
 *
 * Only a ClassificationError or a StorageError ends a run without output.
 */

import { randomUUID } from "crypto";
import { getBaseConfig, type ResearchSettings } from "@fanout/core";
import type { ISystem, SystemContext, SystemInfo } from "../../shared/system/types.js";
import type { IStore } from "../../shared/store/types.js";
import type { IObservability } from "../../shared/observability/types.js";
import { createFileStore } from "../../shared/store/file.js";
import { createConsoleObservability } from "../../shared/observability/console.js";
import type { CapabilityRegistry } from "../../tools/registry.js";
import { loadRoutingTable, routedCapabilities, type RoutingTable } from "../../tools/routing.js";
import { classifyQuery, loadLexicon, type Lexicon } from "./classifier/index.js";
import { buildPlan, type AngleCatalog } from "./planner/index.js";
import { dispatch, runWorker } from "./harness/index.js";
import { synthesize } from "./synthesizer/index.js";
import { RunStore, runKeys, type FindingRead } from "./store.js";
import type { ResearchInput, ResearchRunResult, RunCondition, TerminalStatus } from "./types.js";

export const SYSTEM_NAME = "research";
export const SYSTEM_VERSION = "1.0.0";

export const DEFAULT_RESEARCH_SETTINGS: ResearchSettings = {
  maxDeepeningRounds: 3,
  maxAttempts: 3,
  backoffMs: 500,
  workerTimeoutMs: 120_000,
  minSources: 3,
};

// ============================================
// OPTIONS
// ============================================

export interface ResearchSystemOptions {
  settings?: Partial<ResearchSettings>;

  /** Overrides settings.routingPath */
  routing?: RoutingTable;

  /** Overrides settings.lexiconPath */
  lexicon?: Lexicon;

  angles?: AngleCatalog;

  /** Clock for artifact timestamps */
  now?: () => Date;

  generateRunId?: () => string;
}

export interface ResearchDependencies {
  registry: CapabilityRegistry;
  store: IStore;
  observability: IObservability;
}

// ============================================
// SYSTEM
// ============================================

export class ResearchSystem implements ISystem<ResearchInput, ResearchRunResult> {
  readonly name = SYSTEM_NAME;
  readonly version = SYSTEM_VERSION;

  private readonly settings: ResearchSettings;
  private readonly routing: RoutingTable;
  private readonly lexicon?: Lexicon;
  private readonly deps: ResearchDependencies;

  constructor(
    deps: Pick<ResearchDependencies, "registry"> & Partial<ResearchDependencies>,
    private readonly options: ResearchSystemOptions = {}
  ) {
    this.settings = { ...DEFAULT_RESEARCH_SETTINGS, ...options.settings };
    this.routing = options.routing ?? loadRoutingTable(this.settings.routingPath);
    this.lexicon =
      options.lexicon ?? (this.settings.lexiconPath ? loadLexicon(this.settings.lexiconPath) : undefined);

    this.deps = {
      registry: deps.registry,
      store: deps.store ?? createFileStore(getBaseConfig().env.dataDir),
      observability: deps.observability ?? createConsoleObservability(),
    };
  }

  async run(input: ResearchInput, context: SystemContext = {}): Promise<ResearchRunResult> {
    const { observability, store, registry } = this.deps;
    const startTime = Date.now();
    const now = () => this.options.now?.() ?? new Date();
    const startedAt = now().toISOString();
    const runId =
      input.runId ?? context.correlationId ?? this.options.generateRunId?.() ?? randomUUID();

    observability.log("info", `[Research] Starting run`, {
      runId,
      query: input.query.slice(0, 100),
    });

    await observability.recordEvent({
      type: "system.started",
      correlationId: runId,
      level: "info",
      data: { system: this.name, initiatedBy: context.initiatedBy },
    });

    const sessionId = await observability.startSession({
      agentName: this.name,
      agentVersion: this.version,
      correlationId: runId,
      input,
      metadata: context.metadata,
    });

    try {
      // ========================================
      // STEP 1: CLASSIFY
      // ========================================
      const classification = classifyQuery(input.query, this.lexicon);

      observability.log("info", `[Research] Classified`, {
        runId,
        queryType: classification.queryType,
        complexity: classification.complexity,
        workerCount: classification.workerCount,
        score: classification.signals.score,
      });

      // ========================================
      // STEP 2: PLAN
      // ========================================
      const plan = buildPlan(input.query, classification, this.routing, {
        runId,
        createdAt: startedAt,
        angles: this.options.angles,
      });

      const conditions: RunCondition[] = [];
      if (plan.overflow) {
        conditions.push({ kind: "plan_overflow", ...plan.overflow });
        observability.log("warn", `[Research] Plan overflow: merged ${plan.overflow.merged.join(", ")}`, {
          runId,
        });
      }

      const runStore = new RunStore(store, observability, runId);
      const planPath = await runStore.writePlan(plan);

      // ========================================
      // STEP 3: FAN OUT
      // ========================================
      const statuses = await dispatch(plan.threads, {
        runId,
        observability,
        workerTimeoutMs: context.limits?.maxDurationMs ?? this.settings.workerTimeoutMs,
        launch: ({ thread, signal }) =>
          runWorker(
            thread,
            { registry, routing: this.routing, observability },
            {
              runId,
              writer: runStore.writerFor(thread.id),
              signal,
              settings: this.settings,
              now: this.options.now,
            }
          ),
      });

      // Barrier: late writes from timed-out workers are refused from here on
      await runStore.seal();
      conditions.push(...workerConditions(statuses));

      // ========================================
      // STEP 4: SYNTHESIZE
      // ========================================
      const reads = new Map<string, FindingRead>();
      const findingPaths: Record<string, string> = {};
      for (const thread of plan.threads) {
        const read = await runStore.readFinding(thread.id);
        reads.set(thread.id, read);
        if (read.status === "present") {
          findingPaths[thread.id] = runStore.getPath(runKeys.finding(runId, thread.id));
        }
      }

      const synthesis = synthesize(plan, statuses, reads);
      if (synthesis.missing.length > 0) {
        conditions.push({
          kind: "synthesis_gap",
          missingThreads: synthesis.output.missingThreads,
        });
      }

      const finalOutputPath = await runStore.writeFinalOutput(synthesis.output);

      const durationMs = Date.now() - startTime;
      observability.metric("run.duration_ms", durationMs, { runId });
      observability.metric("synthesis.conflicts", synthesis.output.conflicts, { runId });
      observability.metric("synthesis.missing_threads", synthesis.output.missingThreads.length, { runId });

      await observability.recordEvent({
        type: "system.completed",
        correlationId: runId,
        level: "info",
        data: {
          format: synthesis.output.format,
          lowConfidence: synthesis.output.lowConfidence,
          conditions: conditions.map((c) => c.kind),
        },
      });

      await observability.endSession(sessionId, {
        success: true,
        output: { format: synthesis.output.format, finalOutputPath },
        metadata: { durationMs },
      });

      return {
        runId,
        classification,
        plan,
        statuses,
        output: synthesis.output,
        conditions,
        artifacts: {
          plan: planPath,
          findings: findingPaths,
          finalOutput: finalOutputPath,
        },
        metadata: {
          systemVersion: this.version,
          startedAt,
          completedAt: now().toISOString(),
          durationMs,
        },
      };
    } catch (error) {
      observability.log("error", `[Research] Run failed`, { runId, error });

      await observability.recordEvent({
        type: "system.failed",
        correlationId: runId,
        level: "error",
        data: { error: error instanceof Error ? error.message : String(error) },
      });

      await observability.endSession(sessionId, {
        success: false,
        error,
        metadata: { durationMs: Date.now() - startTime },
      });

      throw error;
    }
  }

  getInfo(): SystemInfo {
    return {
      name: this.name,
      version: this.version,
      description:
        "Classifies a research query, runs 2-6 isolated research workers in parallel and synthesizes their findings",
      roles: [
        { name: "classifier", role: "classifier", instances: "1" },
        { name: "planner", role: "planner", instances: "1" },
        { name: "dispatcher", role: "dispatcher", instances: "1" },
        { name: "research-worker", role: "worker", instances: "2-6" },
        { name: "synthesizer", role: "synthesizer", instances: "1" },
      ],
      capabilities: routedCapabilities(this.routing).filter((c) => this.deps.registry.has(c)),
    };
  }
}

function workerConditions(statuses: ReadonlyMap<string, TerminalStatus>): RunCondition[] {
  const conditions: RunCondition[] = [];
  for (const [threadId, status] of statuses) {
    if (status.state === "failed") {
      conditions.push({ kind: "worker_failure", threadId, reason: status.reason });
    } else if (status.state === "timed_out") {
      conditions.push({ kind: "worker_failure", threadId, reason: `timed out after ${status.afterMs} ms` });
    } else if (status.partial) {
      conditions.push({ kind: "worker_failure", threadId, reason: "partial finding after a capability failure" });
    }
  }
  return conditions;
}

export function createResearchSystem(
  deps: Pick<ResearchDependencies, "registry"> & Partial<ResearchDependencies>,
  options?: ResearchSystemOptions
): ResearchSystem {
  return new ResearchSystem(deps, options);
}
