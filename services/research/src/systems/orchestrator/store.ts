/**
 * Run Store
 * Typed, write-once artifact layout for one research run
 *
 *   run-{id}/plan
 *   run-{id}/finding-{threadId}   one per thread, 0..N present
 *   run-{id}/final-output         exactly one, written last
 *
 * Finding keys are fixed when the plan is written. Each worker receives a
 * writer bound to its own key, so concurrent workers never share one.
 */

import { StorageError, ValidationError, errorMessage, isStorageError } from "@fanout/core";
import type { IStore } from "../../shared/store/types.js";
import type { IObservability } from "../../shared/observability/types.js";
import { FinalOutputSchema, FindingSchema, PlanSchema } from "./schema.js";
import type { FinalOutput, Finding, FindingWriter, Plan } from "./types.js";

// ============================================
// KEYS
// ============================================

export const runKeys = {
  prefix: (runId: string) => `run-${runId}`,
  plan: (runId: string) => `run-${runId}/plan`,
  finding: (runId: string, threadId: string) => `run-${runId}/finding-${threadId}`,
  finalOutput: (runId: string) => `run-${runId}/final-output`,
};

// ============================================
// TYPES
// ============================================

export type FindingRead =
  | { status: "present"; finding: Finding }
  | { status: "absent" }
  | { status: "invalid"; reason: string };

export interface RunSnapshot {
  plan: Plan;
  findings: Map<string, FindingRead>;
  finalOutput: FinalOutput | null;
}

// ============================================
// IMPLEMENTATION
// ============================================

export class RunStore {
  private readonly written = new Set<string>();
  private readonly inFlight = new Set<Promise<void>>();
  private allowed: Map<string, string> | null = null;
  private sealed = false;

  constructor(
    private readonly store: IStore,
    private readonly observability: IObservability,
    readonly runId: string
  ) {}

  getPath(key: string): string {
    return this.store.getPath(key);
  }

  /**
   * Persist the plan and fix the set of finding keys
   */
  async writePlan(plan: Plan): Promise<string> {
    const key = runKeys.plan(this.runId);

    if (plan.runId !== this.runId) {
      throw new StorageError(
        `Plan belongs to run ${plan.runId}, not ${this.runId}`,
        key,
        { reason: "mismatch" }
      );
    }

    await this.claim(key);
    this.allowed = new Map(
      plan.threads.map((thread): [string, string] => [thread.id, runKeys.finding(this.runId, thread.id)])
    );
    await this.put(key, plan);

    await this.observability.recordEvent({
      type: "plan.written",
      correlationId: this.runId,
      level: "info",
      data: {
        key,
        location: this.store.getPath(key),
        threads: plan.threads.map((t) => t.id),
      },
    });

    return this.store.getPath(key);
  }

  /**
   * Writer bound to one thread's key
   * @throws StorageError when the thread is not part of the plan
   */
  writerFor(threadId: string): FindingWriter {
    this.keyFor(threadId);
    return (finding) => this.putFinding(threadId, finding);
  }

  async putFinding(threadId: string, finding: Finding): Promise<void> {
    const task = this.persistFinding(threadId, finding);
    this.inFlight.add(task);
    try {
      await task;
    } finally {
      this.inFlight.delete(task);
    }
  }

  private async persistFinding(threadId: string, finding: Finding): Promise<void> {
    const key = this.keyFor(threadId);

    if (finding.threadId !== threadId) {
      throw new StorageError(
        `Finding for thread ${finding.threadId} cannot be written under ${threadId}`,
        key,
        { reason: "mismatch" }
      );
    }

    if (this.sealed) {
      throw new StorageError(`Run ${this.runId} no longer accepts findings`, key, {
        reason: "sealed",
      });
    }

    await this.claim(key);
    if (this.sealed) {
      throw new StorageError(`Run ${this.runId} was sealed while ${key} was pending`, key, {
        reason: "sealed",
      });
    }
    await this.put(key, finding);

    await this.observability.recordEvent({
      type: "finding.written",
      correlationId: this.runId,
      threadId,
      level: "info",
      data: {
        key,
        location: this.store.getPath(key),
        partial: finding.partial,
        items: finding.findingsList.length,
      },
    });
  }

  /**
   * Close the barrier. Writes not yet sent to the store are rejected; the
   * ones already sent settle before this resolves.
   */
  async seal(): Promise<void> {
    this.sealed = true;
    await Promise.allSettled([...this.inFlight]);
  }

  isSealed(): boolean {
    return this.sealed;
  }

  async readFinding(threadId: string): Promise<FindingRead> {
    return readFindingAt(this.store, this.keyFor(threadId), threadId);
  }

  async writeFinalOutput(output: FinalOutput): Promise<string> {
    const key = runKeys.finalOutput(this.runId);

    if (!this.allowed) {
      throw new StorageError(`Run ${this.runId} has no plan`, key, { reason: "foreign_key" });
    }

    await this.claim(key);
    await this.put(key, output);

    await this.observability.recordEvent({
      type: "output.written",
      correlationId: this.runId,
      level: "info",
      data: {
        key,
        location: this.store.getPath(key),
        format: output.format,
        lowConfidence: output.lowConfidence,
      },
    });

    return this.store.getPath(key);
  }

  // ============================================
  // INTERNALS
  // ============================================

  private keyFor(threadId: string): string {
    const key = this.allowed?.get(threadId);
    if (!key) {
      throw new StorageError(
        `Thread ${threadId} is not part of run ${this.runId}`,
        runKeys.finding(this.runId, threadId),
        { reason: "foreign_key" }
      );
    }
    return key;
  }

  /**
   * Reserve a key before the first await so a racing second write fails
   */
  private async claim(key: string): Promise<void> {
    if (this.written.has(key)) {
      throw new StorageError(`Artifact ${key} was already written`, key, { reason: "duplicate" });
    }
    this.written.add(key);

    let present: boolean;
    try {
      present = await this.store.exists(key);
    } catch (error) {
      throw toStorageError(error, key);
    }

    if (present) {
      throw new StorageError(`Artifact ${key} already exists`, key, { reason: "duplicate" });
    }
  }

  private async put<T>(key: string, data: T): Promise<void> {
    try {
      await this.store.write(key, data);
    } catch (error) {
      throw toStorageError(error, key);
    }
  }
}

function toStorageError(error: unknown, key: string): StorageError {
  if (isStorageError(error)) {
    return error;
  }
  return new StorageError(`Failed to persist ${key}: ${errorMessage(error)}`, key, {
    cause: error instanceof Error ? error : undefined,
    reason: "io",
  });
}

async function readFindingAt(store: IStore, key: string, threadId: string): Promise<FindingRead> {
  let raw: unknown;
  try {
    raw = await store.read<unknown>(key);
  } catch (error) {
    return { status: "invalid", reason: errorMessage(error) };
  }

  if (raw === null) {
    return { status: "absent" };
  }

  const parsed = FindingSchema.safeParse(raw);
  if (!parsed.success) {
    return { status: "invalid", reason: parsed.error.issues[0]?.message ?? "invalid finding" };
  }
  if (parsed.data.threadId !== threadId) {
    return { status: "invalid", reason: `stored under ${threadId} but names ${parsed.data.threadId}` };
  }

  return { status: "present", finding: parsed.data };
}

// ============================================
// INSPECTION OF PAST RUNS
// ============================================

export async function listRuns(store: IStore): Promise<string[]> {
  const keys = await store.list("run-");
  const ids: string[] = [];
  for (const key of keys) {
    const match = /^run-(.+)\/plan$/.exec(key);
    if (match) {
      ids.push(match[1]);
    }
  }
  return ids.sort();
}

/**
 * Read a run back; null when it has no plan
 * @throws ValidationError when the plan or final output is malformed
 */
export async function loadRun(store: IStore, runId: string): Promise<RunSnapshot | null> {
  const rawPlan = await store.read<unknown>(runKeys.plan(runId));
  if (rawPlan === null) {
    return null;
  }

  const plan = PlanSchema.safeParse(rawPlan);
  if (!plan.success) {
    throw new ValidationError(`Stored plan for run ${runId} is invalid`, {
      field: "plan",
      context: { runId, issues: plan.error.issues.map((i) => i.message) },
    });
  }

  const findings = new Map<string, FindingRead>();
  for (const thread of plan.data.threads) {
    findings.set(thread.id, await readFindingAt(store, runKeys.finding(runId, thread.id), thread.id));
  }

  const rawOutput = await store.read<unknown>(runKeys.finalOutput(runId));
  let finalOutput: FinalOutput | null = null;
  if (rawOutput !== null) {
    const output = FinalOutputSchema.safeParse(rawOutput);
    if (!output.success) {
      throw new ValidationError(`Stored final output for run ${runId} is invalid`, {
        field: "finalOutput",
        context: { runId },
      });
    }
    finalOutput = output.data;
  }

  return { plan: plan.data, findings, finalOutput };
}
